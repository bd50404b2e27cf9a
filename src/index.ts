#!/usr/bin/env node
import { writeFileSync } from 'node:fs';
import type { Candle, Direction } from './types/index.js';
import { config } from './config.js';
import { logger } from './logger.js';
import { loadCsv } from './data/csv-loader.js';
import { BybitClient } from './market/bybit-client.js';
import { EmaRsiSetupProvider } from './strategy/ema-rsi-setup.js';
import { BacktestEngine, type BacktestOptions } from './engine/backtest-engine.js';
import { formatReport, formatTrades } from './report/formatter.js';
import { backtestToJson, tradesToCsv } from './report/trade-log.js';
import { paramSweep, formatSweepResults, type SweepGrid } from './optimization/param-sweep.js';
import { scanMarket } from './scanner/market-scanner.js';
import { runScanCycle } from './scanner/monitor.js';
import { AlertContext } from './scanner/alert-context.js';
import { SetupNotifier } from './notification/notifier.js';
import { closeDb, getDb } from './db/database.js';
import { BacktestRepository } from './db/backtest-repository.js';
import { SignalRepository } from './db/signal-repository.js';
import { TradeJournalRepository } from './db/trade-journal-repository.js';
import { SignalAnalytics } from './db/analytics.js';
import { calculateVolumeProfile } from './analysis/levels.js';

function printUsage(): void {
  console.log(`
Usage:
  tsx src/index.ts backtest [csv-file] [options]
  tsx src/index.ts sweep [csv-file] [options]
  tsx src/index.ts scan [options]
  tsx src/index.ts profile [csv-file] [options]
  tsx src/index.ts journal [options]
  tsx src/index.ts analytics

Commands:
  backtest      Replay the EMA/RSI setup over history
  sweep         Grid search over sizing, DCA, trailing stop and filters
  scan          Scan symbols for live setups (--alert to store and notify)
  profile       Volume profile: POC and value area
  journal       Log manual trades; without options prints journal statistics
  analytics     Signal and journal trade statistics

Data source (backtest / sweep):
  <csv-file>                timestamp,open,high,low,close,volume
  --symbol <SYMBOL>         fetch from Bybit instead (e.g. BTCUSDT)
  --interval <tf>           5m 15m 1h 2h 4h 1d (default: ${config.scanner.interval})
  --limit <number>          candles to fetch (default: 1000)

Options:
  --capital <number>        Initial capital in USD (default: ${config.backtest.initialCapital})
  --size <number>           Percent of capital per position (default: ${config.backtest.positionSizePct})
  --dca                     Enable DCA fills
  --trailing <number>       Trailing stop percent (default: off)
  --trend --volume --adx --macd   Enable entry filters
  --trades                  Show individual trades
  --csv-out <path>          Write the trade log as CSV
  --json-out <path>         Write the full result as JSON
  --save                    Store the run summary in SQLite
  --symbols <A,B,...>       Symbols to scan (default: .env SCAN_SYMBOLS)
  --alert                   Store new signals and send Telegram alerts
  --min-confluence <number> Minimum score to alert (default: ${config.scanner.minConfluence})
  --rows <number>           Volume profile bins (default: 100)

Journal:
  --open --symbol <S> --direction <LONG|SHORT> --price <p> [--qty <q>] [--signal-id <id>] [--notes <text>]
  --close <id> --price <p> [--qty <q>]
  --symbol <S>              Limit statistics to one symbol
`);
}

function parseArgs(args: string[]): Map<string, string> {
  const map = new Map<string, string>();
  for (let i = 0; i < args.length; i++) {
    const arg = args[i]!;
    if (arg.startsWith('--')) {
      const next = args[i + 1];
      if (next && !next.startsWith('--')) {
        map.set(arg, next);
        i++;
      } else {
        map.set(arg, 'true');
      }
    } else if (!map.has('_command')) {
      map.set('_command', arg);
    } else if (!map.has('_file')) {
      map.set('_file', arg);
    }
  }
  return map;
}

function getNum(args: Map<string, string>, key: string, def: number): number {
  const v = args.get(key);
  return v ? Number(v) : def;
}

function getOptionalNum(args: Map<string, string>, key: string, def: number | undefined): number | undefined {
  const v = args.get(key);
  return v ? Number(v) : def;
}

function getDirection(args: Map<string, string>): Direction {
  const value = args.get('--direction')?.toUpperCase();
  if (value !== 'LONG' && value !== 'SHORT') {
    throw new Error('--direction must be LONG or SHORT');
  }
  return value;
}

function requireNum(args: Map<string, string>, key: string): number {
  const n = Number(args.get(key));
  if (!args.has(key) || !Number.isFinite(n)) {
    throw new Error(`${key} <number> is required`);
  }
  return n;
}

function engineOptions(args: Map<string, string>): BacktestOptions {
  const bt = config.backtest;
  const trailing = getOptionalNum(args, '--trailing', bt.trailingStopPct);
  return {
    initialCapital: getNum(args, '--capital', bt.initialCapital),
    positionSizeFraction: getNum(args, '--size', bt.positionSizePct) / 100,
    useDca: args.has('--dca') || bt.useDca,
    filters: {
      trend: args.has('--trend') || bt.useTrendFilter,
      volume: args.has('--volume') || bt.useVolumeFilter,
      adx: args.has('--adx') || bt.useAdxFilter,
      macd: args.has('--macd') || bt.useMacdFilter,
    },
    ...(trailing !== undefined ? { trailingStopPercent: trailing } : {}),
  };
}

async function loadCandles(args: Map<string, string>): Promise<{ candles: Candle[]; source: string }> {
  const file = args.get('_file');
  if (file) {
    return { candles: loadCsv(file), source: file };
  }
  const symbol = args.get('--symbol');
  if (!symbol) {
    throw new Error('Provide a CSV file or --symbol');
  }
  const interval = args.get('--interval') ?? config.scanner.interval;
  const candles = await new BybitClient().fetchKlines(symbol.toUpperCase(), interval, getNum(args, '--limit', 1000));
  return { candles, source: `${symbol.toUpperCase()} ${interval}` };
}

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));
  const command = args.get('_command');

  if (!command) {
    printUsage();
    process.exit(1);
  }

  const provider = new EmaRsiSetupProvider();

  switch (command) {
    case 'backtest': {
      const { candles, source } = await loadCandles(args);
      console.log(`Loaded ${candles.length} candles from ${source}`);

      const options = engineOptions(args);
      const engine = new BacktestEngine(options, provider);
      const result = engine.run(provider.computeIndicators(candles));
      if (!result) {
        console.error('Not enough candles for a backtest');
        process.exit(1);
      }
      console.log(formatReport(result));
      if (args.has('--trades')) {
        console.log(formatTrades(result));
      }

      const csvOut = args.get('--csv-out');
      if (csvOut) {
        writeFileSync(csvOut, tradesToCsv(result.trades), 'utf8');
        console.log(`Trade log written to ${csvOut}`);
      }
      const jsonOut = args.get('--json-out');
      if (jsonOut) {
        writeFileSync(jsonOut, backtestToJson(result, { parameters: { ...engine.settings } }), 'utf8');
        console.log(`Result written to ${jsonOut}`);
      }
      if (args.has('--save')) {
        const first = candles[0];
        const last = candles.at(-1);
        if (first && last) {
          const id = new BacktestRepository(getDb()).save({
            symbol: args.get('--symbol')?.toUpperCase() ?? source,
            timeframe: args.get('--interval') ?? config.scanner.interval,
            startTime: first.timestamp,
            endTime: last.timestamp,
            result,
            parameters: { ...engine.settings },
          });
          console.log(`Saved backtest #${id}`);
        }
      }
      break;
    }

    case 'sweep': {
      const { candles, source } = await loadCandles(args);
      console.log(`Loaded ${candles.length} candles from ${source}`);

      const grid: SweepGrid = {
        trailingStopPercent: [null, 0.5, 1, 2],
        positionSizeFraction: [0.5, 1],
        useDca: [false, true],
        trend: [false, true],
      };
      const results = paramSweep(provider.computeIndicators(candles), grid, engineOptions(args), provider);
      console.log(formatSweepResults(results, 15));
      break;
    }

    case 'scan': {
      const symbolsArg = args.get('--symbols');
      const symbols = symbolsArg
        ? symbolsArg.split(',').map((s) => s.trim().toUpperCase())
        : config.scanner.symbols;
      const interval = args.get('--interval') ?? config.scanner.interval;
      const scanner = {
        fetchKlines: new BybitClient().fetcher,
        provider,
        lookback: config.scanner.lookback,
        useClosedCandles: config.scanner.useClosedCandles,
      };

      if (args.has('--alert')) {
        const notifier = new SetupNotifier();
        const alerted = await runScanCycle(symbols, interval, {
          scanner,
          signals: new SignalRepository(getDb()),
          alerts: new AlertContext(config.alerts),
          notifier,
          minConfluence: getNum(args, '--min-confluence', config.scanner.minConfluence),
        });
        console.log(`Alerted ${alerted.length} setup(s)`);
        await notifier.flush();
        break;
      }

      const results = await scanMarket(symbols, interval, scanner);
      if (results.length === 0) {
        console.log('No setups found.');
      }
      for (const r of results) {
        const s = r.setup;
        console.log(
          `${r.symbol.padEnd(10)} ${s.direction.padEnd(5)} ${String(r.score).padStart(3)}%  ` +
          `entry ${s.entry.toFixed(5)}  SL ${s.stopLoss.toFixed(5)}  TP ${s.takeProfit.toFixed(5)}  ${s.signal}`,
        );
      }
      break;
    }

    case 'profile': {
      const { candles, source } = await loadCandles(args);
      const profile = calculateVolumeProfile(candles, getNum(args, '--rows', 100));
      if (!profile) {
        console.error(`No volume in ${source}`);
        process.exit(1);
      }
      console.log(`Volume profile ${source} (${candles.length} candles)`);
      console.log(`  POC  ${profile.poc.toFixed(5)}  (volume ${profile.pocVolume.toFixed(2)})`);
      console.log(`  VAH  ${profile.vah.toFixed(5)}`);
      console.log(`  VAL  ${profile.val.toFixed(5)}`);
      break;
    }

    case 'journal': {
      const journal = new TradeJournalRepository(getDb());
      const symbol = args.get('--symbol')?.toUpperCase();

      if (args.has('--open')) {
        if (!symbol) throw new Error('--symbol is required');
        const signalId = getOptionalNum(args, '--signal-id', undefined);
        const quantity = getOptionalNum(args, '--qty', undefined);
        const notes = args.get('--notes');
        const id = journal.logEntry({
          symbol,
          direction: getDirection(args),
          entryPrice: requireNum(args, '--price'),
          ...(quantity !== undefined ? { quantity } : {}),
          ...(signalId !== undefined ? { signalId } : {}),
          ...(notes !== undefined ? { notes } : {}),
        });
        console.log(`Opened trade #${id}`);
        break;
      }

      if (args.has('--close')) {
        const quantity = getOptionalNum(args, '--qty', undefined);
        const trade = journal.logExit(requireNum(args, '--close'), {
          exitPrice: requireNum(args, '--price'),
          ...(quantity !== undefined ? { quantity } : {}),
        });
        console.log(`Closed trade #${trade.id}: ${trade.outcome ?? ''} ${(trade.pnl ?? 0).toFixed(2)} (${(trade.pnlPct ?? 0).toFixed(2)}%)`);
        break;
      }

      const stats = journal.statistics(symbol !== undefined ? { symbol } : {});
      console.log(`Trades: ${stats.totalTrades} (${stats.openTrades} open, ${stats.closedTrades} closed)`);
      console.log(`Win rate: ${stats.winRate.toFixed(1)}%  W/L/BE: ${stats.winningTrades}/${stats.losingTrades}/${stats.breakevenTrades}`);
      console.log(`Total PnL: ${stats.totalPnl.toFixed(2)}  Profit factor: ${stats.profitFactor.toFixed(2)}`);
      console.log(`Avg win ${stats.avgWin.toFixed(2)} (${stats.avgWinPct.toFixed(2)}%)  avg loss ${stats.avgLoss.toFixed(2)} (${stats.avgLossPct.toFixed(2)}%)`);
      for (const t of journal.openTrades(symbol)) {
        console.log(`  open #${t.id} ${t.symbol} ${t.direction} @ ${t.entryPrice}`);
      }
      for (const d of journal.dailyPnl(symbol !== undefined ? { symbol } : {})) {
        console.log(`  ${d.date}  ${d.pnl.toFixed(2).padStart(10)}  ${d.cumulative.toFixed(2).padStart(10)}`);
      }
      break;
    }

    case 'analytics': {
      const analytics = new SignalAnalytics(getDb());
      const o = analytics.overview();
      console.log(`Signals: ${o.totalSignals}  alerted ${o.signalsAlerted}  taken ${o.signalsTaken}`);
      console.log(`Closed trades: ${o.closedTrades}  win rate ${o.winRate.toFixed(1)}%  PnL ${o.totalPnl.toFixed(2)}  best ${o.bestSymbol ?? '-'}`);
      const conv = analytics.signalConversion();
      console.log(`Conversion: ${conv.conversionRate.toFixed(1)}% (${conv.tradesFromSignals} trade(s) from signals)`);
      for (const s of analytics.winRateBySymbol()) {
        console.log(`  ${s.symbol.padEnd(10)} ${String(s.totalTrades).padStart(4)}  ${s.winRate.toFixed(1).padStart(5)}%  ${s.totalPnl.toFixed(2)}`);
      }
      for (const b of analytics.confluenceEffectiveness()) {
        console.log(`  score ${b.range.padEnd(7)} ${b.count}`);
      }
      for (const p of analytics.patternPerformance()) {
        console.log(`  ${p.pattern.padEnd(20)} ${p.count}  avg ${p.avgScore.toFixed(1)}`);
      }
      for (const r of analytics.topConfluenceReasons()) {
        console.log(`  ${r.label.padEnd(30)} ${r.count}`);
      }
      break;
    }

    default:
      console.error(`Unknown command: ${command}`);
      printUsage();
      process.exit(1);
  }
}

main()
  .catch((err: unknown) => {
    logger.fatal({ err }, 'Command failed');
    process.exitCode = 1;
  })
  .finally(() => {
    closeDb();
  });
