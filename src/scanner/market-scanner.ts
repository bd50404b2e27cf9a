import type { IndicatorBar, SetupFilters, TradeSetup } from '../types/index.js';
import { NO_FILTERS } from '../types/index.js';
import type { IndicatorProvider } from '../strategy/provider.js';
import { EmaRsiSetupProvider } from '../strategy/ema-rsi-setup.js';
import type { KlineFetcher } from '../market/bybit-client.js';
import { scoreConfluence } from '../analysis/confluence.js';
import { calculateVwap } from '../analysis/levels.js';
import { createChildLogger } from '../logger.js';

const log = createChildLogger('scanner');

export interface ScanResult {
  readonly symbol: string;
  readonly timeframe: string;
  readonly timestamp: number;      // last evaluated bar
  readonly price: number;
  readonly vwap: number;
  readonly setup: TradeSetup;
  readonly score: number;
  readonly reasons: readonly string[];
  readonly patterns: readonly string[];
}

export interface ScannerDeps {
  readonly fetchKlines: KlineFetcher;
  readonly provider?: IndicatorProvider;
  readonly lookback?: number;
  /** drop the last (still forming) candle */
  readonly useClosedCandles?: boolean;
  readonly filters?: SetupFilters;
}

/**
 * Evaluate one symbol's candles. Null when there is no setup.
 */
export function evaluateSymbol(
  symbol: string,
  timeframe: string,
  bars: readonly IndicatorBar[],
  provider: IndicatorProvider,
  filters: SetupFilters,
): ScanResult | null {
  const last = bars.at(-1);
  if (!last) return null;

  const history = bars.slice(Math.max(0, bars.length - provider.lookback));
  const result = provider.getSetup(history, last.close, filters);
  switch (result.kind) {
    case 'NONE':
      log.debug({ symbol, reason: result.reason }, 'No setup');
      return null;
    case 'ERROR':
      log.warn({ symbol, err: result.error }, 'Setup provider failed');
      return null;
    case 'SETUP': {
      const { score, reasons, patterns } = scoreConfluence(bars, result.setup);
      return {
        symbol,
        timeframe,
        timestamp: last.timestamp,
        price: last.close,
        vwap: calculateVwap(bars).at(-1) ?? Number.NaN,
        setup: result.setup,
        score,
        reasons,
        patterns,
      };
    }
  }
}

/**
 * Scan symbols one after another. A symbol whose fetch or evaluation
 * fails is logged and skipped. Results are sorted by score, best first.
 */
export async function scanMarket(
  symbols: readonly string[],
  interval: string,
  deps: ScannerDeps,
): Promise<ScanResult[]> {
  const provider = deps.provider ?? new EmaRsiSetupProvider();
  const lookback = deps.lookback ?? 200;
  const useClosed = deps.useClosedCandles ?? true;
  const filters = deps.filters ?? NO_FILTERS;
  const results: ScanResult[] = [];

  for (const raw of symbols) {
    const symbol = raw.trim().toUpperCase();
    if (symbol === '') continue;

    try {
      const fetched = await deps.fetchKlines(symbol, interval, lookback);
      const candles = useClosed ? fetched.slice(0, -1) : fetched;
      if (candles.length === 0) {
        log.debug({ symbol }, 'No candles');
        continue;
      }
      const found = evaluateSymbol(symbol, interval, provider.computeIndicators(candles), provider, filters);
      if (found) results.push(found);
    } catch (err) {
      log.warn({ symbol, err }, 'Scan failed for symbol');
    }
  }

  results.sort((a, b) => b.score - a.score);
  log.info({ interval, scanned: symbols.length, setups: results.length }, 'Scan finished');
  return results;
}
