import type { BacktestResult, IndicatorBar, SetupFilters } from '../types/index.js';
import type { SetupProvider } from '../strategy/provider.js';
import { EmaRsiSetupProvider } from '../strategy/ema-rsi-setup.js';
import {
  BacktestEngine,
  resolveConfig,
  type BacktestConfig,
  type BacktestOptions,
} from '../engine/backtest-engine.js';
import { formatUsd } from '../report/formatter.js';
import { createChildLogger } from '../logger.js';

const log = createChildLogger('sweep');

/** Axes left out keep the base config's value. `null` trailing = disabled */
export interface SweepGrid {
  readonly trailingStopPercent?: readonly (number | null)[];
  readonly positionSizeFraction?: readonly number[];
  readonly useDca?: readonly boolean[];
  readonly trend?: readonly boolean[];
  readonly volume?: readonly boolean[];
  readonly adx?: readonly boolean[];
  readonly macd?: readonly boolean[];
}

export interface SweepResult {
  readonly config: BacktestConfig;
  readonly result: BacktestResult;
}

export function generateCombinations(grid: SweepGrid, base: BacktestConfig): BacktestOptions[] {
  const trailing = grid.trailingStopPercent ?? [base.trailingStopPercent ?? null];
  const fractions = grid.positionSizeFraction ?? [base.positionSizeFraction];
  const dca = grid.useDca ?? [base.useDca];
  const filterAxes: (keyof SetupFilters)[] = ['trend', 'volume', 'adx', 'macd'];

  let filterCombos: SetupFilters[] = [base.filters];
  for (const key of filterAxes) {
    const values = grid[key] ?? [base.filters[key]];
    filterCombos = filterCombos.flatMap((f) => values.map((v) => ({ ...f, [key]: v })));
  }

  const combos: BacktestOptions[] = [];
  for (const t of trailing) {
    for (const positionSizeFraction of fractions) {
      for (const useDca of dca) {
        for (const filters of filterCombos) {
          combos.push({
            initialCapital: base.initialCapital,
            positionSizeFraction,
            useDca,
            filters,
            ...(t === null ? {} : { trailingStopPercent: t }),
          });
        }
      }
    }
  }
  return combos;
}

/**
 * Grid search over engine settings. Each combination runs on a fresh engine;
 * results are sorted by total return, best first.
 */
export function paramSweep(
  bars: readonly IndicatorBar[],
  grid: SweepGrid,
  baseConfig?: BacktestOptions,
  provider: SetupProvider = new EmaRsiSetupProvider(),
): SweepResult[] {
  const base = resolveConfig(baseConfig);
  const combos = generateCombinations(grid, base);
  const results: SweepResult[] = [];

  for (const options of combos) {
    const engine = new BacktestEngine(options, provider);
    const result = engine.run(bars);
    if (result) {
      results.push({ config: engine.settings, result });
    }
  }
  log.info({ combinations: combos.length, completed: results.length }, 'Sweep finished');

  results.sort((a, b) => b.result.metrics.totalReturn - a.result.metrics.totalReturn);
  return results;
}

export function describeConfig(c: BacktestConfig): string {
  const filters = Object.entries(c.filters)
    .filter(([, on]) => on)
    .map(([name]) => name);
  return [
    `size=${c.positionSizeFraction}`,
    `dca=${c.useDca ? 'on' : 'off'}`,
    `trail=${c.trailingStopPercent !== undefined ? `${c.trailingStopPercent}%` : 'off'}`,
    `filters=${filters.length > 0 ? filters.join('+') : 'none'}`,
  ].join(', ');
}

export function formatSweepResults(results: readonly SweepResult[], top: number = 10): string {
  const lines: string[] = [];
  lines.push('');
  lines.push('═══════════════════════════════════════════════════════');
  lines.push('          PARAMETER SWEEP RESULTS');
  lines.push(`          Total combinations: ${results.length}`);
  lines.push('═══════════════════════════════════════════════════════');
  lines.push('');

  const show = results.slice(0, top);
  for (let i = 0; i < show.length; i++) {
    const r = show[i]!;
    const m = r.result.metrics;
    lines.push(`#${i + 1}  ${describeConfig(r.config)}`);
    lines.push(`    Return: ${formatUsd(m.totalReturn)} (${m.totalReturnPct.toFixed(2)}%)  |  PF: ${m.profitFactor.toFixed(2)}  |  MDD: ${m.maxDrawdownPct.toFixed(2)}%  |  Trades: ${m.totalTrades}  |  WR: ${m.winRate.toFixed(1)}%`);
    lines.push('');
  }

  return lines.join('\n');
}
