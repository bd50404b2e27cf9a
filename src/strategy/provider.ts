import type { Candle, IndicatorBar, SetupFilters, SetupResult } from '../types/index.js';

/**
 * What the backtest engine consumes: a deterministic, look-ahead-free
 * proposal of at most one setup for the last bar of `history`.
 */
export interface SetupProvider {
  readonly name: string;
  /** trailing bars the provider reads; the engine never passes more */
  readonly lookback: number;
  getSetup(history: readonly IndicatorBar[], currentPrice: number, filters: SetupFilters): SetupResult;
}

export interface IndicatorProvider extends SetupProvider {
  computeIndicators(candles: readonly Candle[]): IndicatorBar[];
}
