import type { Candle } from './candle.js';

/**
 * Candle enriched by the indicator provider.
 * Values that need more history than is available are NaN.
 */
export interface IndicatorBar extends Candle {
  readonly ema9: number;
  readonly ema21: number;
  readonly sma200: number;
  readonly bbUpper: number;
  readonly bbMiddle: number;
  readonly bbLower: number;
  readonly rsi: number;
  readonly macd: number;
  readonly macdSignal: number;
  readonly macdHist: number;
  readonly volSma20: number;
  readonly atr: number;
  readonly adx: number;
}
