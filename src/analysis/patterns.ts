import type { Candle } from '../types/index.js';

export type CandlePattern = 'BULLISH_ENGULFING' | 'BEARISH_ENGULFING' | 'HAMMER';

export const PATTERN_LABELS: Record<CandlePattern, string> = {
  BULLISH_ENGULFING: 'Bullish Engulfing',
  BEARISH_ENGULFING: 'Bearish Engulfing',
  HAMMER: 'Hammer',
};

/**
 * Pattern on candle `i`. Engulfing needs the previous candle; a hammer
 * takes precedence when both match.
 */
export function detectPattern(candles: readonly Candle[], i: number): CandlePattern | null {
  const cur = candles[i];
  if (!cur) return null;

  const body = Math.abs(cur.close - cur.open);
  const upperWick = cur.high - Math.max(cur.open, cur.close);
  const lowerWick = Math.min(cur.open, cur.close) - cur.low;
  if (lowerWick > 2 * body && upperWick < body * 0.5) return 'HAMMER';

  const prev = i > 0 ? candles[i - 1] : undefined;
  if (!prev) return null;

  if (
    prev.close > prev.open &&
    cur.close < cur.open &&
    cur.open >= prev.close &&
    cur.close <= prev.open
  ) {
    return 'BEARISH_ENGULFING';
  }
  if (
    prev.close < prev.open &&
    cur.close > cur.open &&
    cur.open <= prev.close &&
    cur.close >= prev.open
  ) {
    return 'BULLISH_ENGULFING';
  }
  return null;
}
