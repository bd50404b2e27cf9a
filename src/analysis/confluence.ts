import type { IndicatorBar, TradeSetup } from '../types/index.js';
import { detectPattern, PATTERN_LABELS } from './patterns.js';
import { findFairValueGaps, findSupportResistance } from './levels.js';

export interface ConfluenceScore {
  readonly score: number;       // 0~100
  readonly reasons: string[];
  /** labels of candle patterns on the last bar */
  readonly patterns: string[];
}

const WEIGHTS = {
  trend: 20,
  momentum: 20,
  volume: 10,
  pattern: 15,
  level: 20,
  fvg: 15,
} as const;

const LEVEL_PROXIMITY = 0.01;
const FVG_TOLERANCE = 0.01;

/**
 * Confluence of a setup with the last bar of `bars`:
 * trend, RSI headroom, volume, candle pattern, S/R proximity, FVG.
 */
export function scoreConfluence(bars: readonly IndicatorBar[], setup: TradeSetup): ConfluenceScore {
  const last = bars.at(-1);
  if (!last) return { score: 0, reasons: [], patterns: [] };

  const isLong = setup.direction === 'LONG';
  const price = last.close;
  const reasons: string[] = [];
  const patterns: string[] = [];
  let score = 0;

  if (isLong && price > last.sma200) {
    score += WEIGHTS.trend;
    reasons.push('Trend is Bullish (Price > SMA 200)');
  } else if (!isLong && price < last.sma200) {
    score += WEIGHTS.trend;
    reasons.push('Trend is Bearish (Price < SMA 200)');
  }

  if (isLong && last.rsi < 60) {
    score += WEIGHTS.momentum;
    reasons.push('RSI has room to grow');
  } else if (!isLong && last.rsi > 40) {
    score += WEIGHTS.momentum;
    reasons.push('RSI has room to drop');
  }

  if (last.volume > last.volSma20) {
    score += WEIGHTS.volume;
    reasons.push('High Volume');
  }

  const pattern = detectPattern(bars, bars.length - 1);
  if (pattern) {
    score += WEIGHTS.pattern;
    patterns.push(PATTERN_LABELS[pattern]);
    reasons.push(`Candlestick Pattern: ${PATTERN_LABELS[pattern]}`);
  }

  const { supports, resistances } = findSupportResistance(bars);
  const levels = isLong ? supports : resistances;
  if (levels.some((l) => Math.abs(price - l.price) / price < LEVEL_PROXIMITY)) {
    score += WEIGHTS.level;
    reasons.push(isLong ? 'Near Support Level' : 'Near Resistance Level');
  }

  const inGap = findFairValueGaps(bars).some((g) =>
    isLong
      ? g.type === 'BULLISH' && g.bottom <= price && price <= g.top * (1 + FVG_TOLERANCE)
      : g.type === 'BEARISH' && g.bottom * (1 - FVG_TOLERANCE) <= price && price <= g.top,
  );
  if (inGap) {
    score += WEIGHTS.fvg;
    reasons.push(`In/Near ${isLong ? 'Long' : 'Short'} FVG`);
  }

  return { score: Math.min(score, 100), reasons, patterns };
}
