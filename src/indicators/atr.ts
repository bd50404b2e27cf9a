import type { Candle } from '../types/index.js';
import { EMA } from './ema.js';

export function trueRange(candle: Candle, prevClose: number | null): number {
  if (prevClose === null) {
    return candle.high - candle.low;
  }
  return Math.max(
    candle.high - candle.low,
    Math.abs(candle.high - prevClose),
    Math.abs(candle.low - prevClose),
  );
}

/**
 * ATR (Average True Range) with Wilder smoothing
 */
export class ATR {
  private readonly smoothed: EMA;
  private prevClose: number | null = null;

  constructor(period: number) {
    if (period < 1) throw new Error('ATR period must be >= 1');
    this.smoothed = EMA.wilder(period);
  }

  update(candle: Candle): number {
    const tr = trueRange(candle, this.prevClose);
    this.prevClose = candle.close;
    return this.smoothed.update(tr);
  }

  get value(): number {
    return this.smoothed.value;
  }

  reset(): void {
    this.smoothed.reset();
    this.prevClose = null;
  }
}
