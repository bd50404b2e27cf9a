import type { Candle } from '../types/index.js';
import { EMA } from './ema.js';
import { trueRange } from './atr.js';

/**
 * ADX (Average Directional Index), Wilder smoothing throughout.
 *
 * NaN on the first bar (no directional movement yet) and until the first
 * bar where +DI + -DI is non-zero. Once seeded, a flat bar keeps the
 * previous ADX.
 */
export class ADX {
  private readonly plusDm: EMA;
  private readonly minusDm: EMA;
  private readonly tr: EMA;
  private readonly adx: EMA;
  private prev: Candle | null = null;

  constructor(period: number) {
    if (period < 1) throw new Error('ADX period must be >= 1');
    this.plusDm = EMA.wilder(period);
    this.minusDm = EMA.wilder(period);
    this.tr = EMA.wilder(period);
    this.adx = EMA.wilder(period);
  }

  update(candle: Candle): number {
    const prev = this.prev;
    this.prev = candle;
    if (prev === null) return this.value;

    const up = candle.high - prev.high;
    const down = prev.low - candle.low;
    const plus = up > down && up > 0 ? up : 0;
    const minus = down > up && down > 0 ? down : 0;

    const smPlus = this.plusDm.update(plus);
    const smMinus = this.minusDm.update(minus);
    const smTr = this.tr.update(trueRange(candle, prev.close));
    if (smTr <= 0) return this.value;

    const plusDi = (100 * smPlus) / smTr;
    const minusDi = (100 * smMinus) / smTr;
    const diSum = plusDi + minusDi;
    if (diSum <= 0) return this.value;

    const dx = (100 * Math.abs(plusDi - minusDi)) / diSum;
    return this.adx.update(dx);
  }

  get value(): number {
    return this.adx.value;
  }

  reset(): void {
    this.plusDm.reset();
    this.minusDm.reset();
    this.tr.reset();
    this.adx.reset();
    this.prev = null;
  }
}
