import { EMA } from './ema.js';

/**
 * RSI with Wilder smoothing of close-to-close gains and losses.
 * The first bar contributes a zero change, so RSI starts as 0/0 = NaN
 * and stays NaN until some price movement is seen.
 */
export class RSI {
  private readonly avgGain: EMA;
  private readonly avgLoss: EMA;
  private prevClose: number | null = null;

  constructor(period: number) {
    if (period < 1) throw new Error('RSI period must be >= 1');
    this.avgGain = EMA.wilder(period);
    this.avgLoss = EMA.wilder(period);
  }

  update(close: number): number {
    const change = this.prevClose === null ? 0 : close - this.prevClose;
    this.prevClose = close;
    this.avgGain.update(change > 0 ? change : 0);
    this.avgLoss.update(change < 0 ? -change : 0);
    return this.value;
  }

  get value(): number {
    const rs = this.avgGain.value / this.avgLoss.value;
    return 100 - 100 / (1 + rs);
  }

  reset(): void {
    this.avgGain.reset();
    this.avgLoss.reset();
    this.prevClose = null;
  }
}
