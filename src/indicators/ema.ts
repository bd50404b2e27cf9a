/**
 * Exponential Moving Average, recursive form seeded with the first value:
 * ema = alpha * x + (1 - alpha) * ema
 *
 * `new EMA(n)` uses the span convention (alpha = 2 / (n + 1));
 * `EMA.wilder(n)` uses Wilder smoothing (alpha = 1 / n) for RSI / ATR / ADX.
 */
export class EMA {
  private readonly alpha: number;
  private current: number = NaN;
  private seeded: boolean = false;

  constructor(period: number, alpha?: number) {
    if (period < 1) throw new Error('EMA period must be >= 1');
    this.alpha = alpha ?? 2 / (period + 1);
  }

  static wilder(period: number): EMA {
    if (period < 1) throw new Error('EMA period must be >= 1');
    return new EMA(period, 1 / period);
  }

  update(value: number): number {
    if (!this.seeded) {
      this.current = value;
      this.seeded = true;
    } else {
      this.current = this.alpha * value + (1 - this.alpha) * this.current;
    }
    return this.current;
  }

  get value(): number { return this.current; }
  get isReady(): boolean { return this.seeded; }

  reset(): void {
    this.current = NaN;
    this.seeded = false;
  }
}
