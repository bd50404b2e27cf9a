/**
 * Fixed-size rolling window: mean and sample standard deviation.
 * Both are NaN until the window is full.
 */
export class RollingWindow {
  private readonly period: number;
  private readonly values: number[] = [];
  private sum: number = 0;

  constructor(period: number) {
    if (period < 1) throw new Error('Window period must be >= 1');
    this.period = period;
  }

  update(value: number): void {
    this.values.push(value);
    this.sum += value;
    if (this.values.length > this.period) {
      this.sum -= this.values.shift() ?? 0;
    }
  }

  get isReady(): boolean {
    return this.values.length === this.period;
  }

  get mean(): number {
    return this.isReady ? this.sum / this.period : NaN;
  }

  /** ddof = 1 */
  get std(): number {
    if (!this.isReady || this.period < 2) return NaN;
    const m = this.sum / this.period;
    const sq = this.values.reduce((s, v) => s + (v - m) ** 2, 0);
    return Math.sqrt(sq / (this.period - 1));
  }

  reset(): void {
    this.values.length = 0;
    this.sum = 0;
  }
}
