import { EMA } from './ema.js';

export interface MacdValue {
  readonly macd: number;
  readonly signal: number;
  readonly hist: number;
}

export class MACD {
  private readonly fast: EMA;
  private readonly slow: EMA;
  private readonly signal: EMA;

  constructor(fastPeriod = 12, slowPeriod = 26, signalPeriod = 9) {
    this.fast = new EMA(fastPeriod);
    this.slow = new EMA(slowPeriod);
    this.signal = new EMA(signalPeriod);
  }

  update(close: number): MacdValue {
    const macd = this.fast.update(close) - this.slow.update(close);
    const signal = this.signal.update(macd);
    return { macd, signal, hist: macd - signal };
  }

  reset(): void {
    this.fast.reset();
    this.slow.reset();
    this.signal.reset();
  }
}
