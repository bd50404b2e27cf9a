import type {
  Candle,
  Direction,
  IndicatorBar,
  SetupFilters,
  SetupResult,
  TradeSetup,
} from '../types/index.js';
import type { IndicatorProvider } from './provider.js';
import { computeIndicators } from '../indicators/compute.js';

export interface EmaRsiSetupParams {
  readonly minHistory: number;         // bars required before any setup (22)
  readonly rsiOversold: number;        // 30
  readonly rsiOverbought: number;      // 70
  readonly adxThreshold: number;       // 25
  readonly atrStopMultiplier: number;  // 2
  readonly atrFallbackPct: number;     // ATR = price * 2% when ATR is NaN
  readonly swingBars: number;          // 5-bar swing for the stop
  readonly rewardRisk: number;         // 1:2
  readonly dcaSteps: readonly [number, number, number];  // 2%, 5%, 10% against entry
}

const DEFAULT_PARAMS: EmaRsiSetupParams = {
  minHistory: 22,
  rsiOversold: 30,
  rsiOverbought: 70,
  adxThreshold: 25,
  atrStopMultiplier: 2,
  atrFallbackPct: 0.02,
  swingBars: 5,
  rewardRisk: 2,
  dcaSteps: [0.02, 0.05, 0.1],
};

/**
 * EMA 9/21 cross + RSI extreme setup.
 *
 * Long:  EMA9 crosses above EMA21, else RSI oversold
 * Short: EMA9 crosses below EMA21, else RSI overbought
 * Stop:  beyond the 5-bar swing or 2 ATR, whichever is wider; target at 2R
 */
export class EmaRsiSetupProvider implements IndicatorProvider {
  readonly name = 'EmaRsiSetup';
  readonly lookback = 50;
  readonly params: EmaRsiSetupParams;

  constructor(params?: Partial<EmaRsiSetupParams>) {
    this.params = { ...DEFAULT_PARAMS, ...params };
  }

  computeIndicators(candles: readonly Candle[]): IndicatorBar[] {
    return computeIndicators(candles);
  }

  getSetup(history: readonly IndicatorBar[], currentPrice: number, filters: SetupFilters): SetupResult {
    try {
      return this.evaluate(history, currentPrice, filters);
    } catch (err) {
      return { kind: 'ERROR', error: err instanceof Error ? err : new Error(String(err)) };
    }
  }

  private evaluate(history: readonly IndicatorBar[], price: number, filters: SetupFilters): SetupResult {
    const p = this.params;
    const last = history.at(-1);
    const prev = history.at(-2);
    if (history.length < p.minHistory || !last || !prev) {
      return none('insufficient history');
    }
    if (Number.isNaN(last.ema9) || Number.isNaN(last.ema21) || Number.isNaN(last.rsi)) {
      return none('indicators not ready');
    }

    const signal = this.detectSignal(prev, last);
    if (!signal) return none('no signal');

    const rejected = this.applyFilters(signal.direction, last, price, filters);
    if (rejected) return none(rejected);

    const atr = Number.isNaN(last.atr) ? price * p.atrFallbackPct : last.atr;
    const swing = history.slice(-p.swingBars);
    const [d1, d2, d3] = p.dcaSteps;

    let setup: TradeSetup;
    if (signal.direction === 'LONG') {
      const swingLow = Math.min(...swing.map((b) => b.low));
      const stopLoss = Math.min(swingLow, price - p.atrStopMultiplier * atr);
      const risk = price - stopLoss;
      if (risk <= 0) return none('zero risk distance');
      setup = {
        direction: 'LONG',
        entry: price,
        stopLoss,
        takeProfit: price + risk * p.rewardRisk,
        dcaLevels: [price * (1 - d1), price * (1 - d2), price * (1 - d3)],
        signal: signal.label,
      };
    } else {
      const swingHigh = Math.max(...swing.map((b) => b.high));
      const stopLoss = Math.max(swingHigh, price + p.atrStopMultiplier * atr);
      const risk = stopLoss - price;
      if (risk <= 0) return none('zero risk distance');
      setup = {
        direction: 'SHORT',
        entry: price,
        stopLoss,
        takeProfit: price - risk * p.rewardRisk,
        dcaLevels: [price * (1 + d1), price * (1 + d2), price * (1 + d3)],
        signal: signal.label,
      };
    }

    if (!Number.isFinite(setup.stopLoss) || !Number.isFinite(setup.takeProfit)) {
      return {
        kind: 'ERROR',
        error: new Error(`non-finite levels: stop=${setup.stopLoss} target=${setup.takeProfit}`),
      };
    }
    return { kind: 'SETUP', setup };
  }

  private detectSignal(
    prev: IndicatorBar,
    last: IndicatorBar,
  ): { direction: Direction; label: string } | null {
    const crossUp = prev.ema9 <= prev.ema21 && last.ema9 > last.ema21;
    const crossDown = prev.ema9 >= prev.ema21 && last.ema9 < last.ema21;

    if (crossUp) return { direction: 'LONG', label: 'EMA Cross UP (Long)' };
    if (last.rsi < this.params.rsiOversold) return { direction: 'LONG', label: 'RSI Oversold (Long)' };
    if (crossDown) return { direction: 'SHORT', label: 'EMA Cross DOWN (Short)' };
    if (last.rsi > this.params.rsiOverbought) return { direction: 'SHORT', label: 'RSI Overbought (Short)' };
    return null;
  }

  /** @returns the rejection reason, or null when every enabled filter passes */
  private applyFilters(
    direction: Direction,
    last: IndicatorBar,
    price: number,
    filters: SetupFilters,
  ): string | null {
    const isLong = direction === 'LONG';

    if (filters.trend) {
      if (Number.isNaN(last.sma200)) return 'trend filter: SMA 200 unavailable';
      if (isLong ? price <= last.sma200 : price >= last.sma200) return 'trend filter';
    }
    if (filters.volume) {
      if (Number.isNaN(last.volSma20)) return 'volume filter: volume average unavailable';
      if (last.volume <= last.volSma20) return 'volume filter';
    }
    if (filters.adx) {
      if (Number.isNaN(last.adx)) return 'adx filter: ADX unavailable';
      if (last.adx <= this.params.adxThreshold) return 'adx filter';
    }
    if (filters.macd) {
      if (Number.isNaN(last.macdHist)) return 'macd filter: histogram unavailable';
      if (isLong ? last.macdHist <= 0 : last.macdHist >= 0) return 'macd filter';
    }
    return null;
  }
}

function none(reason: string): SetupResult {
  return { kind: 'NONE', reason };
}
