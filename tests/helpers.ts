import type {
  Candle,
  IndicatorBar,
  SetupFilters,
  SetupResult,
  TradeSetup,
} from '../src/types/index.js';
import type { IndicatorProvider } from '../src/strategy/provider.js';

export const T0 = 1_700_000_000_000;
export const HOUR = 3_600_000;

export function candle(i: number, overrides: Partial<Candle> = {}): Candle {
  return {
    timestamp: T0 + i * HOUR,
    open: 100,
    high: 100,
    low: 100,
    close: 100,
    volume: 10,
    ...overrides,
  };
}

const NAN_INDICATORS = {
  ema9: Number.NaN,
  ema21: Number.NaN,
  sma200: Number.NaN,
  bbUpper: Number.NaN,
  bbMiddle: Number.NaN,
  bbLower: Number.NaN,
  rsi: Number.NaN,
  macd: Number.NaN,
  macdSignal: Number.NaN,
  macdHist: Number.NaN,
  volSma20: Number.NaN,
  atr: Number.NaN,
  adx: Number.NaN,
};

export function withIndicators(c: Candle, indicators: Partial<IndicatorBar> = {}): IndicatorBar {
  return { ...NAN_INDICATORS, ...c, ...indicators };
}

/** Flat bars at 100 with NaN indicators; `overrides` keyed by bar index */
export function flatBars(count: number, overrides: Record<number, Partial<Candle>> = {}): IndicatorBar[] {
  const bars: IndicatorBar[] = [];
  for (let i = 0; i < count; i++) {
    bars.push(withIndicators(candle(i, overrides[i])));
  }
  return bars;
}

export function longSetup(overrides: Partial<TradeSetup> = {}): TradeSetup {
  return {
    direction: 'LONG',
    entry: 100,
    stopLoss: 95,
    takeProfit: 110,
    dcaLevels: [98, 95, 90],
    signal: 'test long',
    ...overrides,
  };
}

export function shortSetup(overrides: Partial<TradeSetup> = {}): TradeSetup {
  return {
    direction: 'SHORT',
    entry: 100,
    stopLoss: 105,
    takeProfit: 90,
    dcaLevels: [102, 105, 110],
    signal: 'test short',
    ...overrides,
  };
}

export interface ProviderCall {
  readonly lastTimestamp: number;
  readonly length: number;
  readonly currentPrice: number;
  readonly filters: SetupFilters;
}

/**
 * Provider scripted by bar index (derived from the last history timestamp).
 */
export class ScriptedProvider implements IndicatorProvider {
  readonly name = 'Scripted';
  readonly calls: ProviderCall[] = [];

  constructor(
    private readonly script: Record<number, SetupResult | (() => SetupResult)>,
    readonly lookback: number = 50,
    private readonly indicators: Partial<IndicatorBar> = {},
  ) {}

  computeIndicators(candles: readonly Candle[]): IndicatorBar[] {
    return candles.map((c) => withIndicators(c, this.indicators));
  }

  getSetup(history: readonly IndicatorBar[], currentPrice: number, filters: SetupFilters): SetupResult {
    const last = history.at(-1);
    if (!last) return { kind: 'NONE', reason: 'empty' };
    this.calls.push({ lastTimestamp: last.timestamp, length: history.length, currentPrice, filters });
    const entry = this.script[Math.round((last.timestamp - T0) / HOUR)];
    if (entry === undefined) return { kind: 'NONE', reason: 'no signal' };
    return typeof entry === 'function' ? entry() : entry;
  }
}

export function setupAt(...indices: number[]): Record<number, SetupResult> {
  const script: Record<number, SetupResult> = {};
  for (const i of indices) script[i] = { kind: 'SETUP', setup: longSetup() };
  return script;
}
