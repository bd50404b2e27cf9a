import type { Candle, IndicatorBar } from '../types/index.js';
import { EMA } from './ema.js';
import { RollingWindow } from './rolling.js';
import { RSI } from './rsi.js';
import { MACD } from './macd.js';
import { ATR } from './atr.js';
import { ADX } from './adx.js';

export const INDICATOR_PERIODS = {
  emaFast: 9,
  emaSlow: 21,
  smaTrend: 200,
  bollinger: 20,
  bollingerStd: 2,
  rsi: 14,
  volume: 20,
  atr: 14,
  adx: 14,
} as const;

/**
 * Enrich a candle series with every indicator the setup provider reads.
 * Pure: the input is not modified and each call starts from fresh state.
 */
export function computeIndicators(candles: readonly Candle[]): IndicatorBar[] {
  const p = INDICATOR_PERIODS;
  const emaFast = new EMA(p.emaFast);
  const emaSlow = new EMA(p.emaSlow);
  const smaTrend = new RollingWindow(p.smaTrend);
  const bb = new RollingWindow(p.bollinger);
  const rsi = new RSI(p.rsi);
  const macd = new MACD();
  const volSma = new RollingWindow(p.volume);
  const atr = new ATR(p.atr);
  const adx = new ADX(p.adx);

  return candles.map((c) => {
    smaTrend.update(c.close);
    bb.update(c.close);
    volSma.update(c.volume);
    const m = macd.update(c.close);
    const middle = bb.mean;
    const std = bb.std;

    return {
      timestamp: c.timestamp,
      open: c.open,
      high: c.high,
      low: c.low,
      close: c.close,
      volume: c.volume,
      ema9: emaFast.update(c.close),
      ema21: emaSlow.update(c.close),
      sma200: smaTrend.mean,
      bbUpper: middle + std * p.bollingerStd,
      bbMiddle: middle,
      bbLower: middle - std * p.bollingerStd,
      rsi: rsi.update(c.close),
      macd: m.macd,
      macdSignal: m.signal,
      macdHist: m.hist,
      volSma20: volSma.mean,
      atr: atr.update(c),
      adx: adx.update(c),
    };
  });
}
