import type { Candle } from '../types/index.js';

export interface PriceLevel {
  readonly timestamp: number;
  readonly price: number;
}

export interface SupportResistance {
  readonly supports: PriceLevel[];
  readonly resistances: PriceLevel[];
}

/**
 * Pivot levels: a candle whose high (low) is not exceeded by any candle
 * within `window` bars either side. The last `window` candles can never
 * qualify since their right side is incomplete.
 */
export function findSupportResistance(candles: readonly Candle[], window = 20): SupportResistance {
  const supports: PriceLevel[] = [];
  const resistances: PriceLevel[] = [];
  if (candles.length < window) return { supports, resistances };

  for (let i = window; i < candles.length - window; i++) {
    const c = candles[i]!;
    let isResistance = true;
    let isSupport = true;

    for (let j = i - window; j <= i + window; j++) {
      const n = candles[j]!;
      if (n.high > c.high) isResistance = false;
      if (n.low < c.low) isSupport = false;
      if (!isResistance && !isSupport) break;
    }

    if (isResistance) resistances.push({ timestamp: c.timestamp, price: c.high });
    if (isSupport) supports.push({ timestamp: c.timestamp, price: c.low });
  }

  return { supports, resistances };
}

export interface FairValueGap {
  readonly type: 'BULLISH' | 'BEARISH';
  readonly top: number;
  readonly bottom: number;
  readonly startTime: number;
  readonly endTime: number;
}

/**
 * Three-candle imbalances: bullish when low[i] > high[i-2],
 * bearish when high[i] < low[i-2].
 */
export function findFairValueGaps(candles: readonly Candle[]): FairValueGap[] {
  const gaps: FairValueGap[] = [];

  for (let i = 2; i < candles.length; i++) {
    const first = candles[i - 2]!;
    const third = candles[i]!;

    if (third.low > first.high) {
      gaps.push({
        type: 'BULLISH',
        top: third.low,
        bottom: first.high,
        startTime: first.timestamp,
        endTime: third.timestamp,
      });
    } else if (third.high < first.low) {
      gaps.push({
        type: 'BEARISH',
        top: first.low,
        bottom: third.high,
        startTime: first.timestamp,
        endTime: third.timestamp,
      });
    }
  }

  return gaps;
}

/** Session VWAP over the whole series (cumulative typical price * volume) */
export function calculateVwap(candles: readonly Candle[]): number[] {
  let pv = 0;
  let vol = 0;
  return candles.map((c) => {
    pv += ((c.high + c.low + c.close) / 3) * c.volume;
    vol += c.volume;
    return pv / vol;
  });
}

export interface VolumeBin {
  readonly low: number;
  readonly center: number;
  readonly volume: number;
}

export interface VolumeProfile {
  readonly bins: VolumeBin[];
  /** point of control: center of the heaviest bin */
  readonly poc: number;
  readonly pocVolume: number;
  /** value area high / low */
  readonly vah: number;
  readonly val: number;
}

const VALUE_AREA_SHARE = 0.7;

/**
 * Volume by price over the visible range. Each candle's volume lands in the
 * bin holding its close; bins split [lowest low, highest high] evenly and the
 * last one includes its upper edge. The value area takes the heaviest bins
 * until they hold 70% of all volume, so it always contains the POC.
 * Returns null for no candles or no volume.
 */
export function calculateVolumeProfile(candles: readonly Candle[], rows = 100): VolumeProfile | null {
  if (candles.length === 0 || rows < 1) return null;

  const min = Math.min(...candles.map((c) => c.low));
  const max = Math.max(...candles.map((c) => c.high));
  const count = max > min ? rows : 1;
  const width = (max - min) / count;

  const volumes = new Array<number>(count).fill(0);
  for (const c of candles) {
    const k = width > 0 ? Math.min(count - 1, Math.max(0, Math.floor((c.close - min) / width))) : 0;
    volumes[k] = (volumes[k] ?? 0) + c.volume;
  }
  const total = volumes.reduce((s, v) => s + v, 0);
  if (total <= 0) return null;

  const bins = volumes.map((volume, k) => {
    const low = min + k * width;
    return { low, center: low + width / 2, volume };
  });

  const byVolume = [...bins].sort((a, b) => b.volume - a.volume);
  const pocBin = byVolume[0];
  if (pocBin === undefined) return null;

  let vah = pocBin.center;
  let val = pocBin.center;
  let cumulative = 0;
  for (const bin of byVolume) {
    cumulative += bin.volume;
    vah = Math.max(vah, bin.center);
    val = Math.min(val, bin.center);
    if (cumulative >= total * VALUE_AREA_SHARE) break;
  }

  return { bins, poc: pocBin.center, pocVolume: pocBin.volume, vah, val };
}
