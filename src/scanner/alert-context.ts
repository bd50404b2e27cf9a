const MS_PER_MINUTE = 60_000;
const WINDOW_MS = 60 * MS_PER_MINUTE;

/** Higher timeframes count for more */
export const TIMEFRAME_WEIGHTS: Readonly<Record<string, number>> = {
  '5m': 0.8,
  '15m': 1.0,
  '1h': 1.2,
  '4h': 1.5,
  '1d': 2.0,
};

export function applyTimeframeWeight(score: number, timeframe: string): number {
  return Math.min(100, score * (TIMEFRAME_WEIGHTS[timeframe] ?? 1.0));
}

export interface AlertLimits {
  readonly maxPerHour: number;
  readonly cooldownMinutes: number;
}

/**
 * Alert rate state: per-symbol cooldown plus a rolling one-hour cap.
 * Owned by the caller; nothing here is module-global.
 */
export class AlertContext {
  private readonly lastAlert = new Map<string, number>();
  private sent: number[] = [];

  constructor(private readonly limits: AlertLimits) {}

  canAlert(symbol: string, now: number): boolean {
    this.prune(now);
    if (this.sent.length >= this.limits.maxPerHour) return false;
    const last = this.lastAlert.get(symbol);
    return last === undefined || now - last >= this.limits.cooldownMinutes * MS_PER_MINUTE;
  }

  record(symbol: string, now: number): void {
    this.lastAlert.set(symbol, now);
    this.sent.push(now);
  }

  sentInLastHour(now: number): number {
    this.prune(now);
    return this.sent.length;
  }

  private prune(now: number): void {
    this.sent = this.sent.filter((t) => now - t < WINDOW_MS);
  }
}
