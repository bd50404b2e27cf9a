export type Direction = 'LONG' | 'SHORT';

export interface TradeSetup {
  readonly direction: Direction;
  readonly entry: number;
  readonly stopLoss: number;
  readonly takeProfit: number;
  readonly dcaLevels: readonly [number, number, number];
  readonly signal: string;       // human-readable label
}

/** Entry filters forwarded to the setup provider */
export interface SetupFilters {
  readonly trend: boolean;       // price vs SMA 200
  readonly volume: boolean;      // volume above its 20-bar average
  readonly adx: boolean;         // ADX > 25
  readonly macd: boolean;        // MACD histogram aligned with direction
}

export const NO_FILTERS: SetupFilters = {
  trend: false,
  volume: false,
  adx: false,
  macd: false,
};

/**
 * "No signal" and "computation failed" are distinct outcomes.
 */
export type SetupResult =
  | { readonly kind: 'SETUP'; readonly setup: TradeSetup }
  | { readonly kind: 'NONE'; readonly reason: string }
  | { readonly kind: 'ERROR'; readonly error: Error };
