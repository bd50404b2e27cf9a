import type { Direction } from './setup.js';

export interface Position {
  readonly direction: Direction;
  readonly entryTime: number;    // Unix ms
  entryPrice: number;            // size-weighted average (moves on DCA)
  size: number;                  // currency committed
  readonly initialSize: number;  // each DCA adds exactly this much
  stopLoss: number;              // tightened by trailing stop, never loosened
  readonly takeProfit: number;
  readonly dcaLevels: number[];  // consumed front-to-back
  extremePrice: number;          // highest high (LONG) / lowest low (SHORT) since entry
  readonly signal: string;
}

export type EngineState =
  | { readonly kind: 'FLAT' }
  | { readonly kind: 'OPEN'; readonly position: Position };
