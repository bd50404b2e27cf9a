import type { Direction } from './setup.js';

export type ExitReason = 'STOP_LOSS' | 'TAKE_PROFIT' | 'END_OF_DATA';

export interface ClosedTrade {
  readonly entryTime: number;
  readonly exitTime: number;
  readonly direction: Direction;
  readonly entryPrice: number;     // average entry when DCA filled
  readonly exitPrice: number;
  readonly exitReason: ExitReason;
  readonly size: number;
  readonly pnl: number;
  readonly pnlPct: number;         // % of size
  readonly capitalAfter: number;
  readonly signal: string;
}

export interface EquityPoint {
  readonly timestamp: number;
  readonly equity: number;
}

export interface Metrics {
  readonly totalTrades: number;
  readonly winningTrades: number;
  readonly losingTrades: number;
  readonly winRate: number;               // %
  readonly profitFactor: number;
  readonly totalReturn: number;
  readonly totalReturnPct: number;
  readonly maxDrawdown: number;
  readonly maxDrawdownPct: number;        // % of running peak
  readonly avgWin: number;
  readonly avgLoss: number;               // absolute
  readonly largestWin: number;
  readonly largestLoss: number;           // most negative losing pnl
  readonly avgTradeDurationHours: number;
  readonly expectancy: number;            // mean pnl per trade
  readonly maxConsecutiveLosses: number;
}

export interface BacktestResult {
  readonly trades: ClosedTrade[];
  readonly equityCurve: EquityPoint[];
  readonly metrics: Metrics;
  readonly initialCapital: number;
  readonly finalCapital: number;
  /** bars where the setup provider reported a failure */
  readonly providerErrors: number;
  /** setups ignored because the account had no capital left */
  readonly skippedEntries: number;
}
