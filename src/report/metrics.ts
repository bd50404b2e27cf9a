import type { ClosedTrade, EquityPoint, Metrics } from '../types/index.js';

const MS_PER_HOUR = 3_600_000;

export const EMPTY_METRICS: Metrics = {
  totalTrades: 0,
  winningTrades: 0,
  losingTrades: 0,
  winRate: 0,
  profitFactor: 0,
  totalReturn: 0,
  totalReturnPct: 0,
  maxDrawdown: 0,
  maxDrawdownPct: 0,
  avgWin: 0,
  avgLoss: 0,
  largestWin: 0,
  largestLoss: 0,
  avgTradeDurationHours: 0,
  expectancy: 0,
  maxConsecutiveLosses: 0,
};

/**
 * Summary statistics of a run. A trade wins only when pnl > 0;
 * breakeven trades count as losses.
 */
export function computeMetrics(
  trades: readonly ClosedTrade[],
  equityCurve: readonly EquityPoint[],
  initialCapital: number,
  finalCapital: number,
): Metrics {
  if (trades.length === 0) return EMPTY_METRICS;

  const wins = trades.filter((t) => t.pnl > 0);
  const losses = trades.filter((t) => t.pnl <= 0);

  const grossProfit = wins.reduce((s, t) => s + t.pnl, 0);
  const grossLoss = Math.abs(losses.reduce((s, t) => s + t.pnl, 0));
  const totalPnl = trades.reduce((s, t) => s + t.pnl, 0);
  const totalReturn = finalCapital - initialCapital;
  const drawdown = calcMaxDrawdown(equityCurve, initialCapital);
  const totalHours = trades.reduce((s, t) => s + (t.exitTime - t.entryTime) / MS_PER_HOUR, 0);

  return {
    totalTrades: trades.length,
    winningTrades: wins.length,
    losingTrades: losses.length,
    winRate: (wins.length / trades.length) * 100,
    profitFactor: grossLoss > 0 ? grossProfit / grossLoss : grossProfit > 0 ? grossProfit : 0,
    totalReturn,
    totalReturnPct: initialCapital > 0 ? (totalReturn / initialCapital) * 100 : 0,
    maxDrawdown: drawdown.amount,
    maxDrawdownPct: drawdown.pct,
    avgWin: wins.length > 0 ? grossProfit / wins.length : 0,
    avgLoss: losses.length > 0 ? grossLoss / losses.length : 0,
    largestWin: wins.length > 0 ? Math.max(...wins.map((t) => t.pnl)) : 0,
    largestLoss: losses.length > 0 ? Math.min(...losses.map((t) => t.pnl)) : 0,
    avgTradeDurationHours: totalHours / trades.length,
    expectancy: totalPnl / trades.length,
    maxConsecutiveLosses: calcMaxConsecutiveLosses(trades),
  };
}

/**
 * Single pass with a running peak that starts at the initial capital.
 * `pct` is the drawdown (as % of its peak) at the point of the largest
 * absolute drawdown.
 */
export function calcMaxDrawdown(
  curve: readonly EquityPoint[],
  initialCapital: number,
): { amount: number; pct: number } {
  let peak = initialCapital;
  let amount = 0;
  let pct = 0;

  for (const point of curve) {
    if (point.equity > peak) peak = point.equity;
    const dd = peak - point.equity;
    if (dd > amount) {
      amount = dd;
      pct = peak > 0 ? (dd / peak) * 100 : 0;
    }
  }

  return { amount, pct };
}

function calcMaxConsecutiveLosses(trades: readonly ClosedTrade[]): number {
  let max = 0;
  let current = 0;
  for (const t of trades) {
    if (t.pnl <= 0) {
      current++;
      if (current > max) max = current;
    } else {
      current = 0;
    }
  }
  return max;
}
