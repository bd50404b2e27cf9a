import { z } from 'zod';
import type { BacktestResult } from '../types/index.js';
import type { Db } from './database.js';

export interface BacktestRecordInput {
  readonly symbol: string;
  readonly timeframe: string;
  readonly startTime: number;
  readonly endTime: number;
  readonly result: BacktestResult;
  readonly parameters: Record<string, unknown>;
  readonly createdAt?: number;
}

export interface BacktestRecord {
  readonly id: number;
  readonly createdAt: number;
  readonly symbol: string;
  readonly timeframe: string;
  readonly startTime: number;
  readonly endTime: number;
  readonly totalTrades: number;
  readonly winningTrades: number;
  readonly losingTrades: number;
  readonly winRate: number;
  readonly totalPnl: number;
  readonly maxDrawdown: number;
  readonly maxDrawdownPct: number;
  readonly profitFactor: number;
  readonly parameters: Record<string, unknown>;
}

export interface BacktestListQuery {
  readonly symbol?: string;
  readonly timeframe?: string;
  readonly limit?: number;
}

const rowSchema = z.object({
  id: z.number(),
  created_at: z.number(),
  symbol: z.string(),
  timeframe: z.string(),
  start_time: z.number(),
  end_time: z.number(),
  total_trades: z.number(),
  winning_trades: z.number(),
  losing_trades: z.number(),
  win_rate: z.number(),
  total_pnl: z.number(),
  max_drawdown: z.number(),
  max_drawdown_pct: z.number(),
  profit_factor: z.number(),
  parameters: z.string(),
});

const parametersSchema = z.record(z.unknown());

function toRecord(raw: unknown): BacktestRecord {
  const row = rowSchema.parse(raw);
  return {
    id: row.id,
    createdAt: row.created_at,
    symbol: row.symbol,
    timeframe: row.timeframe,
    startTime: row.start_time,
    endTime: row.end_time,
    totalTrades: row.total_trades,
    winningTrades: row.winning_trades,
    losingTrades: row.losing_trades,
    winRate: row.win_rate,
    totalPnl: row.total_pnl,
    maxDrawdown: row.max_drawdown,
    maxDrawdownPct: row.max_drawdown_pct,
    profitFactor: row.profit_factor,
    parameters: parametersSchema.parse(JSON.parse(row.parameters)),
  };
}

/**
 * Stored backtest summaries, one row per run.
 */
export class BacktestRepository {
  constructor(private readonly db: Db) {}

  save(input: BacktestRecordInput): number {
    const m = input.result.metrics;
    const info = this.db.prepare(`
      INSERT INTO backtest_results (
        created_at, symbol, timeframe, start_time, end_time,
        total_trades, winning_trades, losing_trades, win_rate, total_pnl,
        max_drawdown, max_drawdown_pct, profit_factor, parameters
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `).run(
      input.createdAt ?? Date.now(),
      input.symbol,
      input.timeframe,
      input.startTime,
      input.endTime,
      m.totalTrades,
      m.winningTrades,
      m.losingTrades,
      m.winRate,
      m.totalReturn,
      m.maxDrawdown,
      m.maxDrawdownPct,
      m.profitFactor,
      JSON.stringify(input.parameters),
    );
    return Number(info.lastInsertRowid);
  }

  /** Newest first */
  list(query: BacktestListQuery = {}): BacktestRecord[] {
    const where: string[] = [];
    const params: (string | number)[] = [];
    if (query.symbol !== undefined) {
      where.push('symbol = ?');
      params.push(query.symbol);
    }
    if (query.timeframe !== undefined) {
      where.push('timeframe = ?');
      params.push(query.timeframe);
    }
    const sql =
      'SELECT * FROM backtest_results' +
      (where.length > 0 ? ` WHERE ${where.join(' AND ')}` : '') +
      ' ORDER BY created_at DESC, id DESC LIMIT ?';
    params.push(query.limit ?? 50);
    return this.db.prepare(sql).all(...params).map(toRecord);
  }

  /** Highest total PnL for the pair, or null */
  best(symbol: string, timeframe: string): BacktestRecord | null {
    const row = this.db
      .prepare(
        'SELECT * FROM backtest_results WHERE symbol = ? AND timeframe = ? ORDER BY total_pnl DESC, id ASC LIMIT 1',
      )
      .get(symbol, timeframe);
    return row === undefined ? null : toRecord(row);
  }
}
