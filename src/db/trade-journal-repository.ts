import { z } from 'zod';
import type { Direction } from '../types/index.js';
import type { Db } from './database.js';

export const TRADE_OUTCOMES = ['WIN', 'LOSS', 'BREAKEVEN'] as const;
export type TradeOutcome = (typeof TRADE_OUTCOMES)[number];

export interface JournalEntryInput {
  readonly symbol: string;
  readonly direction: Direction;
  readonly entryPrice: number;
  /** base-asset units */
  readonly quantity?: number;
  readonly notes?: string;
  /** the stored signal this trade was taken from; marks it TAKEN */
  readonly signalId?: number;
  readonly entryTime?: number;
}

export interface JournalExitInput {
  readonly exitPrice: number;
  readonly exitTime?: number;
  /** overrides the entry quantity; 1 when neither is set */
  readonly quantity?: number;
}

export interface JournalTrade {
  readonly id: number;
  readonly signalId: number | null;
  readonly symbol: string;
  readonly direction: Direction;
  readonly entryTime: number;
  readonly entryPrice: number;
  readonly exitTime: number | null;
  readonly exitPrice: number | null;
  readonly quantity: number | null;
  readonly pnl: number | null;
  readonly pnlPct: number | null;
  readonly outcome: TradeOutcome | null;
  readonly notes: string | null;
}

export interface JournalQuery {
  readonly symbol?: string;
  readonly outcome?: TradeOutcome;
  /** entered strictly after this time (ms) */
  readonly since?: number;
  readonly limit?: number;
}

export interface JournalStats {
  readonly totalTrades: number;
  readonly openTrades: number;
  readonly closedTrades: number;
  readonly winningTrades: number;
  readonly losingTrades: number;
  readonly breakevenTrades: number;
  readonly winRate: number;          // % of closed trades
  readonly totalPnl: number;
  readonly avgWin: number;
  readonly avgLoss: number;          // negative
  readonly avgWinPct: number;
  readonly avgLossPct: number;
  readonly profitFactor: number;     // 0 unless there are both wins and losses
  readonly largestWin: number;
  readonly largestLoss: number;
}

export interface DailyPnl {
  readonly date: string;             // YYYY-MM-DD, UTC
  readonly pnl: number;
  readonly cumulative: number;
}

const rowSchema = z.object({
  id: z.number(),
  signal_id: z.number().nullable(),
  symbol: z.string(),
  direction: z.enum(['LONG', 'SHORT']),
  entry_time: z.number(),
  entry_price: z.number(),
  exit_time: z.number().nullable(),
  exit_price: z.number().nullable(),
  quantity: z.number().nullable(),
  pnl: z.number().nullable(),
  pnl_pct: z.number().nullable(),
  outcome: z.enum(TRADE_OUTCOMES).nullable(),
  notes: z.string().nullable(),
});

const dailyRowSchema = z.object({ date: z.string(), pnl: z.number() });

function toTrade(raw: unknown): JournalTrade {
  const row = rowSchema.parse(raw);
  return {
    id: row.id,
    signalId: row.signal_id,
    symbol: row.symbol,
    direction: row.direction,
    entryTime: row.entry_time,
    entryPrice: row.entry_price,
    exitTime: row.exit_time,
    exitPrice: row.exit_price,
    quantity: row.quantity,
    pnl: row.pnl,
    pnlPct: row.pnl_pct,
    outcome: row.outcome,
    notes: row.notes,
  };
}

/**
 * Result of a manual trade. Unlike the backtester, quantity is in units of
 * the base asset, so pnl = price move * quantity.
 */
export function journalPnl(
  direction: Direction,
  entryPrice: number,
  exitPrice: number,
  quantity: number,
): { pnl: number; pnlPct: number; outcome: TradeOutcome } {
  const move = direction === 'LONG' ? exitPrice - entryPrice : entryPrice - exitPrice;
  const pnl = move * quantity;
  return {
    pnl,
    pnlPct: (100 * move) / entryPrice,
    outcome: pnl > 0 ? 'WIN' : pnl < 0 ? 'LOSS' : 'BREAKEVEN',
  };
}

function mean(values: readonly number[]): number {
  return values.length === 0 ? 0 : values.reduce((s, v) => s + v, 0) / values.length;
}

/**
 * Manually logged trades: entries, exits, statistics and daily PnL.
 */
export class TradeJournalRepository {
  constructor(private readonly db: Db) {}

  logEntry(input: JournalEntryInput): number {
    const insert = this.db.transaction((): number => {
      const info = this.db.prepare(`
        INSERT INTO trades (signal_id, symbol, direction, entry_time, entry_price, quantity, notes)
        VALUES (?, ?, ?, ?, ?, ?, ?)
      `).run(
        input.signalId ?? null,
        input.symbol,
        input.direction,
        input.entryTime ?? Date.now(),
        input.entryPrice,
        input.quantity ?? null,
        input.notes ?? null,
      );
      if (input.signalId !== undefined) {
        this.db.prepare("UPDATE signals SET status = 'TAKEN' WHERE id = ?").run(input.signalId);
      }
      return Number(info.lastInsertRowid);
    });
    return insert();
  }

  logExit(id: number, input: JournalExitInput): JournalTrade {
    const trade = this.get(id);
    if (!trade) throw new Error(`Trade ${id} not found`);
    if (trade.exitPrice !== null) throw new Error(`Trade ${id} is already closed`);

    const exitPrice = input.exitPrice;
    const exitTime = input.exitTime ?? Date.now();
    const quantity = input.quantity ?? trade.quantity ?? 1;
    const { pnl, pnlPct, outcome } = journalPnl(trade.direction, trade.entryPrice, exitPrice, quantity);
    this.db.prepare(`
      UPDATE trades
      SET exit_price = ?, exit_time = ?, quantity = ?, pnl = ?, pnl_pct = ?, outcome = ?
      WHERE id = ?
    `).run(exitPrice, exitTime, quantity, pnl, pnlPct, outcome, id);

    return { ...trade, exitPrice, exitTime, quantity, pnl, pnlPct, outcome };
  }

  get(id: number): JournalTrade | null {
    const row = this.db.prepare('SELECT * FROM trades WHERE id = ?').get(id);
    return row === undefined ? null : toTrade(row);
  }

  /** Newest entry first */
  list(query: JournalQuery = {}): JournalTrade[] {
    const where: string[] = [];
    const params: (string | number)[] = [];
    if (query.symbol !== undefined) {
      where.push('symbol = ?');
      params.push(query.symbol);
    }
    if (query.outcome !== undefined) {
      where.push('outcome = ?');
      params.push(query.outcome);
    }
    if (query.since !== undefined) {
      where.push('entry_time > ?');
      params.push(query.since);
    }
    const sql =
      'SELECT * FROM trades' +
      (where.length > 0 ? ` WHERE ${where.join(' AND ')}` : '') +
      ' ORDER BY entry_time DESC, id DESC LIMIT ?';
    params.push(query.limit ?? 100);
    return this.db.prepare(sql).all(...params).map(toTrade);
  }

  openTrades(symbol?: string): JournalTrade[] {
    const sql = 'SELECT * FROM trades WHERE exit_price IS NULL' +
      (symbol !== undefined ? ' AND symbol = ?' : '') +
      ' ORDER BY entry_time DESC, id DESC';
    const rows = symbol !== undefined ? this.db.prepare(sql).all(symbol) : this.db.prepare(sql).all();
    return rows.map(toTrade);
  }

  /** Most recent exit first */
  closedTrades(symbol?: string, limit = 100): JournalTrade[] {
    const sql = 'SELECT * FROM trades WHERE exit_price IS NOT NULL' +
      (symbol !== undefined ? ' AND symbol = ?' : '') +
      ' ORDER BY exit_time DESC, id DESC LIMIT ?';
    const rows = symbol !== undefined ? this.db.prepare(sql).all(symbol, limit) : this.db.prepare(sql).all(limit);
    return rows.map(toTrade);
  }

  statistics(query: Pick<JournalQuery, 'symbol' | 'since'> = {}): JournalStats {
    // LIMIT -1: no limit
    const trades = this.list({ ...query, limit: -1 });
    const closed = trades.filter((t) => t.exitPrice !== null);
    const wins = closed.filter((t) => t.outcome === 'WIN');
    const losses = closed.filter((t) => t.outcome === 'LOSS');
    const pnlOf = (t: JournalTrade): number => t.pnl ?? 0;
    const pctOf = (t: JournalTrade): number => t.pnlPct ?? 0;

    const grossProfit = wins.reduce((s, t) => s + pnlOf(t), 0);
    const grossLoss = Math.abs(losses.reduce((s, t) => s + pnlOf(t), 0));

    return {
      totalTrades: trades.length,
      openTrades: trades.length - closed.length,
      closedTrades: closed.length,
      winningTrades: wins.length,
      losingTrades: losses.length,
      breakevenTrades: closed.length - wins.length - losses.length,
      winRate: closed.length > 0 ? (wins.length / closed.length) * 100 : 0,
      totalPnl: closed.reduce((s, t) => s + pnlOf(t), 0),
      avgWin: mean(wins.map(pnlOf)),
      avgLoss: mean(losses.map(pnlOf)),
      avgWinPct: mean(wins.map(pctOf)),
      avgLossPct: mean(losses.map(pctOf)),
      profitFactor: wins.length > 0 && grossLoss > 0 ? grossProfit / grossLoss : 0,
      largestWin: wins.length > 0 ? Math.max(...wins.map(pnlOf)) : 0,
      largestLoss: losses.length > 0 ? Math.min(...losses.map(pnlOf)) : 0,
    };
  }

  /** Realized PnL per UTC exit day, oldest first, with a running total */
  dailyPnl(query: { symbol?: string; since?: number } = {}): DailyPnl[] {
    const where = ['exit_price IS NOT NULL'];
    const params: (string | number)[] = [];
    if (query.symbol !== undefined) {
      where.push('symbol = ?');
      params.push(query.symbol);
    }
    if (query.since !== undefined) {
      where.push('exit_time > ?');
      params.push(query.since);
    }
    const rows = this.db.prepare(`
      SELECT date(exit_time / 1000, 'unixepoch') AS date, SUM(pnl) AS pnl
      FROM trades
      WHERE ${where.join(' AND ')}
      GROUP BY date
      ORDER BY date ASC
    `).all(...params);

    let cumulative = 0;
    return rows.map((raw) => {
      const { date, pnl } = dailyRowSchema.parse(raw);
      cumulative += pnl;
      return { date, pnl, cumulative };
    });
  }
}
