import { z } from 'zod';
import type { Direction, TradeSetup } from '../types/index.js';
import type { Db } from './database.js';

const MS_PER_HOUR = 3_600_000;
const PRICE_TOLERANCE = 0.01;

export const SIGNAL_STATUSES = ['NEW', 'ALERTED', 'TAKEN', 'IGNORED'] as const;
export type SignalStatus = (typeof SIGNAL_STATUSES)[number];

export interface SignalInput {
  readonly symbol: string;
  readonly timeframe: string;
  readonly setup: TradeSetup;
  readonly score: number;
  readonly reasons: readonly string[];
  readonly patterns?: readonly string[];
  readonly createdAt?: number;
}

export interface StoredSignal {
  readonly id: number;
  readonly createdAt: number;
  readonly symbol: string;
  readonly timeframe: string;
  readonly direction: Direction;
  readonly signal: string;
  readonly entryPrice: number;
  readonly stopLoss: number;
  readonly takeProfit: number;
  readonly dcaLevels: readonly number[];
  readonly score: number;
  readonly reasons: string[];
  readonly patterns: string[];
  readonly status: SignalStatus;
  readonly alertedAt: number | null;
}

export interface SignalQuery {
  readonly symbol?: string;
  readonly status?: SignalStatus;
  readonly minScore?: number;
  /** created strictly after this time (ms) */
  readonly since?: number;
  readonly limit?: number;
}

const stringList = z.array(z.string());

const rowSchema = z.object({
  id: z.number(),
  created_at: z.number(),
  symbol: z.string(),
  timeframe: z.string(),
  direction: z.enum(['LONG', 'SHORT']),
  signal: z.string(),
  entry_price: z.number(),
  stop_loss: z.number(),
  take_profit: z.number(),
  dca_1: z.number(),
  dca_2: z.number(),
  dca_3: z.number(),
  confluence_score: z.number(),
  confluence_reasons: z.string(),
  chart_patterns: z.string(),
  status: z.enum(SIGNAL_STATUSES),
  alerted_at: z.number().nullable(),
});

function toSignal(raw: unknown): StoredSignal {
  const row = rowSchema.parse(raw);
  return {
    id: row.id,
    createdAt: row.created_at,
    symbol: row.symbol,
    timeframe: row.timeframe,
    direction: row.direction,
    signal: row.signal,
    entryPrice: row.entry_price,
    stopLoss: row.stop_loss,
    takeProfit: row.take_profit,
    dcaLevels: [row.dca_1, row.dca_2, row.dca_3],
    score: row.confluence_score,
    reasons: stringList.parse(JSON.parse(row.confluence_reasons)),
    patterns: stringList.parse(JSON.parse(row.chart_patterns)),
    status: row.status,
    alertedAt: row.alerted_at,
  };
}

/**
 * Scanner signals. A signal counts as a duplicate when the same symbol and
 * direction was stored recently with an entry within 1%.
 */
export class SignalRepository {
  constructor(private readonly db: Db) {}

  save(input: SignalInput): number {
    const s = input.setup;
    const info = this.db.prepare(`
      INSERT INTO signals (
        created_at, symbol, timeframe, direction, signal, entry_price, stop_loss,
        take_profit, dca_1, dca_2, dca_3, confluence_score, confluence_reasons, chart_patterns
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `).run(
      input.createdAt ?? Date.now(),
      input.symbol,
      input.timeframe,
      s.direction,
      s.signal,
      s.entry,
      s.stopLoss,
      s.takeProfit,
      s.dcaLevels[0],
      s.dcaLevels[1],
      s.dcaLevels[2],
      Math.round(input.score),
      JSON.stringify(input.reasons),
      JSON.stringify(input.patterns ?? []),
    );
    return Number(info.lastInsertRowid);
  }

  isDuplicate(
    symbol: string,
    direction: Direction,
    entry: number,
    withinHours = 24,
    now: number = Date.now(),
  ): boolean {
    const row = this.db.prepare(`
      SELECT COUNT(*) AS n FROM signals
      WHERE symbol = ? AND direction = ? AND created_at > ?
        AND entry_price BETWEEN ? AND ?
    `).get(
      symbol,
      direction,
      now - withinHours * MS_PER_HOUR,
      entry * (1 - PRICE_TOLERANCE),
      entry * (1 + PRICE_TOLERANCE),
    );
    return hasCount(row) && row.n > 0;
  }

  markAlerted(id: number, at: number = Date.now()): void {
    this.db.prepare("UPDATE signals SET status = 'ALERTED', alerted_at = ? WHERE id = ?").run(at, id);
  }

  setStatus(id: number, status: SignalStatus): void {
    this.db.prepare('UPDATE signals SET status = ? WHERE id = ?').run(status, id);
  }

  get(id: number): StoredSignal | null {
    const row = this.db.prepare('SELECT * FROM signals WHERE id = ?').get(id);
    return row === undefined ? null : toSignal(row);
  }

  /** Newest first */
  list(query: SignalQuery = {}): StoredSignal[] {
    const where: string[] = [];
    const params: (string | number)[] = [];
    if (query.symbol !== undefined) {
      where.push('symbol = ?');
      params.push(query.symbol);
    }
    if (query.status !== undefined) {
      where.push('status = ?');
      params.push(query.status);
    }
    if (query.minScore !== undefined) {
      where.push('confluence_score >= ?');
      params.push(query.minScore);
    }
    if (query.since !== undefined) {
      where.push('created_at > ?');
      params.push(query.since);
    }
    const sql =
      'SELECT * FROM signals' +
      (where.length > 0 ? ` WHERE ${where.join(' AND ')}` : '') +
      ' ORDER BY created_at DESC, id DESC LIMIT ?';
    params.push(query.limit ?? 100);
    return this.db.prepare(sql).all(...params).map(toSignal);
  }
}

function hasCount(row: unknown): row is { n: number } {
  return typeof row === 'object' && row !== null && 'n' in row && typeof row.n === 'number';
}
