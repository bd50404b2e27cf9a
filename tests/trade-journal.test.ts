import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { openDb, type Db } from '../src/db/database.js';
import { SignalRepository } from '../src/db/signal-repository.js';
import { TradeJournalRepository, journalPnl } from '../src/db/trade-journal-repository.js';
import { HOUR, T0, longSetup } from './helpers.js';

let db: Db;
let journal: TradeJournalRepository;

beforeEach(() => {
  db = openDb(':memory:');
  journal = new TradeJournalRepository(db);
});

afterEach(() => {
  db.close();
});

/** T0 is 2023-11-14 22:13 UTC, so T0 + 2h falls on the next day */
function seed(): Record<'a' | 'b' | 'c' | 'd' | 'e', number> {
  const a = journal.logEntry({ symbol: 'BTCUSDT', direction: 'LONG', entryPrice: 100, quantity: 2, entryTime: T0 });
  const b = journal.logEntry({ symbol: 'BTCUSDT', direction: 'LONG', entryPrice: 100, quantity: 2, entryTime: T0 + 1 });
  const c = journal.logEntry({ symbol: 'ETHUSDT', direction: 'SHORT', entryPrice: 50, quantity: 1, entryTime: T0 + 2 });
  const d = journal.logEntry({ symbol: 'BTCUSDT', direction: 'LONG', entryPrice: 100, entryTime: T0 + 3 });
  const e = journal.logEntry({ symbol: 'BTCUSDT', direction: 'LONG', entryPrice: 100, quantity: 1, entryTime: T0 + 4 });

  journal.logExit(a, { exitPrice: 110, exitTime: T0 + HOUR });
  journal.logExit(b, { exitPrice: 95, exitTime: T0 + 2 * HOUR });
  journal.logExit(c, { exitPrice: 40, exitTime: T0 + 3 * HOUR });
  journal.logExit(e, { exitPrice: 100, exitTime: T0 + HOUR });
  return { a, b, c, d, e };
}

describe('journalPnl', () => {
  it('scales the price move by quantity', () => {
    expect(journalPnl('LONG', 100, 110, 2)).toEqual({ pnl: 20, pnlPct: 10, outcome: 'WIN' });
    expect(journalPnl('SHORT', 50, 40, 1)).toEqual({ pnl: 10, pnlPct: 20, outcome: 'WIN' });
    expect(journalPnl('LONG', 100, 100, 3)).toEqual({ pnl: 0, pnlPct: 0, outcome: 'BREAKEVEN' });
  });
});

describe('TradeJournalRepository', () => {
  it('opens a trade without exit fields', () => {
    const id = journal.logEntry({ symbol: 'SOLUSDT', direction: 'LONG', entryPrice: 20, notes: 'breakout', entryTime: T0 });

    expect(journal.get(id)).toEqual({
      id,
      signalId: null,
      symbol: 'SOLUSDT',
      direction: 'LONG',
      entryTime: T0,
      entryPrice: 20,
      exitTime: null,
      exitPrice: null,
      quantity: null,
      pnl: null,
      pnlPct: null,
      outcome: null,
      notes: 'breakout',
    });
  });

  it('closes a short with a default quantity of 1', () => {
    const id = journal.logEntry({ symbol: 'BTCUSDT', direction: 'SHORT', entryPrice: 200, entryTime: T0 });
    const closed = journal.logExit(id, { exitPrice: 210, exitTime: T0 + HOUR });

    expect(closed).toMatchObject({ exitPrice: 210, exitTime: T0 + HOUR, quantity: 1, pnl: -10, pnlPct: -5, outcome: 'LOSS' });
    expect(journal.get(id)).toEqual(closed);
  });

  it('rejects unknown and already closed trades', () => {
    const id = journal.logEntry({ symbol: 'BTCUSDT', direction: 'LONG', entryPrice: 100, entryTime: T0 });
    journal.logExit(id, { exitPrice: 101, exitTime: T0 + HOUR });

    expect(() => journal.logExit(id, { exitPrice: 102 })).toThrow(`Trade ${id} is already closed`);
    expect(() => journal.logExit(999, { exitPrice: 102 })).toThrow('Trade 999 not found');
  });

  it('marks the source signal as taken', () => {
    const signals = new SignalRepository(db);
    const signalId = signals.save({ symbol: 'BTCUSDT', timeframe: '1h', setup: longSetup(), score: 70, reasons: [], createdAt: T0 });
    signals.markAlerted(signalId, T0 + 1);

    const id = journal.logEntry({ symbol: 'BTCUSDT', direction: 'LONG', entryPrice: 100, signalId, entryTime: T0 + 2 });

    expect(journal.get(id)?.signalId).toBe(signalId);
    expect(signals.get(signalId)?.status).toBe('TAKEN');
    expect(signals.get(signalId)?.alertedAt).toBe(T0 + 1);
  });

  it('separates open and closed trades', () => {
    const { a, b, c, d, e } = seed();

    expect(journal.openTrades().map((t) => t.id)).toEqual([d]);
    expect(journal.openTrades('ETHUSDT')).toEqual([]);
    expect(journal.closedTrades().map((t) => t.id)).toEqual([c, b, e, a]);
    expect(journal.closedTrades('BTCUSDT', 2).map((t) => t.id)).toEqual([b, e]);
    expect(journal.list({ outcome: 'WIN' }).map((t) => t.id)).toEqual([c, a]);
    expect(journal.list({ since: T0 + 2 }).map((t) => t.id)).toEqual([e, d]);
  });

  it('summarizes closed trades', () => {
    seed();

    expect(journal.statistics()).toEqual({
      totalTrades: 5,
      openTrades: 1,
      closedTrades: 4,
      winningTrades: 2,
      losingTrades: 1,
      breakevenTrades: 1,
      winRate: 50,
      totalPnl: 20,
      avgWin: 15,
      avgLoss: -10,
      avgWinPct: 15,
      avgLossPct: -5,
      profitFactor: 3,
      largestWin: 20,
      largestLoss: -10,
    });
  });

  it('reports no profit factor without losses', () => {
    const id = journal.logEntry({ symbol: 'BTCUSDT', direction: 'LONG', entryPrice: 100, entryTime: T0 });
    journal.logExit(id, { exitPrice: 105, exitTime: T0 + HOUR });

    const stats = journal.statistics({ symbol: 'BTCUSDT' });
    expect(stats.profitFactor).toBe(0);
    expect(stats.winRate).toBe(100);
    expect(stats.largestLoss).toBe(0);
  });

  it('groups realized PnL by UTC exit day', () => {
    seed();

    expect(journal.dailyPnl()).toEqual([
      { date: '2023-11-14', pnl: 20, cumulative: 20 },
      { date: '2023-11-15', pnl: 0, cumulative: 20 },
    ]);
    expect(journal.dailyPnl({ symbol: 'BTCUSDT' })).toEqual([
      { date: '2023-11-14', pnl: 20, cumulative: 20 },
      { date: '2023-11-15', pnl: -10, cumulative: 10 },
    ]);
  });

  it('has empty statistics with no trades', () => {
    expect(journal.statistics().totalTrades).toBe(0);
    expect(journal.statistics().winRate).toBe(0);
    expect(journal.dailyPnl()).toEqual([]);
  });
});
