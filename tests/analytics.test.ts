import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { openDb, type Db } from '../src/db/database.js';
import { SignalAnalytics } from '../src/db/analytics.js';
import { SignalRepository } from '../src/db/signal-repository.js';
import { TradeJournalRepository } from '../src/db/trade-journal-repository.js';
import { HOUR, T0, longSetup, shortSetup } from './helpers.js';

let db: Db;
let analytics: SignalAnalytics;

beforeEach(() => {
  db = openDb(':memory:');
  analytics = new SignalAnalytics(db);
});

afterEach(() => {
  db.close();
});

function seed(): void {
  const signals = new SignalRepository(db);
  const journal = new TradeJournalRepository(db);

  const s1 = signals.save({
    symbol: 'BTCUSDT', timeframe: '1h', setup: longSetup(), score: 65,
    reasons: ['High Volume', 'RSI has room to grow'], patterns: ['Hammer'], createdAt: T0,
  });
  const s2 = signals.save({
    symbol: 'ETHUSDT', timeframe: '1h', setup: shortSetup(), score: 85,
    reasons: ['High Volume'], patterns: ['Bullish Engulfing'], createdAt: T0 + HOUR,
  });
  signals.save({
    symbol: 'BTCUSDT', timeframe: '1h', setup: longSetup(), score: 72,
    reasons: ['Near Support Level', 'High Volume'], patterns: ['Hammer'], createdAt: T0 + 2 * HOUR,
  });
  signals.save({ symbol: 'SOLUSDT', timeframe: '1h', setup: longSetup(), score: 40, reasons: [], createdAt: T0 + 3 * HOUR });
  signals.markAlerted(s1, T0 + 1);
  signals.markAlerted(s2, T0 + HOUR + 1);

  const t1 = journal.logEntry({ symbol: 'BTCUSDT', direction: 'LONG', entryPrice: 100, quantity: 1, signalId: s1, entryTime: T0 + 10 });
  const t2 = journal.logEntry({ symbol: 'ETHUSDT', direction: 'SHORT', entryPrice: 100, quantity: 1, entryTime: T0 + 20 });
  const t3 = journal.logEntry({ symbol: 'BTCUSDT', direction: 'LONG', entryPrice: 100, quantity: 1, entryTime: T0 + 30 });
  journal.logEntry({ symbol: 'SOLUSDT', direction: 'LONG', entryPrice: 20, entryTime: T0 + 40 });
  journal.logExit(t1, { exitPrice: 110, exitTime: T0 + HOUR });
  journal.logExit(t2, { exitPrice: 105, exitTime: T0 + HOUR });
  journal.logExit(t3, { exitPrice: 98, exitTime: T0 + HOUR });
}

describe('SignalAnalytics', () => {
  it('summarizes signals and closed trades', () => {
    seed();

    expect(analytics.overview()).toEqual({
      totalSignals: 4,
      signalsAlerted: 2,
      signalsTaken: 1,
      closedTrades: 3,
      winRate: 100 / 3,
      totalPnl: 3,
      bestSymbol: 'BTCUSDT',
    });
  });

  it('ranks symbols by realized PnL', () => {
    seed();

    expect(analytics.winRateBySymbol()).toEqual([
      { symbol: 'BTCUSDT', totalTrades: 2, wins: 1, winRate: 50, totalPnl: 8 },
      { symbol: 'ETHUSDT', totalTrades: 1, wins: 0, winRate: 0, totalPnl: -5 },
    ]);
  });

  it('counts chart patterns with their average score', () => {
    seed();

    expect(analytics.patternPerformance()).toEqual([
      { pattern: 'Hammer', count: 2, avgScore: 68.5 },
      { pattern: 'Bullish Engulfing', count: 1, avgScore: 85 },
    ]);
  });

  it('buckets signals by confluence score', () => {
    seed();

    expect(analytics.confluenceEffectiveness()).toEqual([
      { range: '60-70', count: 1, avgScore: 65 },
      { range: '70-80', count: 1, avgScore: 72 },
      { range: '80-90', count: 1, avgScore: 85 },
      { range: '90-100', count: 0, avgScore: 0 },
    ]);
  });

  it('counts reasons on high-scoring signals', () => {
    seed();

    expect(analytics.topConfluenceReasons()).toEqual([
      { label: 'High Volume', count: 2 },
      { label: 'Near Support Level', count: 1 },
    ]);
    expect(analytics.topConfluenceReasons({ minScore: 0, limit: 2 })).toEqual([
      { label: 'High Volume', count: 3 },
      { label: 'Near Support Level', count: 1 },
    ]);
  });

  it('measures how many alerted signals were traded', () => {
    seed();

    expect(analytics.signalConversion()).toEqual({
      signalsAlerted: 2,
      signalsTaken: 1,
      tradesFromSignals: 1,
      conversionRate: 50,
    });
  });

  it('returns zeros on an empty database', () => {
    expect(analytics.overview()).toEqual({
      totalSignals: 0,
      signalsAlerted: 0,
      signalsTaken: 0,
      closedTrades: 0,
      winRate: 0,
      totalPnl: 0,
      bestSymbol: null,
    });
    expect(analytics.winRateBySymbol()).toEqual([]);
    expect(analytics.patternPerformance()).toEqual([]);
    expect(analytics.signalConversion().conversionRate).toBe(0);
  });
});
