import { describe, it, expect } from 'vitest';
import { BacktestEngine, runBacktest, resolveConfig } from '../src/engine/backtest-engine.js';
import { EMPTY_METRICS } from '../src/report/metrics.js';
import { BacktestError, ConfigurationError } from '../src/errors.js';
import type { Candle } from '../src/types/index.js';
import {
  HOUR,
  T0,
  ScriptedProvider,
  flatBars,
  longSetup,
  setupAt,
  shortSetup,
} from './helpers.js';

function sineCandles(count: number): Candle[] {
  const candles: Candle[] = [];
  for (let i = 0; i < count; i++) {
    const close = 100 + 10 * Math.sin(i / 8);
    candles.push({
      timestamp: T0 + i * HOUR,
      open: close - 0.2,
      high: close + 1,
      low: close - 1,
      close,
      volume: 100 + (i % 7) * 10,
    });
  }
  return candles;
}

describe('BacktestEngine', () => {
  describe('exits', () => {
    it('closes at the stop price when the low reaches the stop', () => {
      const bars = flatBars(30, { 22: { low: 94 } });
      const engine = new BacktestEngine({ initialCapital: 1000 }, new ScriptedProvider(setupAt(21)));
      const result = engine.run(bars);

      expect(result).not.toBeNull();
      expect(result!.trades).toHaveLength(1);
      const t = result!.trades[0]!;
      expect(t.entryTime).toBe(T0 + 21 * HOUR);
      expect(t.exitTime).toBe(T0 + 22 * HOUR);
      expect(t.exitPrice).toBe(95);
      expect(t.exitReason).toBe('STOP_LOSS');
      expect(t.size).toBe(1000);
      expect(t.pnl).toBe(-50);
      expect(t.pnlPct).toBe(-5);
      expect(t.capitalAfter).toBe(950);
      expect(result!.finalCapital).toBe(950);
    });

    it('closes at the target when the high reaches it', () => {
      const bars = flatBars(30, { 22: { high: 111, low: 96 } });
      const result = new BacktestEngine({ initialCapital: 1000 }, new ScriptedProvider(setupAt(21))).run(bars);

      const t = result!.trades[0]!;
      expect(t.exitReason).toBe('TAKE_PROFIT');
      expect(t.exitPrice).toBe(110);
      expect(t.pnl).toBe(100);
      expect(result!.finalCapital).toBe(1100);
    });

    it('assumes the stop when one bar spans both stop and target', () => {
      const bars = flatBars(30, { 22: { high: 111, low: 94 } });
      const result = new BacktestEngine({ initialCapital: 1000 }, new ScriptedProvider(setupAt(21))).run(bars);

      expect(result!.trades[0]!.exitReason).toBe('STOP_LOSS');
      expect(result!.trades[0]!.pnl).toBe(-50);
    });

    it('force-closes an open position at the last close', () => {
      const bars = flatBars(30, { 29: { high: 102, close: 102 } });
      const result = new BacktestEngine({ initialCapital: 1000 }, new ScriptedProvider(setupAt(21))).run(bars);

      const t = result!.trades[0]!;
      expect(t.exitReason).toBe('END_OF_DATA');
      expect(t.exitTime).toBe(T0 + 29 * HOUR);
      expect(t.exitPrice).toBe(102);
      expect(t.pnl).toBe(20);
      expect(result!.finalCapital).toBe(1020);
      expect(result!.equityCurve.at(-1)!.equity).toBe(1020);
    });

    it('handles short take-profit and stop-loss', () => {
      const short = { 21: { kind: 'SETUP' as const, setup: shortSetup() } };

      const win = new BacktestEngine({ initialCapital: 1000 }, new ScriptedProvider(short))
        .run(flatBars(30, { 22: { low: 89 } }));
      expect(win!.trades[0]!.exitReason).toBe('TAKE_PROFIT');
      expect(win!.trades[0]!.exitPrice).toBe(90);
      expect(win!.trades[0]!.pnl).toBe(100);

      const loss = new BacktestEngine({ initialCapital: 1000 }, new ScriptedProvider(short))
        .run(flatBars(30, { 22: { high: 106 } }));
      expect(loss!.trades[0]!.exitReason).toBe('STOP_LOSS');
      expect(loss!.trades[0]!.exitPrice).toBe(105);
      expect(loss!.trades[0]!.pnl).toBe(-50);
    });
  });

  describe('sizing and re-entry', () => {
    it('sizes positions as a fraction of current capital', () => {
      const bars = flatBars(30, { 22: { low: 94 } });
      const result = new BacktestEngine(
        { initialCapital: 1000, positionSizeFraction: 0.5 },
        new ScriptedProvider(setupAt(21)),
      ).run(bars);

      expect(result!.trades[0]!.size).toBe(500);
      expect(result!.trades[0]!.pnl).toBe(-25);
      expect(result!.finalCapital).toBe(975);
    });

    it('can enter again on the bar that closed the previous trade', () => {
      const bars = flatBars(30, { 22: { low: 94 }, 23: { high: 111 } });
      const result = new BacktestEngine({ initialCapital: 1000 }, new ScriptedProvider(setupAt(21, 22))).run(bars);

      expect(result!.trades).toHaveLength(2);
      const [first, second] = result!.trades;
      expect(first!.capitalAfter).toBe(950);
      expect(second!.entryTime).toBe(T0 + 22 * HOUR);
      expect(second!.size).toBe(950);
      expect(second!.pnl).toBe(95);
      expect(second!.capitalAfter).toBe(1045);
      expect(result!.finalCapital).toBe(1045);
    });

    it('keeps capitalAfter as the running sum of pnl', () => {
      const bars = flatBars(40, { 22: { low: 94 }, 24: { high: 111 }, 30: { low: 90 } });
      const result = new BacktestEngine(
        { initialCapital: 1000 },
        new ScriptedProvider(setupAt(21, 22, 23, 25, 26)),
      ).run(bars);

      let capital = 1000;
      for (const t of result!.trades) {
        capital += t.pnl;
        expect(t.capitalAfter).toBeCloseTo(capital, 9);
      }
      expect(result!.finalCapital).toBeCloseTo(capital, 9);
    });

    it('skips setups once the account is wiped out and finishes the run', () => {
      const bars = flatBars(30, { 22: { high: 260 } });
      const provider = new ScriptedProvider({
        21: { kind: 'SETUP', setup: shortSetup({ stopLoss: 250 }) },
        23: { kind: 'SETUP', setup: longSetup() },
      });
      const result = new BacktestEngine({ initialCapital: 1000 }, provider).run(bars);

      expect(result!.trades).toHaveLength(1);
      expect(result!.trades[0]!.exitReason).toBe('STOP_LOSS');
      expect(result!.trades[0]!.pnl).toBe(-1500);
      expect(result!.finalCapital).toBe(-500);
      expect(result!.skippedEntries).toBe(1);
      expect(result!.equityCurve).toHaveLength(9);
      expect(result!.equityCurve.at(-1)!.equity).toBe(-500);
    });
  });

  describe('DCA', () => {
    const deepStop = { 21: { kind: 'SETUP' as const, setup: longSetup({ stopLoss: 85 }) } };

    it('adds the initial size at each touched level and re-averages the entry', () => {
      const bars = flatBars(30, { 22: { low: 97.5, close: 99 }, 23: { low: 94.5 } });
      const engine = new BacktestEngine({ initialCapital: 1000, useDca: true }, new ScriptedProvider(deepStop));
      const result = engine.run(bars);

      const t = result!.trades[0]!;
      const avg = 293_000 / 3000;
      expect(t.size).toBe(3000);
      expect(t.entryPrice).toBeCloseTo(avg, 9);
      expect(t.exitReason).toBe('END_OF_DATA');
      expect(t.pnl).toBeCloseTo((3000 * (100 - avg)) / avg, 9);

      const fills = engine.getEventLog().filter((e) => e.type === 'DCA_FILLED');
      expect(fills.map((e) => e.barIndex)).toEqual([22, 23]);
      expect(fills.map((e) => (e.type === 'DCA_FILLED' ? e.levelsLeft : -1))).toEqual([2, 1]);
    });

    it('fills at most one level per bar', () => {
      const bars = flatBars(30, { 22: { low: 89.5 }, 23: { low: 89.5 }, 24: { low: 89.5 } });
      const engine = new BacktestEngine({ initialCapital: 1000, useDca: true }, new ScriptedProvider(deepStop));
      const result = engine.run(bars);

      const t = result!.trades[0]!;
      expect(t.size).toBe(4000);
      expect(t.entryPrice).toBeCloseTo(95.75, 9);
      const fills = engine.getEventLog().filter((e) => e.type === 'DCA_FILLED');
      expect(fills.map((e) => e.barIndex)).toEqual([22, 23, 24]);
    });

    it('ignores DCA levels when disabled', () => {
      const bars = flatBars(30, { 22: { low: 89.5 } });
      const engine = new BacktestEngine({ initialCapital: 1000 }, new ScriptedProvider(deepStop));
      const result = engine.run(bars);

      expect(result!.trades[0]!.size).toBe(1000);
      expect(engine.getEventLog().some((e) => e.type === 'DCA_FILLED')).toBe(false);
    });
  });

  describe('trailing stop', () => {
    it('ratchets the stop behind the highest high and exits on it', () => {
      const bars = flatBars(30, {
        22: { high: 101, low: 100.5, close: 101 },
        23: { high: 105, low: 104.5, close: 105 },
        24: { high: 103, low: 102, close: 102.5 },
      });
      const engine = new BacktestEngine(
        { initialCapital: 1000, trailingStopPercent: 1 },
        new ScriptedProvider(setupAt(21)),
      );
      const result = engine.run(bars);

      const updates = engine.getEventLog().filter((e) => e.type === 'STOP_UPDATED');
      expect(updates).toHaveLength(2);
      const stops = updates.map((e) => (e.type === 'STOP_UPDATED' ? e.stopLoss : Number.NaN));
      expect(stops[0]).toBeCloseTo(99.99, 9);
      expect(stops[1]).toBeCloseTo(103.95, 9);

      const t = result!.trades[0]!;
      expect(t.exitReason).toBe('STOP_LOSS');
      expect(t.exitTime).toBe(T0 + 24 * HOUR);
      expect(t.exitPrice).toBeCloseTo(103.95, 9);
      expect(t.pnl).toBeCloseTo(39.5, 6);
    });

    it('never loosens the stop', () => {
      const bars = flatBars(30, { 22: { high: 101, low: 100.5 } });
      const engine = new BacktestEngine(
        { initialCapital: 1000, trailingStopPercent: 10 },
        new ScriptedProvider(setupAt(21)),
      );
      engine.run(bars);

      // 101 * 0.9 = 90.9 is below the initial stop of 95
      expect(engine.getEventLog().some((e) => e.type === 'STOP_UPDATED')).toBe(false);
    });
  });

  describe('provider contract', () => {
    it('passes only bars up to the current one, bounded by lookback', () => {
      const provider = new ScriptedProvider({}, 5);
      new BacktestEngine({}, provider).run(flatBars(30));

      expect(provider.calls).toHaveLength(9);
      provider.calls.forEach((call, k) => {
        expect(call.lastTimestamp).toBe(T0 + (21 + k) * HOUR);
        expect(call.length).toBe(5);
        expect(call.currentPrice).toBe(100);
      });
    });

    it('does not ask for setups while a position is open', () => {
      const provider = new ScriptedProvider(setupAt(21));
      new BacktestEngine({}, provider).run(flatBars(30));

      expect(provider.calls).toHaveLength(1);
    });

    it('forwards the configured filters', () => {
      const provider = new ScriptedProvider({});
      new BacktestEngine({ filters: { trend: true } }, provider).run(flatBars(22));

      expect(provider.calls[0]!.filters).toEqual({ trend: true, volume: false, adx: false, macd: false });
    });

    it('counts provider errors and keeps going', () => {
      const provider = new ScriptedProvider({ 21: { kind: 'ERROR', error: new Error('bad input') } });
      const result = new BacktestEngine({}, provider).run(flatBars(30));

      expect(result!.providerErrors).toBe(1);
      expect(result!.trades).toEqual([]);
      expect(result!.metrics).toEqual(EMPTY_METRICS);
      expect(provider.calls).toHaveLength(9);
    });

    it('aborts with the bar index when the provider throws', () => {
      const provider = new ScriptedProvider({
        23: () => {
          throw new Error('boom');
        },
      });
      const engine = new BacktestEngine({}, provider);

      expect(() => engine.run(flatBars(30))).toThrowError(BacktestError);
      expect(() => engine.run(flatBars(30))).toThrowError('Bar 23: boom');
    });
  });

  describe('input handling', () => {
    it('returns null with fewer than 22 bars', () => {
      expect(new BacktestEngine({}, new ScriptedProvider(setupAt(20))).run(flatBars(21))).toBeNull();
      expect(new BacktestEngine().run([])).toBeNull();
    });

    it('processes a single bar with exactly 22 bars', () => {
      const result = new BacktestEngine({}, new ScriptedProvider({})).run(flatBars(22));

      expect(result!.equityCurve).toEqual([{ timestamp: T0 + 21 * HOUR, equity: 10_000 }]);
      expect(result!.finalCapital).toBe(10_000);
    });

    it('rejects bars that are not strictly increasing in time', () => {
      const bars = flatBars(30);
      bars[10] = { ...bars[10]!, timestamp: bars[9]!.timestamp };

      expect(() => new BacktestEngine().run(bars)).toThrowError(
        'Bar 10: bar timestamps must be strictly increasing',
      );
    });

    it('records one equity point per processed bar', () => {
      const bars = flatBars(30, { 22: { low: 94 } });
      const result = new BacktestEngine({ initialCapital: 1000 }, new ScriptedProvider(setupAt(21))).run(bars);

      expect(result!.equityCurve).toHaveLength(9);
      expect(result!.equityCurve.slice(0, 3).map((p) => p.equity)).toEqual([1000, 950, 950]);
      expect(result!.metrics.maxDrawdown).toBe(50);
      expect(result!.metrics.maxDrawdownPct).toBe(5);
    });
  });

  describe('configuration', () => {
    it('applies defaults', () => {
      expect(resolveConfig()).toEqual({
        initialCapital: 10_000,
        useDca: false,
        positionSizeFraction: 1,
        filters: { trend: false, volume: false, adx: false, macd: false },
      });
    });

    it.each([
      [{ initialCapital: 0 }],
      [{ initialCapital: Number.NaN }],
      [{ positionSizeFraction: 0 }],
      [{ positionSizeFraction: 1.5 }],
      [{ trailingStopPercent: -1 }],
      [{ trailingStopPercent: 100 }],
    ])('rejects %o at construction', (options) => {
      expect(() => new BacktestEngine(options)).toThrowError(ConfigurationError);
    });

    it('treats a zero trailing stop as trailing off', () => {
      const settings = new BacktestEngine({ trailingStopPercent: 0 }).settings;
      expect('trailingStopPercent' in settings).toBe(false);
    });

    it('lists every invalid field', () => {
      try {
        resolveConfig({ initialCapital: -1, positionSizeFraction: 2 });
        expect.unreachable();
      } catch (err) {
        expect(err).toBeInstanceOf(ConfigurationError);
        if (err instanceof ConfigurationError) {
          expect(err.issues).toHaveLength(2);
          expect(err.issues[0]).toMatch(/^initialCapital: /);
          expect(err.issues[1]).toMatch(/^positionSizeFraction: /);
        }
      }
    });
  });

  describe('determinism', () => {
    it('gives identical results when the same engine runs twice', () => {
      const bars = flatBars(40, { 22: { low: 94 }, 24: { high: 111 } });
      const engine = new BacktestEngine({ initialCapital: 1000 }, new ScriptedProvider(setupAt(21, 23)));

      const first = engine.run(bars);
      const firstLog = [...engine.getEventLog()];
      const second = engine.run(bars);

      expect(second).toEqual(first);
      expect(engine.getEventLog()).toEqual(firstLog);
    });
  });

  describe('runBacktest with the EMA/RSI provider', () => {
    const candles = sineCandles(300);
    const result = runBacktest(candles, { initialCapital: 10_000 });

    it('produces trades on an oscillating market', () => {
      expect(result).not.toBeNull();
      expect(result!.trades.length).toBeGreaterThan(0);
      expect(result!.equityCurve).toHaveLength(300 - 21);
    });

    it('never overlaps positions', () => {
      const trades = result!.trades;
      for (let k = 1; k < trades.length; k++) {
        expect(trades[k]!.entryTime).toBeGreaterThanOrEqual(trades[k - 1]!.exitTime);
      }
    });

    it('ends with initial capital plus realized pnl', () => {
      const sum = result!.trades.reduce((s, t) => s + t.pnl, 0);
      expect(result!.finalCapital).toBeCloseTo(10_000 + sum, 6);
      expect(result!.metrics.totalReturn).toBeCloseTo(sum, 6);
    });

    it('does not read the future: truncating the input keeps earlier trades', () => {
      const shorter = runBacktest(candles.slice(0, 200), { initialCapital: 10_000 });
      const closedBefore = result!.trades.filter((t) => t.exitTime < candles[199]!.timestamp);
      expect(shorter!.trades.slice(0, closedBefore.length)).toEqual(closedBefore);
    });
  });
});
