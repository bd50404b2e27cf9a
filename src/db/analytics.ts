import { z } from 'zod';
import type { Db } from './database.js';

export interface AnalyticsOverview {
  readonly totalSignals: number;
  readonly signalsAlerted: number;
  readonly signalsTaken: number;
  readonly closedTrades: number;
  readonly winRate: number;
  readonly totalPnl: number;
  /** highest realized PnL; null with no closed trades */
  readonly bestSymbol: string | null;
}

export interface SymbolPerformance {
  readonly symbol: string;
  readonly totalTrades: number;
  readonly wins: number;
  readonly winRate: number;
  readonly totalPnl: number;
}

export interface LabelCount {
  readonly label: string;
  readonly count: number;
}

export interface PatternPerformance {
  readonly pattern: string;
  readonly count: number;
  readonly avgScore: number;
}

export interface ScoreBucket {
  readonly range: string;
  readonly count: number;
  readonly avgScore: number;
}

export interface SignalConversion {
  readonly signalsAlerted: number;
  readonly signalsTaken: number;
  readonly tradesFromSignals: number;
  /** taken / alerted, percent */
  readonly conversionRate: number;
}

const SCORE_BUCKETS: readonly (readonly [number, number])[] = [
  [60, 70],
  [70, 80],
  [80, 90],
  [90, 100],
];

const countRow = z.object({ n: z.number() });
const overviewTradeRow = z.object({ closed: z.number(), wins: z.number(), total_pnl: z.number() });
const bestRow = z.object({ symbol: z.string() });
const symbolRow = z.object({ symbol: z.string(), total_trades: z.number(), wins: z.number(), total_pnl: z.number() });
const labelledRow = z.object({ confluence_score: z.number(), labels: z.string() });
const bucketRow = z.object({ count: z.number(), avg_score: z.number().nullable() });
const stringList = z.array(z.string());

/** Tally labels, most frequent first, ties by name */
function rank<T extends { count: number }>(tally: Map<string, T>): [string, T][] {
  return [...tally.entries()].sort((a, b) => b[1].count - a[1].count || a[0].localeCompare(b[0]));
}

/**
 * Read-only reporting over stored scanner signals and journal trades.
 * A signal counts as alerted once it has an alert time, whatever its later status.
 */
export class SignalAnalytics {
  constructor(private readonly db: Db) {}

  overview(): AnalyticsOverview {
    const totalSignals = this.count('SELECT COUNT(*) AS n FROM signals');
    const trades = overviewTradeRow.parse(this.db.prepare(`
      SELECT COUNT(*) AS closed,
             COALESCE(SUM(CASE WHEN outcome = 'WIN' THEN 1 ELSE 0 END), 0) AS wins,
             COALESCE(SUM(pnl), 0) AS total_pnl
      FROM trades WHERE exit_price IS NOT NULL
    `).get());
    const best = this.db.prepare(`
      SELECT symbol FROM trades WHERE exit_price IS NOT NULL
      GROUP BY symbol ORDER BY SUM(pnl) DESC, symbol ASC LIMIT 1
    `).get();

    return {
      totalSignals,
      signalsAlerted: this.count('SELECT COUNT(*) AS n FROM signals WHERE alerted_at IS NOT NULL'),
      signalsTaken: this.count("SELECT COUNT(*) AS n FROM signals WHERE status = 'TAKEN'"),
      closedTrades: trades.closed,
      winRate: trades.closed > 0 ? (trades.wins * 100) / trades.closed : 0,
      totalPnl: trades.total_pnl,
      bestSymbol: best === undefined ? null : bestRow.parse(best).symbol,
    };
  }

  /** Closed journal trades per symbol, most profitable first */
  winRateBySymbol(): SymbolPerformance[] {
    return this.db.prepare(`
      SELECT symbol,
             COUNT(*) AS total_trades,
             SUM(CASE WHEN outcome = 'WIN' THEN 1 ELSE 0 END) AS wins,
             SUM(pnl) AS total_pnl
      FROM trades WHERE exit_price IS NOT NULL
      GROUP BY symbol
      ORDER BY total_pnl DESC, symbol ASC
    `).all().map((raw) => {
      const row = symbolRow.parse(raw);
      return {
        symbol: row.symbol,
        totalTrades: row.total_trades,
        wins: row.wins,
        winRate: (row.wins * 100) / row.total_trades,
        totalPnl: row.total_pnl,
      };
    });
  }

  /** Chart patterns seen on the newest `limit` signals */
  patternPerformance(limit = 1000): PatternPerformance[] {
    const tally = new Map<string, { count: number; scoreSum: number }>();
    for (const { score, labels } of this.labelled('chart_patterns', 0, limit)) {
      for (const pattern of labels) {
        const entry = tally.get(pattern) ?? { count: 0, scoreSum: 0 };
        entry.count++;
        entry.scoreSum += score;
        tally.set(pattern, entry);
      }
    }
    return rank(tally).map(([pattern, { count, scoreSum }]) => ({ pattern, count, avgScore: scoreSum / count }));
  }

  /** Signal counts per confluence score band; the top band includes 100 */
  confluenceEffectiveness(): ScoreBucket[] {
    return SCORE_BUCKETS.map(([low, high]) => {
      const upper = high === 100 ? 'confluence_score <= ?' : 'confluence_score < ?';
      const row = bucketRow.parse(this.db.prepare(`
        SELECT COUNT(*) AS count, AVG(confluence_score) AS avg_score
        FROM signals WHERE confluence_score >= ? AND ${upper}
      `).get(low, high));
      return { range: `${low}-${high}`, count: row.count, avgScore: row.avg_score ?? 0 };
    });
  }

  signalConversion(): SignalConversion {
    const signalsAlerted = this.count('SELECT COUNT(*) AS n FROM signals WHERE alerted_at IS NOT NULL');
    const signalsTaken = this.count("SELECT COUNT(*) AS n FROM signals WHERE status = 'TAKEN'");
    return {
      signalsAlerted,
      signalsTaken,
      tradesFromSignals: this.count('SELECT COUNT(*) AS n FROM trades WHERE signal_id IS NOT NULL'),
      conversionRate: signalsAlerted > 0 ? (signalsTaken * 100) / signalsAlerted : 0,
    };
  }

  /** Most frequent confluence reasons among signals scoring at least `minScore` */
  topConfluenceReasons(options: { minScore?: number; limit?: number } = {}): LabelCount[] {
    const { minScore = 70, limit = 10 } = options;
    const tally = new Map<string, { count: number }>();
    for (const { labels } of this.labelled('confluence_reasons', minScore, -1)) {
      for (const reason of labels) {
        const entry = tally.get(reason) ?? { count: 0 };
        entry.count++;
        tally.set(reason, entry);
      }
    }
    return rank(tally).slice(0, limit).map(([label, { count }]) => ({ label, count }));
  }

  private count(sql: string): number {
    return countRow.parse(this.db.prepare(sql).get()).n;
  }

  private labelled(
    column: 'chart_patterns' | 'confluence_reasons',
    minScore: number,
    limit: number,
  ): { score: number; labels: string[] }[] {
    return this.db.prepare(`
      SELECT confluence_score, ${column} AS labels FROM signals
      WHERE confluence_score >= ?
      ORDER BY created_at DESC, id DESC LIMIT ?
    `).all(minScore, limit).map((raw) => {
      const row = labelledRow.parse(raw);
      return { score: row.confluence_score, labels: stringList.parse(JSON.parse(row.labels)) };
    });
  }
}
