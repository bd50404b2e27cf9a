import type { BacktestResult, ClosedTrade } from '../types/index.js';

const MS_PER_HOUR = 3_600_000;

export interface TradeHistoryRow extends ClosedTrade {
  readonly durationHours: number;
}

export function buildTradeHistory(trades: readonly ClosedTrade[]): TradeHistoryRow[] {
  return trades.map((t) => ({
    ...t,
    durationHours: (t.exitTime - t.entryTime) / MS_PER_HOUR,
  }));
}

export const CSV_COLUMNS = [
  'entryTime',
  'exitTime',
  'durationHours',
  'direction',
  'entryPrice',
  'exitPrice',
  'exitReason',
  'size',
  'pnl',
  'pnlPct',
  'capitalAfter',
] as const;

type CsvColumn = (typeof CSV_COLUMNS)[number];

function csvField(value: string): string {
  return /[",\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

function cell(row: TradeHistoryRow, col: CsvColumn): string {
  switch (col) {
    case 'entryTime':
    case 'exitTime':
      return new Date(row[col]).toISOString();
    case 'direction':
    case 'exitReason':
      return row[col];
    default:
      return String(row[col]);
  }
}

/**
 * Trade list as CSV, one row per closed trade, times in ISO-8601 UTC.
 */
export function tradesToCsv(trades: readonly ClosedTrade[]): string {
  const lines = [CSV_COLUMNS.join(',')];
  for (const row of buildTradeHistory(trades)) {
    lines.push(CSV_COLUMNS.map((col) => csvField(cell(row, col))).join(','));
  }
  return lines.join('\n') + '\n';
}

export interface ExportMeta {
  readonly symbol?: string;
  readonly timeframe?: string;
  readonly parameters?: Record<string, unknown>;
}

export function backtestToJson(result: BacktestResult, meta: ExportMeta = {}): string {
  return JSON.stringify(
    {
      ...meta,
      initialCapital: result.initialCapital,
      finalCapital: result.finalCapital,
      metrics: result.metrics,
      trades: buildTradeHistory(result.trades).map((t) => ({
        ...t,
        entryTime: new Date(t.entryTime).toISOString(),
        exitTime: new Date(t.exitTime).toISOString(),
      })),
      equityCurve: result.equityCurve.map((p) => ({
        time: new Date(p.timestamp).toISOString(),
        equity: p.equity,
      })),
    },
    null,
    2,
  );
}
