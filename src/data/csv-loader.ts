import { readFileSync } from 'node:fs';
import type { Candle } from '../types/index.js';

export interface CsvLoaderOptions {
  readonly timestampCol?: string;
  readonly openCol?: string;
  readonly highCol?: string;
  readonly lowCol?: string;
  readonly closeCol?: string;
  readonly volumeCol?: string;
}

type CandleField = keyof Candle;
type PriceField = Exclude<CandleField, 'timestamp'>;

const OPTION_FOR: Record<CandleField, keyof CsvLoaderOptions> = {
  timestamp: 'timestampCol',
  open: 'openCol',
  high: 'highCol',
  low: 'lowCol',
  close: 'closeCol',
  volume: 'volumeCol',
};

interface Column {
  readonly name: string;
  readonly index: number;
}

/** One CSV record; `""` inside a quoted field is a literal quote. Fields are trimmed. */
export function parseCsvLine(line: string): string[] {
  const fields: string[] = [];
  let field = '';
  let quoted = false;
  // a quote inside a quoted field: closes it unless the next char is another quote
  let quoteSeen = false;

  for (const ch of line) {
    if (quoteSeen) {
      quoteSeen = false;
      if (ch === '"') {
        field += '"';
        continue;
      }
      quoted = false;
    }

    if (quoted) {
      if (ch === '"') quoteSeen = true;
      else field += ch;
    } else if (ch === '"') {
      quoted = true;
    } else if (ch === ',') {
      fields.push(field.trim());
      field = '';
    } else {
      field += ch;
    }
  }

  fields.push(field.trim());
  return fields;
}

function resolveColumns(header: readonly string[], options: CsvLoaderOptions): Record<CandleField, Column> {
  const find = (field: CandleField): Column => {
    const name = options[OPTION_FOR[field]] ?? field;
    const index = header.indexOf(name.toLowerCase());
    if (index === -1) {
      throw new Error(`Column "${name}" not found. Available: ${header.join(', ')}`);
    }
    return { name, index };
  };

  return {
    timestamp: find('timestamp'),
    open: find('open'),
    high: find('high'),
    low: find('low'),
    close: find('close'),
    volume: find('volume'),
  };
}

/** Epoch seconds (up to 10 digits), epoch ms, or any date string Date.parse accepts */
function parseTimestamp(value: string, lineNum: number): number {
  if (value === '') throw new Error(`Line ${lineNum}: missing timestamp`);

  const num = Number(value);
  if (!Number.isNaN(num)) return value.length <= 10 ? num * 1000 : num;

  const ms = Date.parse(value);
  if (Number.isNaN(ms)) throw new Error(`Line ${lineNum}: invalid timestamp: ${value}`);
  return ms;
}

function toCandle(fields: readonly string[], columns: Record<CandleField, Column>, lineNum: number): Candle {
  const numberAt = (field: PriceField): number => {
    const { name, index } = columns[field];
    const raw = fields[index] ?? '';
    const n = Number(raw);
    if (raw === '' || !Number.isFinite(n)) {
      throw new Error(`Line ${lineNum}: invalid ${name}: ${raw}`);
    }
    return n;
  };

  const candle: Candle = {
    timestamp: parseTimestamp(fields[columns.timestamp.index] ?? '', lineNum),
    open: numberAt('open'),
    high: numberAt('high'),
    low: numberAt('low'),
    close: numberAt('close'),
    volume: numberAt('volume'),
  };

  if (candle.high < candle.low) {
    throw new Error(`Line ${lineNum}: high (${candle.high}) < low (${candle.low})`);
  }
  if (candle.open < 0 || candle.low < 0 || candle.close < 0) {
    throw new Error(`Line ${lineNum}: negative price`);
  }
  if (candle.volume < 0) {
    throw new Error(`Line ${lineNum}: negative volume`);
  }
  return candle;
}

/**
 * Candles from CSV text. Header names match case-insensitively; rows come
 * back in time order and a repeated timestamp is an error.
 */
export function parseCandlesCsv(raw: string, options: CsvLoaderOptions = {}): Candle[] {
  const [headerLine, ...rows] = raw.split(/\r?\n/).filter((l) => l.trim() !== '');
  if (headerLine === undefined || rows.length === 0) {
    throw new Error('CSV must have header + at least 1 data row');
  }

  const header = parseCsvLine(headerLine).map((h) => h.toLowerCase());
  const columns = resolveColumns(header, options);

  const seen = new Set<number>();
  const candles = rows.map((row, k) => {
    const candle = toCandle(parseCsvLine(row), columns, k + 2);
    if (seen.has(candle.timestamp)) {
      throw new Error(`Duplicate timestamp: ${candle.timestamp}`);
    }
    seen.add(candle.timestamp);
    return candle;
  });

  return candles.sort((a, b) => a.timestamp - b.timestamp);
}

export function loadCsv(filePath: string, options?: CsvLoaderOptions): Candle[] {
  return parseCandlesCsv(readFileSync(filePath, 'utf-8'), options);
}
