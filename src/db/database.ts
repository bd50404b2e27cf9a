import { mkdirSync } from 'node:fs';
import path from 'node:path';
import Database from 'better-sqlite3';
import { config } from '../config.js';
import { createChildLogger } from '../logger.js';

const log = createChildLogger('db');

export type Db = Database.Database;

let _db: Db | null = null;

/**
 * Open (or create) a database and ensure the schema. `:memory:` is accepted.
 */
export function openDb(dbPath: string): Db {
  if (dbPath !== ':memory:') {
    mkdirSync(path.dirname(dbPath), { recursive: true });
  }
  const db = new Database(dbPath);
  db.pragma('journal_mode = WAL');
  db.pragma('synchronous = NORMAL');
  initSchema(db);
  return db;
}

export function getDb(): Db {
  if (!_db) {
    _db = openDb(config.db.path);
    log.info({ path: config.db.path }, 'Database initialized');
  }
  return _db;
}

export function closeDb(): void {
  if (_db) {
    _db.close();
    _db = null;
  }
}

function initSchema(db: Db): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS backtest_results (
      id               INTEGER PRIMARY KEY AUTOINCREMENT,
      created_at       INTEGER NOT NULL,
      symbol           TEXT NOT NULL,
      timeframe        TEXT NOT NULL,
      start_time       INTEGER NOT NULL,
      end_time         INTEGER NOT NULL,
      total_trades     INTEGER NOT NULL,
      winning_trades   INTEGER NOT NULL,
      losing_trades    INTEGER NOT NULL,
      win_rate         REAL NOT NULL,
      total_pnl        REAL NOT NULL,
      max_drawdown     REAL NOT NULL,
      max_drawdown_pct REAL NOT NULL,
      profit_factor    REAL NOT NULL,
      parameters       TEXT NOT NULL
    );

    CREATE TABLE IF NOT EXISTS signals (
      id                 INTEGER PRIMARY KEY AUTOINCREMENT,
      created_at         INTEGER NOT NULL,
      symbol             TEXT NOT NULL,
      timeframe          TEXT NOT NULL,
      direction          TEXT NOT NULL,
      signal             TEXT NOT NULL,
      entry_price        REAL NOT NULL,
      stop_loss          REAL NOT NULL,
      take_profit        REAL NOT NULL,
      dca_1              REAL NOT NULL,
      dca_2              REAL NOT NULL,
      dca_3              REAL NOT NULL,
      confluence_score   INTEGER NOT NULL,
      confluence_reasons TEXT NOT NULL,
      chart_patterns     TEXT NOT NULL DEFAULT '[]',
      status             TEXT NOT NULL DEFAULT 'NEW',
      alerted_at         INTEGER
    );

    CREATE TABLE IF NOT EXISTS trades (
      id          INTEGER PRIMARY KEY AUTOINCREMENT,
      signal_id   INTEGER REFERENCES signals(id),
      symbol      TEXT NOT NULL,
      direction   TEXT NOT NULL,
      entry_time  INTEGER NOT NULL,
      entry_price REAL NOT NULL,
      exit_time   INTEGER,
      exit_price  REAL,
      quantity    REAL,
      pnl         REAL,
      pnl_pct     REAL,
      outcome     TEXT,
      notes       TEXT
    );

    CREATE INDEX IF NOT EXISTS idx_backtest_symbol_tf ON backtest_results(symbol, timeframe);
    CREATE INDEX IF NOT EXISTS idx_signals_symbol_ts ON signals(symbol, created_at);
    CREATE INDEX IF NOT EXISTS idx_trades_symbol_entry ON trades(symbol, entry_time);
  `);
}
