import dotenv from 'dotenv';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

const __dirname = path.dirname(fileURLToPath(import.meta.url));
// Project-root .env first, then the cwd one (overrides nothing already set)
dotenv.config({ path: path.join(__dirname, '..', '.env') });
dotenv.config();

function env(key: string, fallback: string): string {
  return process.env[key] ?? fallback;
}

function envNum(key: string, fallback: number): number {
  const v = process.env[key];
  return v !== undefined && v !== '' ? Number(v) : fallback;
}

function envOptionalNum(key: string): number | undefined {
  const v = process.env[key];
  return v !== undefined && v !== '' ? Number(v) : undefined;
}

function envBool(key: string, fallback: boolean): boolean {
  const v = process.env[key];
  return v !== undefined && v !== '' ? v === 'true' : fallback;
}

function envList(key: string, fallback: string[]): string[] {
  const v = process.env[key];
  if (v === undefined || v.trim() === '') return fallback;
  return v.split(',').map((s) => s.trim().toUpperCase()).filter((s) => s.length > 0);
}

export const config = {
  backtest: {
    initialCapital: envNum('INITIAL_CAPITAL', 10_000),
    /** percent of current capital per new position (1~100) */
    positionSizePct: envNum('POSITION_SIZE_PCT', 100),
    useDca: envBool('USE_DCA', false),
    /** e.g. 1.0 = 1% trailing stop; unset disables trailing */
    trailingStopPct: envOptionalNum('TRAILING_STOP_PCT'),
    useTrendFilter: envBool('USE_TREND_FILTER', false),
    useVolumeFilter: envBool('USE_VOLUME_FILTER', false),
    useAdxFilter: envBool('USE_ADX_FILTER', false),
    useMacdFilter: envBool('USE_MACD_FILTER', false),
  },

  scanner: {
    symbols: envList('SCAN_SYMBOLS', ['BTCUSDT', 'ETHUSDT', 'SOLUSDT', 'XRPUSDT']),
    interval: env('SCAN_INTERVAL', '1h'),
    lookback: envNum('SCAN_LOOKBACK', 200),
    useClosedCandles: envBool('SCAN_CLOSED_CANDLES', true),
    minConfluence: envNum('MIN_CONFLUENCE', 60),
  },

  alerts: {
    maxPerHour: envNum('MAX_ALERTS_PER_HOUR', 10),
    cooldownMinutes: envNum('ALERT_COOLDOWN_MINUTES', 120),
  },

  bybit: {
    restBaseUrl: env('BYBIT_BASE_URL', 'https://api.bybit.com'),
    maxRetries: envNum('BYBIT_MAX_RETRIES', 3),
    timeoutMs: envNum('BYBIT_TIMEOUT_MS', 10_000),
  },

  db: {
    path: env('DB_PATH', './data/research.db'),
  },

  log: {
    level: env('LOG_LEVEL', 'info'),
  },

  telegram: {
    enabled: env('TELEGRAM_ENABLED', 'false') === 'true',
    botToken: env('TELEGRAM_BOT_TOKEN', ''),
    chatId: env('TELEGRAM_CHAT_ID', ''),
  },
} as const;
