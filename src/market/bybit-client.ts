import { request, type Dispatcher } from 'undici';
import type { Candle } from '../types/index.js';
import { config } from '../config.js';
import { MarketDataError } from '../errors.js';
import { createChildLogger } from '../logger.js';
import { KLINE_CATEGORY, MAX_KLINE_LIMIT, PUBLIC_KLINE, toBybitInterval } from './endpoints.js';
import { klineResponseSchema } from './schemas.js';

const log = createChildLogger('bybit');

export interface BybitClientOptions {
  readonly baseUrl?: string;
  readonly maxRetries?: number;
  readonly timeoutMs?: number;
  readonly retryBaseMs?: number;
  /** undici dispatcher; tests pass a MockAgent */
  readonly dispatcher?: Dispatcher;
}

export type KlineFetcher = (symbol: string, interval: string, limit: number) => Promise<Candle[]>;

function isRetryableStatus(status: number): boolean {
  return status === 429 || status >= 500;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Public kline client. 429/5xx/network failures are retried with
 * exponential backoff; API-level errors (retCode ≠ 0) and malformed
 * payloads are not.
 */
export class BybitClient {
  private readonly baseUrl: string;
  private readonly maxRetries: number;
  private readonly timeoutMs: number;
  private readonly retryBaseMs: number;
  private readonly dispatcher: Dispatcher | undefined;

  constructor(options: BybitClientOptions = {}) {
    this.baseUrl = options.baseUrl ?? config.bybit.restBaseUrl;
    this.maxRetries = options.maxRetries ?? config.bybit.maxRetries;
    this.timeoutMs = options.timeoutMs ?? config.bybit.timeoutMs;
    this.retryBaseMs = options.retryBaseMs ?? 1000;
    this.dispatcher = options.dispatcher;
  }

  /**
   * Candles oldest first. The last one is usually still forming.
   */
  async fetchKlines(symbol: string, interval: string, limit = 200): Promise<Candle[]> {
    const url = new URL(PUBLIC_KLINE, this.baseUrl);
    url.searchParams.set('category', KLINE_CATEGORY);
    url.searchParams.set('symbol', symbol);
    url.searchParams.set('interval', toBybitInterval(interval));
    url.searchParams.set('limit', String(Math.min(Math.max(1, Math.floor(limit)), MAX_KLINE_LIMIT)));

    const raw = await this.getJson(symbol, url);
    const parsed = klineResponseSchema.safeParse(raw);
    if (!parsed.success) {
      log.warn({ symbol, issues: parsed.error.issues.length }, 'Kline response validation failed');
      throw new MarketDataError(symbol, `invalid kline response: ${parsed.error.message}`);
    }

    const { retCode, retMsg, result } = parsed.data;
    if (retCode !== 0) {
      throw new MarketDataError(symbol, `Bybit error ${retCode}: ${retMsg}`);
    }
    const list = result?.list;
    if (!list) {
      throw new MarketDataError(symbol, 'kline list missing from response');
    }

    // newest first on the wire
    return list
      .map(([timestamp, open, high, low, close, volume]) => ({ timestamp, open, high, low, close, volume }))
      .reverse();
  }

  /** Bound `fetchKlines` for callers that take a plain function */
  get fetcher(): KlineFetcher {
    return (symbol, interval, limit) => this.fetchKlines(symbol, interval, limit);
  }

  private async getJson(symbol: string, url: URL): Promise<unknown> {
    let lastError: Error | null = null;

    for (let attempt = 0; attempt <= this.maxRetries; attempt++) {
      const delay = this.retryBaseMs * Math.pow(2, attempt);
      try {
        const { statusCode, body } = await request(url, {
          method: 'GET',
          headers: { Accept: 'application/json' },
          bodyTimeout: this.timeoutMs,
          headersTimeout: this.timeoutMs,
          ...(this.dispatcher ? { dispatcher: this.dispatcher } : {}),
        });

        if (statusCode === 200) {
          return await body.json();
        }
        await body.text();

        lastError = new MarketDataError(symbol, `HTTP ${statusCode}`);
        if (!isRetryableStatus(statusCode)) throw lastError;
        if (attempt < this.maxRetries) {
          log.warn({ symbol, statusCode, attempt, delay }, 'Retryable status, backing off');
          await sleep(delay);
        }
      } catch (err) {
        if (err instanceof MarketDataError) throw err;
        lastError = err instanceof Error ? err : new Error(String(err));
        if (attempt < this.maxRetries) {
          log.warn({ symbol, attempt, delay, err: lastError.message }, 'Request failed, retrying');
          await sleep(delay);
        }
      }
    }

    throw new MarketDataError(symbol, `request failed after ${this.maxRetries + 1} attempts`, {
      cause: lastError,
    });
  }
}
