/**
 * Bybit v5 public REST endpoints. Only these constants build request URLs.
 */

export const BYBIT_REST_BASE = 'https://api.bybit.com';

/** GET kline: category, symbol, interval and limit (max 1000) */
export const PUBLIC_KLINE = '/v5/market/kline';

/** USDT perpetuals */
export const KLINE_CATEGORY = 'linear';

export const MAX_KLINE_LIMIT = 1000;

const INTERVALS: Record<string, string> = {
  '5m': '5',
  '15m': '15',
  '1h': '60',
  '2h': '120',
  '4h': '240',
  '1d': 'D',
};

export const SUPPORTED_INTERVALS = Object.keys(INTERVALS);

/** Unknown values pass through as raw Bybit codes */
export function toBybitInterval(interval: string): string {
  return INTERVALS[interval] ?? interval;
}
