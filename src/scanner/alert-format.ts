import type { ScanResult } from './market-scanner.js';

const MAX_REASONS = 8;

export function escapeHtml(text: string): string {
  return text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');
}

export function starRating(score: number): string {
  if (score >= 95) return '⭐⭐⭐⭐⭐';
  if (score >= 85) return '⭐⭐⭐⭐';
  if (score >= 75) return '⭐⭐⭐';
  if (score >= 65) return '⭐⭐';
  return '⭐';
}

/** "1:2.00", or "N/A" when the stop is on the wrong side */
export function riskReward(r: ScanResult): string {
  const { direction, entry, stopLoss, takeProfit } = r.setup;
  const risk = direction === 'LONG' ? entry - stopLoss : stopLoss - entry;
  const reward = direction === 'LONG' ? takeProfit - entry : entry - takeProfit;
  return risk > 0 ? `1:${(reward / risk).toFixed(2)}` : 'N/A';
}

function price(p: number): string {
  return p.toFixed(5);
}

function pctFrom(entry: number, p: number): string {
  return `${(((p - entry) / entry) * 100).toFixed(2)}%`;
}

/**
 * Telegram (HTML parse mode) message for a scanned setup.
 */
export function formatSetupAlert(r: ScanResult, weightedScore: number = r.score): string {
  const s = r.setup;
  const icon = s.direction === 'LONG' ? '🟢' : '🔴';
  const lines = [
    `${icon} <b>${escapeHtml(r.symbol)}</b> | <b>${escapeHtml(r.timeframe)}</b>`,
    `Type: <b>${s.direction}</b> (${escapeHtml(s.signal)})`,
    `Confluence: <b>${r.score.toFixed(0)}%</b> (weighted ${weightedScore.toFixed(0)}%) ${starRating(weightedScore)}`,
    '',
    '<b>Entry zone</b>',
    `Entry: $${price(s.entry)}`,
    `Stop Loss: $${price(s.stopLoss)} (${pctFrom(s.entry, s.stopLoss)})`,
    `Take Profit: $${price(s.takeProfit)} (${pctFrom(s.entry, s.takeProfit)})`,
    `R:R: ${riskReward(r)}`,
    '',
    '<b>DCA levels</b>',
    ...s.dcaLevels.map((d, i) => `${i + 1}. $${price(d)}`),
  ];
  if (r.reasons.length > 0) {
    lines.push('', '<b>Confluence</b>');
    for (const reason of r.reasons.slice(0, MAX_REASONS)) {
      lines.push(`• ${escapeHtml(reason)}`);
    }
  }
  return lines.join('\n');
}
