import type { BacktestResult } from '../types/index.js';

/**
 * Console report (no external table dependency)
 */
export function formatReport(result: BacktestResult, title = 'BACKTEST REPORT'): string {
  const m = result.metrics;
  const lines: string[] = [];

  lines.push('');
  lines.push('═══════════════════════════════════════════');
  lines.push(`          ${title}`);
  lines.push('═══════════════════════════════════════════');
  lines.push('');

  lines.push(formatSection('Performance', [
    ['Total Return', `${formatUsd(m.totalReturn)} (${m.totalReturnPct.toFixed(2)}%)`],
    ['Max Drawdown', `${formatUsd(m.maxDrawdown)} (${m.maxDrawdownPct.toFixed(2)}%)`],
    ['Profit Factor', m.profitFactor.toFixed(2)],
    ['Expectancy', formatUsd(m.expectancy)],
  ]));

  lines.push(formatSection('Trades', [
    ['Total Trades', String(m.totalTrades)],
    ['Win Rate', `${m.winRate.toFixed(1)}%`],
    ['Wins / Losses', `${m.winningTrades} / ${m.losingTrades}`],
    ['Avg Win', formatUsd(m.avgWin)],
    ['Avg Loss', formatUsd(m.avgLoss)],
    ['Largest Win', formatUsd(m.largestWin)],
    ['Largest Loss', formatUsd(m.largestLoss)],
    ['Avg Duration', `${m.avgTradeDurationHours.toFixed(1)}h`],
    ['Max Consec. Losses', String(m.maxConsecutiveLosses)],
  ]));

  lines.push(formatSection('Capital', [
    ['Start Capital', formatUsd(result.initialCapital)],
    ['End Capital', formatUsd(result.finalCapital)],
  ]));

  if (result.providerErrors > 0) {
    lines.push(`  ! setup provider failed on ${result.providerErrors} bar(s)`);
    lines.push('');
  }
  if (result.skippedEntries > 0) {
    lines.push(`  ! ${result.skippedEntries} setup(s) skipped with no capital left`);
    lines.push('');
  }
  return lines.join('\n');
}

function formatSection(title: string, rows: [string, string][]): string {
  const lines: string[] = [];
  lines.push(`── ${title} ${'─'.repeat(38 - title.length)}`);
  for (const [key, value] of rows) {
    lines.push(`  ${key.padEnd(22)} ${value}`);
  }
  lines.push('');
  return lines.join('\n');
}

export function formatUsd(value: number): string {
  const sign = value < 0 ? '-' : '';
  const abs = Math.abs(value);
  if (abs >= 1_000_000) {
    return `${sign}$${(abs / 1_000_000).toFixed(2)}M`;
  }
  return `${sign}$${abs.toFixed(2)}`;
}

/**
 * Trade list table
 */
export function formatTrades(result: BacktestResult): string {
  if (result.trades.length === 0) return 'No trades.';

  const lines: string[] = [];
  lines.push('  #   Dir   Entry Date       Exit Date        Entry Price   Exit Price     PnL%     Exit');
  lines.push('  ─── ───── ──────────────── ──────────────── ──────────── ──────────── ──────── ───────────');

  result.trades.forEach((t, i) => {
    const num = String(i + 1).padStart(3);
    const dir = t.direction.padEnd(5);
    const entry = formatDate(t.entryTime);
    const exit = formatDate(t.exitTime);
    const ep = formatPrice(t.entryPrice).padStart(12);
    const xp = formatPrice(t.exitPrice).padStart(12);
    const pnl = `${t.pnlPct >= 0 ? '+' : ''}${t.pnlPct.toFixed(2)}%`.padStart(8);
    lines.push(`  ${num} ${dir} ${entry} ${exit} ${ep} ${xp} ${pnl} ${t.exitReason}`);
  });

  return lines.join('\n');
}

/** More decimals for low-priced coins */
function formatPrice(price: number): string {
  return price >= 1 ? price.toFixed(2) : price.toFixed(5);
}

function formatDate(ms: number): string {
  return new Date(ms).toISOString().slice(0, 16).replace('T', ' ');
}
