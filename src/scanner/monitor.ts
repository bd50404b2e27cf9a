import type { SignalRepository } from '../db/signal-repository.js';
import type { SetupNotifier } from '../notification/notifier.js';
import { createChildLogger } from '../logger.js';
import { AlertContext, applyTimeframeWeight } from './alert-context.js';
import { scanMarket, type ScannerDeps, type ScanResult } from './market-scanner.js';

const log = createChildLogger('monitor');

const DUPLICATE_WINDOW_HOURS = 24;

export interface ScanCycleDeps {
  readonly scanner: ScannerDeps;
  readonly signals: SignalRepository;
  readonly alerts: AlertContext;
  readonly notifier: Pick<SetupNotifier, 'notifySetup'>;
  /** applied to the unweighted score */
  readonly minConfluence: number;
  readonly now?: () => number;
}

export interface AlertedSetup {
  readonly result: ScanResult;
  readonly weightedScore: number;
  readonly signalId: number;
}

/**
 * One scan pass: qualifying setups are stored, alerted and recorded.
 * Stored duplicates, symbols on cooldown and alerts beyond the hourly cap
 * are skipped.
 */
export async function runScanCycle(
  symbols: readonly string[],
  interval: string,
  deps: ScanCycleDeps,
): Promise<AlertedSetup[]> {
  const clock = deps.now ?? Date.now;
  const results = await scanMarket(symbols, interval, deps.scanner);
  const alerted: AlertedSetup[] = [];

  for (const result of results) {
    if (result.score < deps.minConfluence) continue;

    const now = clock();
    const { symbol, setup } = result;
    if (deps.signals.isDuplicate(symbol, setup.direction, setup.entry, DUPLICATE_WINDOW_HOURS, now)) {
      log.info({ symbol, direction: setup.direction }, 'Skipping duplicate signal');
      continue;
    }
    if (!deps.alerts.canAlert(symbol, now)) {
      log.info({ symbol }, 'Alert suppressed (cooldown or hourly cap)');
      continue;
    }

    const weightedScore = applyTimeframeWeight(result.score, interval);
    const signalId = deps.signals.save({
      symbol,
      timeframe: interval,
      setup,
      score: result.score,
      reasons: result.reasons,
      patterns: result.patterns,
      createdAt: now,
    });
    deps.notifier.notifySetup(result, weightedScore);
    deps.alerts.record(symbol, now);
    deps.signals.markAlerted(signalId, now);
    alerted.push({ result, weightedScore, signalId });
  }

  log.info({ interval, setups: results.length, alerted: alerted.length }, 'Scan cycle finished');
  return alerted;
}
