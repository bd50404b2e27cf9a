import { config } from '../config.js';
import { createChildLogger } from '../logger.js';
import { TelegramNotifier } from './telegram.js';
import type { ScanResult } from '../scanner/market-scanner.js';
import { formatSetupAlert } from '../scanner/alert-format.js';

const log = createChildLogger('notifier');

/**
 * Alert hub. With Telegram disabled (or unconfigured) every call is a no-op.
 */
export class SetupNotifier {
  private readonly tg: TelegramNotifier | null;

  constructor(sink?: TelegramNotifier) {
    if (sink) {
      this.tg = sink;
    } else if (config.telegram.enabled && config.telegram.botToken && config.telegram.chatId) {
      this.tg = new TelegramNotifier({ botToken: config.telegram.botToken, chatId: config.telegram.chatId });
      log.info('Telegram notifier enabled');
    } else {
      this.tg = null;
      log.debug('Telegram notifier disabled');
    }
  }

  get enabled(): boolean {
    return this.tg !== null;
  }

  notifySetup(result: ScanResult, weightedScore: number): void {
    this.send(formatSetupAlert(result, weightedScore));
  }

  notifyScanSummary(interval: string, scanned: number, alerted: number): void {
    this.send(`🔎 <b>Scan ${interval}</b>\nSymbols: ${scanned}\nAlerts: ${alerted}`);
  }

  flush(): Promise<void> {
    return this.tg ? this.tg.flush() : Promise.resolve();
  }

  private send(text: string): void {
    if (!this.tg) return;
    try {
      this.tg.send(text);
    } catch (err) {
      log.warn({ err }, 'Notifier send error');
    }
  }
}
