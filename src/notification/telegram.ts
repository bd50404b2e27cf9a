import { createChildLogger } from '../logger.js';

const log = createChildLogger('telegram');

export interface TelegramOptions {
  readonly botToken: string;
  readonly chatId: string;
  readonly apiBase?: string;
  /** gap between queued messages */
  readonly intervalMs?: number;
}

/**
 * Telegram Bot API sender.
 * - queued, one message per second
 * - failures are logged only
 */
export class TelegramNotifier {
  private readonly botToken: string;
  private readonly chatId: string;
  private readonly apiBase: string;
  private readonly intervalMs: number;
  private readonly queue: string[] = [];
  private processing = false;
  private drained: Promise<void> = Promise.resolve();

  constructor(options: TelegramOptions) {
    this.botToken = options.botToken;
    this.chatId = options.chatId;
    this.apiBase = options.apiBase ?? 'https://api.telegram.org';
    this.intervalMs = options.intervalMs ?? 1000;
  }

  send(text: string): void {
    this.queue.push(text);
    if (!this.processing) {
      this.drained = this.processQueue();
    }
  }

  /** Resolves once the queue is empty */
  flush(): Promise<void> {
    return this.drained;
  }

  private async processQueue(): Promise<void> {
    this.processing = true;
    while (this.queue.length > 0) {
      const msg = this.queue.shift();
      if (msg === undefined) break;
      try {
        await this.doSend(msg);
      } catch (err) {
        log.warn({ err }, 'Telegram send failed');
      }
      if (this.queue.length > 0) {
        await new Promise((r) => setTimeout(r, this.intervalMs));
      }
    }
    this.processing = false;
  }

  private async doSend(text: string): Promise<void> {
    const url = `${this.apiBase}/bot${this.botToken}/sendMessage`;
    const res = await fetch(url, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ chat_id: this.chatId, text, parse_mode: 'HTML' }),
    });
    if (!res.ok) {
      const body = await res.text().catch(() => '');
      log.warn({ status: res.status, body }, 'Telegram API error');
    }
  }
}
