import type { BacktestEvent, EventType } from '../types/index.js';

type EventHandler = (event: BacktestEvent) => void;

/**
 * Typed event bus that keeps every emitted event, so a run can be replayed
 * or inspected after the fact.
 */
export class EventBus {
  private handlers: Map<EventType, EventHandler[]> = new Map();
  private log: BacktestEvent[] = [];

  on(type: EventType, handler: EventHandler): void {
    const list = this.handlers.get(type) ?? [];
    list.push(handler);
    this.handlers.set(type, list);
  }

  emit(event: BacktestEvent): void {
    this.log.push(event);
    const handlers = this.handlers.get(event.type);
    if (handlers) {
      for (const h of handlers) {
        h(event);
      }
    }
  }

  getLog(): readonly BacktestEvent[] {
    return this.log;
  }

  clearLog(): void {
    this.log = [];
  }
}
