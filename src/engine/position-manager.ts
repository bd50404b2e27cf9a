import type {
  Candle,
  ClosedTrade,
  Direction,
  EngineState,
  ExitReason,
  Position,
  TradeSetup,
} from '../types/index.js';
import type { EventBus } from './event-bus.js';

export interface ExitSignal {
  readonly price: number;
  readonly reason: Extract<ExitReason, 'STOP_LOSS' | 'TAKE_PROFIT'>;
}

const FLAT: EngineState = { kind: 'FLAT' };

/** Same formula for realized and unrealized PnL */
export function calcPnl(direction: Direction, entryPrice: number, exitPrice: number, size: number): number {
  return direction === 'LONG'
    ? (size * (exitPrice - entryPrice)) / entryPrice
    : (size * (entryPrice - exitPrice)) / entryPrice;
}

/**
 * One-position rule, DCA ladder and stop management.
 * Only raw OHLC is read here; indicator values never affect an open position.
 */
export class PositionManager {
  private state: EngineState = FLAT;
  private readonly bus: EventBus;

  constructor(bus: EventBus) {
    this.bus = bus;
  }

  get hasPosition(): boolean {
    return this.state.kind === 'OPEN';
  }

  get engineState(): EngineState {
    return this.state;
  }

  get current(): Position | null {
    return this.state.kind === 'OPEN'
      ? { ...this.state.position, dcaLevels: [...this.state.position.dcaLevels] }
      : null;
  }

  open(setup: TradeSetup, bar: Candle, barIndex: number, size: number, useDca: boolean): Position {
    if (this.state.kind === 'OPEN') {
      throw new Error('Already in position: one position at a time');
    }
    if (!(size > 0)) {
      throw new Error(`Position size must be > 0, got ${size}`);
    }

    const position: Position = {
      direction: setup.direction,
      entryTime: bar.timestamp,
      entryPrice: setup.entry,
      size,
      initialSize: size,
      stopLoss: setup.stopLoss,
      takeProfit: setup.takeProfit,
      dcaLevels: useDca ? [...setup.dcaLevels] : [],
      extremePrice: setup.direction === 'LONG' ? bar.high : bar.low,
      signal: setup.signal,
    };
    this.state = { kind: 'OPEN', position };

    this.bus.emit({
      type: 'POSITION_OPENED',
      timestamp: bar.timestamp,
      barIndex,
      position: { ...position, dcaLevels: [...position.dcaLevels] },
    });
    return position;
  }

  /**
   * Track the best price since entry and pull the stop behind it.
   * The stop only ever moves in the position's favour.
   */
  updateTrailingStop(bar: Candle, barIndex: number, trailingPct: number): void {
    if (this.state.kind !== 'OPEN') return;
    const pos = this.state.position;
    const previousStop = pos.stopLoss;

    if (pos.direction === 'LONG') {
      pos.extremePrice = Math.max(pos.extremePrice, bar.high);
      const candidate = pos.extremePrice * (1 - trailingPct / 100);
      if (candidate > pos.stopLoss) pos.stopLoss = candidate;
    } else {
      pos.extremePrice = Math.min(pos.extremePrice, bar.low);
      const candidate = pos.extremePrice * (1 + trailingPct / 100);
      if (candidate < pos.stopLoss) pos.stopLoss = candidate;
    }

    if (pos.stopLoss !== previousStop) {
      this.bus.emit({
        type: 'STOP_UPDATED',
        timestamp: bar.timestamp,
        barIndex,
        previousStop,
        stopLoss: pos.stopLoss,
        extremePrice: pos.extremePrice,
      });
    }
  }

  /**
   * Fill the front DCA level if the bar reached it: adds `initialSize`
   * at the level price and re-averages the entry. At most one per bar.
   * @returns true when a level was filled
   */
  applyDca(bar: Candle, barIndex: number): boolean {
    if (this.state.kind !== 'OPEN') return false;
    const pos = this.state.position;
    const level = pos.dcaLevels[0];
    if (level === undefined) return false;

    const touched = pos.direction === 'LONG' ? bar.low <= level : bar.high >= level;
    if (!touched) return false;

    const added = pos.initialSize;
    const newSize = pos.size + added;
    pos.entryPrice = (pos.entryPrice * pos.size + level * added) / newSize;
    pos.size = newSize;
    pos.dcaLevels.shift();

    this.bus.emit({
      type: 'DCA_FILLED',
      timestamp: bar.timestamp,
      barIndex,
      price: level,
      addedSize: added,
      newEntryPrice: pos.entryPrice,
      newSize,
      levelsLeft: pos.dcaLevels.length,
    });
    return true;
  }

  /**
   * Stop-loss is checked before take-profit: when a single bar spans both,
   * the intrabar path is unknown and the loss is assumed.
   */
  checkExit(bar: Candle): ExitSignal | null {
    if (this.state.kind !== 'OPEN') return null;
    const pos = this.state.position;

    if (pos.direction === 'LONG') {
      if (bar.low <= pos.stopLoss) return { price: pos.stopLoss, reason: 'STOP_LOSS' };
      if (bar.high >= pos.takeProfit) return { price: pos.takeProfit, reason: 'TAKE_PROFIT' };
    } else {
      if (bar.high >= pos.stopLoss) return { price: pos.stopLoss, reason: 'STOP_LOSS' };
      if (bar.low <= pos.takeProfit) return { price: pos.takeProfit, reason: 'TAKE_PROFIT' };
    }
    return null;
  }

  close(
    exitTime: number,
    exitPrice: number,
    reason: ExitReason,
    barIndex: number,
    capitalBefore: number,
  ): ClosedTrade {
    if (this.state.kind !== 'OPEN') {
      throw new Error('No position to close');
    }
    const pos = this.state.position;
    const pnl = calcPnl(pos.direction, pos.entryPrice, exitPrice, pos.size);

    const trade: ClosedTrade = {
      entryTime: pos.entryTime,
      exitTime,
      direction: pos.direction,
      entryPrice: pos.entryPrice,
      exitPrice,
      exitReason: reason,
      size: pos.size,
      pnl,
      pnlPct: (pnl / pos.size) * 100,
      capitalAfter: capitalBefore + pnl,
      signal: pos.signal,
    };

    this.state = FLAT;
    this.bus.emit({ type: 'POSITION_CLOSED', timestamp: exitTime, barIndex, trade });
    return trade;
  }

  unrealizedPnl(price: number): number {
    if (this.state.kind !== 'OPEN') return 0;
    const pos = this.state.position;
    return calcPnl(pos.direction, pos.entryPrice, price, pos.size);
  }

  reset(): void {
    this.state = FLAT;
  }
}
