import type { Position } from './position.js';
import type { ClosedTrade } from './report.js';

export type EventType =
  | 'POSITION_OPENED'
  | 'DCA_FILLED'
  | 'STOP_UPDATED'
  | 'POSITION_CLOSED';

export interface BaseEvent {
  readonly type: EventType;
  readonly timestamp: number;
  readonly barIndex: number;
}

export interface PositionOpenedEvent extends BaseEvent {
  readonly type: 'POSITION_OPENED';
  readonly position: Position;
}

export interface DcaFilledEvent extends BaseEvent {
  readonly type: 'DCA_FILLED';
  readonly price: number;
  readonly addedSize: number;
  readonly newEntryPrice: number;
  readonly newSize: number;
  readonly levelsLeft: number;
}

export interface StopUpdatedEvent extends BaseEvent {
  readonly type: 'STOP_UPDATED';
  readonly previousStop: number;
  readonly stopLoss: number;
  readonly extremePrice: number;
}

export interface PositionClosedEvent extends BaseEvent {
  readonly type: 'POSITION_CLOSED';
  readonly trade: ClosedTrade;
}

export type BacktestEvent =
  | PositionOpenedEvent
  | DcaFilledEvent
  | StopUpdatedEvent
  | PositionClosedEvent;
