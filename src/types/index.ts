export type { Candle } from './candle.js';
export type { IndicatorBar } from './indicator.js';
export type { Direction, TradeSetup, SetupFilters, SetupResult } from './setup.js';
export { NO_FILTERS } from './setup.js';
export type { Position, EngineState } from './position.js';
export type {
  ExitReason,
  ClosedTrade,
  EquityPoint,
  Metrics,
  BacktestResult,
} from './report.js';
export type {
  EventType,
  BaseEvent,
  PositionOpenedEvent,
  DcaFilledEvent,
  StopUpdatedEvent,
  PositionClosedEvent,
  BacktestEvent,
} from './event.js';
