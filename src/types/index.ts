export type {
  TradeEventType,
  EventPosition,
  BaseTradeEvent,
  TradeOpenedEvent,
  TradeClosedEvent,
  DomainEvent,
} from './events.js';
export { compareEventPosition } from './events.js';
export type { TradeAction, OpenPosition, HistoryRecord } from './position.js';
