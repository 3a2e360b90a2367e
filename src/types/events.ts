import type { Decimal } from '../utils/decimal.js';

export type TradeEventType = 'TRADE_OPENED' | 'TRADE_CLOSED';

export interface EventPosition {
  blockNumber: number;
  eventIndex: number;
}

export interface BaseTradeEvent extends EventPosition {
  type: TradeEventType;
  eventUid: string;
  eventName: string;
  txId: string;
  blockTimestamp: number | null;
  tradeId: string;
  trader: string;
  /** Token address in the configured persisted encoding. */
  token: string;
  tokenDecimals: number;
  price: Decimal;
  strategy: string | null;
}

/** BUY: opens or adds to the token's position. */
export interface TradeOpenedEvent extends BaseTradeEvent {
  type: 'TRADE_OPENED';
  amount: Decimal;
}

/** SELL: partial close when amount is set, otherwise closes everything. */
export interface TradeClosedEvent extends BaseTradeEvent {
  type: 'TRADE_CLOSED';
  amount: Decimal | null;
  reportedPnl: Decimal | null;
}

export type DomainEvent = TradeOpenedEvent | TradeClosedEvent;

export function compareEventPosition(a: EventPosition, b: EventPosition): number {
  return a.blockNumber - b.blockNumber || a.eventIndex - b.eventIndex;
}
