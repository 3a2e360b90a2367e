import type { Decimal } from '../utils/decimal.js';

export type TradeAction = 'BUY' | 'SELL';

/** Live position for one token; a row exists only while amount > 0. */
export interface OpenPosition {
  tokenKey: string;
  /** Id of the TradeOpen event that originally opened this position. */
  tradeIdOnchain: string;
  avgEntryPrice: Decimal;
  amount: Decimal;
  strategy: string | null;
  trader: string;
  lastTxId: string;
}

/** Append-only trade history row, one per processed event. */
export interface HistoryRecord {
  eventUid: string;
  tradeIdOnchain: string;
  tokenKey: string;
  action: TradeAction;
  price: Decimal;
  amount: Decimal;
  avgEntryPrice: Decimal | null;
  avgExitPrice: Decimal | null;
  pnl: Decimal | null;
  strategy: string | null;
  txId: string;
  blockNumber: number;
  eventIndex: number;
  blockTimestamp: number | null;
}
