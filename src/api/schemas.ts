import { z } from 'zod';
import type { HistoryRecord, OpenPosition } from '../types/index.js';
import { toPlainString } from '../utils/decimal.js';

export const tokenParamsSchema = z.object({
  token: z.string().trim().min(1),
});

export const historyQuerySchema = z.object({
  token: z.string().trim().min(1).optional(),
  limit: z.coerce.number().int().min(1).max(500).default(50),
});

export interface PositionResponse {
  tokenAddress: string;
  tradeIdOnchain: string;
  avgEntryPrice: string;
  amount: string;
  strategy: string | null;
  trader: string;
  lastTxId: string;
}

export interface HistoryResponse {
  eventUid: string;
  tradeIdOnchain: string;
  tokenAddress: string;
  action: HistoryRecord['action'];
  price: string;
  amount: string;
  avgEntryPrice: string | null;
  avgExitPrice: string | null;
  pnl: string | null;
  strategy: string | null;
  txId: string;
  blockNumber: number;
  eventIndex: number;
  blockTimestamp: number | null;
}

function plainOrNull(value: HistoryRecord['pnl']): string | null {
  return value === null ? null : toPlainString(value);
}

export function toPositionResponse(position: OpenPosition): PositionResponse {
  return {
    tokenAddress: position.tokenKey,
    tradeIdOnchain: position.tradeIdOnchain,
    avgEntryPrice: toPlainString(position.avgEntryPrice),
    amount: toPlainString(position.amount),
    strategy: position.strategy,
    trader: position.trader,
    lastTxId: position.lastTxId,
  };
}

export function toHistoryResponse(record: HistoryRecord): HistoryResponse {
  return {
    eventUid: record.eventUid,
    tradeIdOnchain: record.tradeIdOnchain,
    tokenAddress: record.tokenKey,
    action: record.action,
    price: toPlainString(record.price),
    amount: toPlainString(record.amount),
    avgEntryPrice: plainOrNull(record.avgEntryPrice),
    avgExitPrice: plainOrNull(record.avgExitPrice),
    pnl: plainOrNull(record.pnl),
    strategy: record.strategy,
    txId: record.txId,
    blockNumber: record.blockNumber,
    eventIndex: record.eventIndex,
    blockTimestamp: record.blockTimestamp,
  };
}
