import { vi } from 'vitest';
import { loadConfig, type ScalingConfig } from '../config/env.js';
import type { Container } from '../infra/container.js';
import type { Logger } from '../infra/logger.js';
import { MemoryLedgerStore } from '../modules/persistence/memory-ledger-store.js';
import type { Alert } from '../services/alert-sink.js';
import type { RawEvent } from '../modules/event-source/event-source.service.js';
import type { TradeClosedEvent, TradeOpenedEvent } from '../types/index.js';
import { Decimal } from '../utils/decimal.js';

export const TOKEN_A = 'TBXSw8fM4jpQkGc6zZjsVABFpVN7UvXPdV';
export const TOKEN_A_HEX = '411111111111111111111111111111111111111111';
export const TOKEN_B = 'TEdvoHEatmDKvTh3o9vBRB9Vdtbhn4QFhy';
export const TOKEN_B_HEX = '413333333333333333333333333333333333333333';
export const TRADER = 'TD5gsCwxykWsLN9aPrq2TAfNjByuZKYp4E';
export const TRADER_HEX = '412222222222222222222222222222222222222222';
export const CONTRACT = 'TGCAjMXComunWZEXCT1LPBdcYbDVuyexBv';

export const scaling: ScalingConfig = {
  priceScale: new Decimal(1_000_000),
  defaultDecimals: 6,
  decimalsByToken: {},
  addressEncoding: 'hex',
};

export function createMockLogger(): Logger {
  const logger = {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
    fatal: vi.fn(),
    child: vi.fn(),
  };
  logger.child.mockReturnValue(logger);
  return logger as unknown as Logger;
}

export function createAlertSink() {
  return { send: vi.fn<(alert: Alert) => Promise<void>>().mockResolvedValue(undefined) };
}

export function createTestContainer(overrides: Partial<Container> = {}): Container {
  return {
    config: loadConfig({ CONTRACT_ADDRESS: CONTRACT, LOG_LEVEL: 'silent', NODE_ENV: 'test' }),
    logger: createMockLogger(),
    store: new MemoryLedgerStore(),
    alerts: createAlertSink(),
    ...overrides,
  };
}

interface RawTradeOptions {
  tx?: string;
  block?: number;
  index?: number;
  tradeId?: string;
  token?: string;
  /** Raw fixed-point price, already multiplied by the price scale. */
  price?: string;
  /** Raw integer amount in token base units. */
  amount?: string;
  action?: string;
  strategy?: string;
  pnl?: string;
}

export function rawTradeOpen(options: RawTradeOptions = {}): RawEvent {
  const result: Record<string, unknown> = {
    tradeId: options.tradeId ?? '1',
    trader: TRADER,
    tokenAddress: options.token ?? TOKEN_A,
    entryPrice: options.price ?? '10000000',
    amount: options.amount ?? '5000000',
  };
  if (options.action !== undefined) result['action'] = options.action;
  if (options.strategy !== undefined) result['strategy'] = options.strategy;

  return {
    transaction_id: options.tx ?? 'tx-open',
    block_number: options.block ?? 100,
    block_timestamp: 1_700_000_000_000,
    event_index: options.index ?? 0,
    event_name: 'TradeOpen',
    result,
  };
}

export function rawTradeClosed(options: RawTradeOptions = {}): RawEvent {
  return {
    transaction_id: options.tx ?? 'tx-close',
    block_number: options.block ?? 200,
    block_timestamp: 1_700_000_060_000,
    event_index: options.index ?? 0,
    event_name: 'TradeClosed',
    result: {
      tradeId: options.tradeId ?? '1',
      trader: TRADER,
      tokenAddress: options.token ?? TOKEN_A,
      exitPrice: options.price ?? '16000000',
      pnl: options.pnl ?? '30000000',
    },
  };
}

interface EventOptions {
  uid?: string;
  block?: number;
  index?: number;
  tradeId?: string;
  token?: string;
  decimals?: number;
  price?: string;
  amount?: string | null;
  strategy?: string | null;
  reportedPnl?: string | null;
}

export function openEvent(options: EventOptions = {}): TradeOpenedEvent {
  return {
    type: 'TRADE_OPENED',
    eventUid: options.uid ?? 'uid-open',
    eventName: 'TradeOpen',
    txId: `tx-${options.uid ?? 'open'}`,
    blockNumber: options.block ?? 100,
    eventIndex: options.index ?? 0,
    blockTimestamp: null,
    tradeId: options.tradeId ?? '1',
    trader: TRADER_HEX,
    token: options.token ?? TOKEN_A_HEX,
    tokenDecimals: options.decimals ?? 6,
    price: new Decimal(options.price ?? '10'),
    strategy: options.strategy === undefined ? 'sma' : options.strategy,
    amount: new Decimal(options.amount ?? '5'),
  };
}

export function closedEvent(options: EventOptions = {}): TradeClosedEvent {
  const amount = options.amount === undefined ? null : options.amount;
  const reportedPnl = options.reportedPnl === undefined ? null : options.reportedPnl;
  return {
    type: 'TRADE_CLOSED',
    eventUid: options.uid ?? 'uid-close',
    eventName: amount === null ? 'TradeClosed' : 'TradeOpen',
    txId: `tx-${options.uid ?? 'close'}`,
    blockNumber: options.block ?? 200,
    eventIndex: options.index ?? 0,
    blockTimestamp: null,
    tradeId: options.tradeId ?? '2',
    trader: TRADER_HEX,
    token: options.token ?? TOKEN_A_HEX,
    tokenDecimals: options.decimals ?? 6,
    price: new Decimal(options.price ?? '16'),
    strategy: options.strategy === undefined ? null : options.strategy,
    amount: amount === null ? null : new Decimal(amount),
    reportedPnl: reportedPnl === null ? null : new Decimal(reportedPnl),
  };
}
