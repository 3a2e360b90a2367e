import { createHash } from 'node:crypto';
import type { ScalingConfig } from '../../config/env.js';
import { DecodeError, ParseError } from '../../infra/errors.js';
import type {
  DomainEvent,
  TradeAction,
  TradeClosedEvent,
  TradeOpenedEvent,
} from '../../types/index.js';
import { Decimal, SCALED_DP, quantize } from '../../utils/decimal.js';
import { err, ok, type Result } from '../../utils/result.js';
import { canonicalize, type TronAddress } from '../address/address.js';
import type { RawEvent } from '../event-source/event-source.service.js';

export const TRADE_OPEN = 'TradeOpen';
export const TRADE_CLOSED = 'TradeClosed';

export type ParseFailure = ParseError | DecodeError;

const INTEGER_RE = /^-?\d+$/;

function compareKeys(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

function asciiJson(value: unknown): string {
  return (JSON.stringify(value) ?? 'null').replace(
    /[\u0080-\uffff]/g,
    (ch) => `\\u${ch.charCodeAt(0).toString(16).padStart(4, '0')}`,
  );
}

/**
 * Compact JSON with object keys sorted at every level and non-ASCII
 * characters escaped, so equal payloads always serialize to equal bytes.
 */
export function canonicalJson(value: unknown): string {
  if (Array.isArray(value)) {
    return `[${value.map(canonicalJson).join(',')}]`;
  }
  if (value !== null && typeof value === 'object') {
    const entries = Object.entries(value)
      .filter(([, v]) => v !== undefined)
      .sort(([a], [b]) => compareKeys(a, b));
    return `{${entries.map(([k, v]) => `${asciiJson(k)}:${canonicalJson(v)}`).join(',')}}`;
  }
  return asciiJson(value);
}

function readInteger(
  result: Record<string, unknown>,
  field: string,
  eventName: string,
): Result<bigint, ParseError> {
  const value = result[field];
  if (typeof value === 'number' && Number.isSafeInteger(value)) {
    return ok(BigInt(value));
  }
  if (typeof value === 'string' && INTEGER_RE.test(value.trim())) {
    return ok(BigInt(value.trim()));
  }
  if (value === undefined || value === null) {
    return err(new ParseError(`${eventName}.${field} is missing`, field));
  }
  return err(new ParseError(`${eventName}.${field} is not an integer: ${String(value)}`, field));
}

/** Null when the field is absent, a ParseError when present but not an integer. */
function readOptionalInteger(
  result: Record<string, unknown>,
  field: string,
  eventName: string,
): Result<bigint | null, ParseError> {
  const value = result[field];
  if (value === undefined || value === null || value === '') {
    return ok(null);
  }
  return readInteger(result, field, eventName);
}

function readUnsigned(
  result: Record<string, unknown>,
  field: string,
  eventName: string,
): Result<bigint, ParseError> {
  const value = readInteger(result, field, eventName);
  if (value.ok && value.value < 0n) {
    return err(new ParseError(`${eventName}.${field} must not be negative`, field));
  }
  return value;
}

function readString(
  result: Record<string, unknown>,
  field: string,
  eventName: string,
): Result<string, ParseError> {
  const value = result[field];
  if (typeof value !== 'string' || value.trim() === '') {
    return err(new ParseError(`${eventName}.${field} is missing`, field));
  }
  return ok(value.trim());
}

function readOptionalString(result: Record<string, unknown>, field: string): string | null {
  const value = result[field];
  return typeof value === 'string' && value.trim() !== '' ? value.trim() : null;
}

function readAddress(
  result: Record<string, unknown>,
  field: string,
  eventName: string,
): Result<TronAddress, ParseFailure> {
  const raw = readString(result, field, eventName);
  return raw.ok ? canonicalize(raw.value) : raw;
}

function readAction(
  result: Record<string, unknown>,
  eventName: string,
): Result<TradeAction, ParseError> {
  const action = (readOptionalString(result, 'action') ?? 'BUY').toUpperCase();
  if (action === 'BUY' || action === 'SELL') {
    return ok(action);
  }
  return err(new ParseError(`${eventName}.action must be BUY or SELL, got ${action}`, 'action'));
}

/**
 * Turns raw contract events into domain events. Prices and PnL are divided
 * by the configured price scale, amounts by 10^decimals of the token.
 */
export class EventParser {
  private readonly scaling: ScalingConfig;

  constructor(scaling: ScalingConfig) {
    this.scaling = scaling;
  }

  supports(eventName: string): boolean {
    return eventName === TRADE_OPEN || eventName === TRADE_CLOSED;
  }

  /** sha1 of the event's identity; identical for every re-fetch of the same event. */
  eventUid(raw: RawEvent): string {
    const identity = canonicalJson({
      bn: raw.block_number,
      idx: raw.event_index,
      name: raw.event_name,
      res: raw.result,
      tx: raw.transaction_id,
    });
    return createHash('sha1').update(identity).digest('hex');
  }

  tokenDecimals(token: TronAddress): number {
    return this.scaling.decimalsByToken[token.hex] ?? this.scaling.defaultDecimals;
  }

  parse(raw: RawEvent): Result<DomainEvent, ParseFailure> {
    if (raw.event_name === TRADE_OPEN) return this.parseTradeOpen(raw);
    if (raw.event_name === TRADE_CLOSED) return this.parseTradeClosed(raw);
    return err(new ParseError(`Unsupported event ${raw.event_name}`, 'event_name'));
  }

  private scalePrice(raw: bigint): Decimal {
    return quantize(new Decimal(raw.toString()).div(this.scaling.priceScale), SCALED_DP);
  }

  private scaleAmount(raw: bigint, decimals: number): Decimal {
    return quantize(new Decimal(raw.toString()).div(new Decimal(10).pow(decimals)), SCALED_DP);
  }

  private parseTradeOpen(raw: RawEvent): Result<TradeOpenedEvent | TradeClosedEvent, ParseFailure> {
    const name = raw.event_name;
    const result = raw.result;

    const tradeId = readUnsigned(result, 'tradeId', name);
    if (!tradeId.ok) return tradeId;
    const trader = readAddress(result, 'trader', name);
    if (!trader.ok) return trader;
    const token = readAddress(result, 'tokenAddress', name);
    if (!token.ok) return token;
    const price = readUnsigned(result, 'entryPrice', name);
    if (!price.ok) return price;
    const amount = readUnsigned(result, 'amount', name);
    if (!amount.ok) return amount;
    const action = readAction(result, name);
    if (!action.ok) return action;

    const decimals = this.tokenDecimals(token.value);
    const base = {
      eventUid: this.eventUid(raw),
      eventName: name,
      txId: raw.transaction_id,
      blockNumber: raw.block_number,
      eventIndex: raw.event_index,
      blockTimestamp: raw.block_timestamp ?? null,
      tradeId: tradeId.value.toString(),
      trader: trader.value.format(this.scaling.addressEncoding),
      token: token.value.format(this.scaling.addressEncoding),
      tokenDecimals: decimals,
      price: this.scalePrice(price.value),
      strategy: readOptionalString(result, 'strategy'),
    };
    const scaledAmount = this.scaleAmount(amount.value, decimals);

    if (action.value === 'SELL') {
      // Partial close reported through TradeOpen; the contract sends no PnL for it.
      const close: TradeClosedEvent = {
        ...base,
        type: 'TRADE_CLOSED',
        amount: scaledAmount,
        reportedPnl: null,
      };
      return ok(close);
    }
    const open: TradeOpenedEvent = { ...base, type: 'TRADE_OPENED', amount: scaledAmount };
    return ok(open);
  }

  private parseTradeClosed(raw: RawEvent): Result<TradeClosedEvent, ParseFailure> {
    const name = raw.event_name;
    const result = raw.result;

    const tradeId = readUnsigned(result, 'tradeId', name);
    if (!tradeId.ok) return tradeId;
    const trader = readAddress(result, 'trader', name);
    if (!trader.ok) return trader;
    const token = readAddress(result, 'tokenAddress', name);
    if (!token.ok) return token;
    const price = readUnsigned(result, 'exitPrice', name);
    if (!price.ok) return price;
    const pnl = readOptionalInteger(result, 'pnl', name);
    if (!pnl.ok) return pnl;

    const event: TradeClosedEvent = {
      type: 'TRADE_CLOSED',
      eventUid: this.eventUid(raw),
      eventName: name,
      txId: raw.transaction_id,
      blockNumber: raw.block_number,
      eventIndex: raw.event_index,
      blockTimestamp: raw.block_timestamp ?? null,
      tradeId: tradeId.value.toString(),
      trader: trader.value.format(this.scaling.addressEncoding),
      token: token.value.format(this.scaling.addressEncoding),
      tokenDecimals: this.tokenDecimals(token.value),
      price: this.scalePrice(price.value),
      strategy: readOptionalString(result, 'strategy'),
      amount: null,
      reportedPnl: pnl.value === null ? null : this.scalePrice(pnl.value),
    };
    return ok(event);
  }
}
