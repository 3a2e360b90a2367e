import type {
  DomainEvent,
  HistoryRecord,
  OpenPosition,
  TradeClosedEvent,
  TradeOpenedEvent,
} from '../../types/index.js';
import { Decimal, SCALED_DP, ZERO, quantize } from '../../utils/decimal.js';

/** What a transition does to the token's open position. */
export type LedgerEffect = 'OPENED' | 'MERGED' | 'REDUCED' | 'CLOSED' | 'NOOP';

export interface PnlDivergence {
  reported: Decimal;
  computed: Decimal;
  difference: Decimal;
}

export interface LedgerTransition {
  /** Position after the event; null when none remains. */
  next: OpenPosition | null;
  history: HistoryRecord;
  effect: LedgerEffect;
  pnlDivergence: PnlDivergence | null;
}

export interface LedgerRules {
  /** Absolute difference between reported and computed PnL that raises an alert. */
  divergenceTolerance: Decimal;
}

function isLive(position: OpenPosition | null): position is OpenPosition {
  return position !== null && position.amount.gt(0);
}

type HistoryIdentity = Omit<
  HistoryRecord,
  'action' | 'amount' | 'avgEntryPrice' | 'avgExitPrice' | 'pnl' | 'strategy'
>;

function baseHistory(event: DomainEvent): HistoryIdentity {
  return {
    eventUid: event.eventUid,
    tradeIdOnchain: event.tradeId,
    tokenKey: event.token,
    price: event.price,
    txId: event.txId,
    blockNumber: event.blockNumber,
    eventIndex: event.eventIndex,
    blockTimestamp: event.blockTimestamp,
  };
}

function applyBuy(position: OpenPosition | null, event: TradeOpenedEvent): LedgerTransition {
  if (!isLive(position)) {
    const history: HistoryRecord = {
      ...baseHistory(event),
      action: 'BUY',
      amount: event.amount,
      avgEntryPrice: event.price,
      avgExitPrice: null,
      pnl: null,
      strategy: event.strategy,
    };
    // A position row exists only while amount > 0.
    if (!event.amount.gt(0)) {
      return { next: position, history, effect: 'NOOP', pnlDivergence: null };
    }
    return {
      next: {
        tokenKey: event.token,
        tradeIdOnchain: event.tradeId,
        avgEntryPrice: event.price,
        amount: event.amount,
        strategy: event.strategy,
        trader: event.trader,
        lastTxId: event.txId,
      },
      history,
      effect: 'OPENED',
      pnlDivergence: null,
    };
  }

  const amount = position.amount.plus(event.amount);
  const avgEntryPrice = amount.isZero()
    ? event.price
    : quantize(
        position.avgEntryPrice.times(position.amount).plus(event.price.times(event.amount)).div(amount),
        SCALED_DP,
      );
  const strategy = event.strategy ?? position.strategy;

  return {
    next: {
      ...position,
      avgEntryPrice,
      amount,
      strategy,
      trader: event.trader,
      lastTxId: event.txId,
    },
    history: {
      ...baseHistory(event),
      action: 'BUY',
      amount: event.amount,
      avgEntryPrice,
      avgExitPrice: null,
      pnl: null,
      strategy,
    },
    effect: 'MERGED',
    pnlDivergence: null,
  };
}

function divergence(
  reported: Decimal | null,
  computed: Decimal,
  tolerance: Decimal,
): PnlDivergence | null {
  if (reported === null) return null;
  const difference = reported.minus(computed).abs();
  return difference.gt(tolerance) ? { reported, computed, difference } : null;
}

function applySell(
  position: OpenPosition | null,
  event: TradeClosedEvent,
  rules: LedgerRules,
): LedgerTransition {
  if (!isLive(position)) {
    return {
      next: position,
      history: {
        ...baseHistory(event),
        action: 'SELL',
        amount: ZERO,
        avgEntryPrice: null,
        avgExitPrice: event.price,
        pnl: null,
        strategy: event.strategy,
      },
      effect: 'NOOP',
      pnlDivergence: null,
    };
  }

  const requested = event.amount ?? position.amount;
  const sold = Decimal.min(requested, position.amount);
  const realized = quantize(event.price.minus(position.avgEntryPrice).times(sold), SCALED_DP);
  const remaining = quantize(position.amount.minus(sold), event.tokenDecimals);
  const strategy = event.strategy ?? position.strategy;

  const history: HistoryRecord = {
    ...baseHistory(event),
    action: 'SELL',
    amount: sold,
    avgEntryPrice: position.avgEntryPrice,
    avgExitPrice: event.price,
    pnl: event.reportedPnl ?? realized,
    strategy,
  };
  const pnlDivergence = divergence(event.reportedPnl, realized, rules.divergenceTolerance);

  if (!remaining.gt(0)) {
    return { next: null, history, effect: 'CLOSED', pnlDivergence };
  }
  return {
    next: {
      ...position,
      amount: remaining,
      strategy,
      trader: event.trader,
      lastTxId: event.txId,
    },
    history,
    effect: 'REDUCED',
    pnlDivergence,
  };
}

/**
 * Computes the next open position for a token and the history row for one
 * event. Pure: deduplication and persistence belong to the caller.
 */
export function applyTradeEvent(
  position: OpenPosition | null,
  event: DomainEvent,
  rules: LedgerRules,
): LedgerTransition {
  return event.type === 'TRADE_OPENED'
    ? applyBuy(position, event)
    : applySell(position, event, rules);
}
