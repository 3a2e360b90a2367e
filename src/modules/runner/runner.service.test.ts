import { describe, it, expect, vi } from 'vitest';
import { Runner } from './runner.service.js';
import { EventParser } from '../event-parser/event-parser.service.js';
import type { EventOrder, EventPage, EventSource, RawEvent } from '../event-source/event-source.service.js';
import { LedgerService } from '../ledger-engine/ledger.service.js';
import { MemoryLedgerStore } from '../persistence/memory-ledger-store.js';
import type { Container } from '../../infra/container.js';
import {
  ContractNotFoundError,
  NetworkError,
  PersistenceError,
} from '../../infra/errors.js';
import {
  CONTRACT,
  TOKEN_A_HEX,
  createAlertSink,
  createTestContainer,
  rawTradeClosed,
  rawTradeOpen,
  scaling,
} from '../../testing/fixtures.js';

/**
 * Serves `events` the way the event API does: oldest-first pages linked by a
 * cursor, or the newest page alone, each page in reverse chain order.
 */
class PagedSource implements EventSource {
  readonly cursors: Array<string | null> = [];
  readonly events: RawEvent[];
  private readonly pageSize: number;

  constructor(events: RawEvent[], pageSize: number) {
    this.events = events;
    this.pageSize = pageSize;
  }

  async fetchPage(
    _contract: string,
    cursor?: string | null,
    order: EventOrder = 'oldest',
  ): Promise<EventPage> {
    this.cursors.push(cursor ?? null);
    if (order === 'newest') {
      return { events: this.events.slice(-this.pageSize).reverse(), malformed: 0, nextCursor: null };
    }
    const offset = cursor ? Number(cursor.replace('fp-', '')) : 0;
    const end = offset + this.pageSize;
    return {
      events: this.events.slice(offset, end).reverse(),
      malformed: 0,
      nextCursor: end < this.events.length ? `fp-${end}` : null,
    };
  }
}

function buys(count: number): RawEvent[] {
  return Array.from({ length: count }, (_, i) =>
    rawTradeOpen({ tx: `tx-${i}`, block: 100 + i, tradeId: String(i + 1) }),
  );
}

function setup(source: EventSource, overrides: Partial<Container> = {}) {
  const store = new MemoryLedgerStore();
  const alerts = createAlertSink();
  const container = createTestContainer({ store, alerts, ...overrides });
  const ledger = new LedgerService(container);
  const runner = new Runner(container, source, new EventParser(scaling), ledger, {
    retry: { maxRetries: 3, baseDelayMs: 1, maxDelayMs: 1 },
    intervalMs: 1,
  });
  return { store, alerts, ledger, runner };
}

describe('Runner', () => {
  describe('backfill', () => {
    it.each([
      [1, 7],
      [2, 4],
      [3, 3],
      [5, 2],
    ])('applies 7 events exactly once with page size %i', async (pageSize, pages) => {
      const source = new PagedSource(buys(7), pageSize);
      const { store, runner } = setup(source);

      const summary = await runner.backfill();

      expect(summary).toEqual({
        events: 7,
        pages,
        applied: 7,
        duplicates: 0,
        skipped: 0,
        ignored: 0,
        malformed: 0,
        completed: true,
      });
      expect(await store.listHistory({ limit: 100 })).toHaveLength(7);
      expect((await store.getPosition(TOKEN_A_HEX))?.amount.toFixed()).toBe('35');
      expect((await store.getPosition(TOKEN_A_HEX))?.tradeIdOnchain).toBe('1');
    });

    it('reports duplicates when history is replayed', async () => {
      const source = new PagedSource(buys(4), 3);
      const { store, runner } = setup(source);

      await runner.backfill();
      const second = await runner.backfill();

      expect(second).toMatchObject({ events: 4, applied: 0, duplicates: 4 });
      expect((await store.getPosition(TOKEN_A_HEX))?.amount.toFixed()).toBe('20');
    });

    it('applies each page in chain order', async () => {
      const source = new PagedSource(
        [
          rawTradeOpen({ tx: 'tx-buy', block: 10, amount: '5000000' }),
          rawTradeOpen({ tx: 'tx-sell', block: 10, index: 1, action: 'SELL', amount: '3000000', price: '16000000' }),
        ],
        2,
      );
      const { store, runner } = setup(source);

      await runner.backfill();

      expect((await store.getPosition(TOKEN_A_HEX))?.amount.toFixed()).toBe('2');
      const [sell] = await store.listHistory({ limit: 1 });
      expect(sell?.pnl?.toFixed()).toBe('18');
    });

    it('closes a position with the computed pnl when the close reports none', async () => {
      const close = rawTradeClosed({ tx: 'tx-close', block: 20, price: '16000000' });
      const { pnl: _dropped, ...result } = close.result;
      const source = new PagedSource(
        [rawTradeOpen({ tx: 'tx-buy', block: 10, amount: '5000000' }), { ...close, result }],
        10,
      );
      const { store, runner } = setup(source);

      const summary = await runner.backfill();

      expect(summary).toMatchObject({ applied: 2, skipped: 0 });
      expect(await store.getPosition(TOKEN_A_HEX)).toBeNull();
      const [closed] = await store.listHistory({ limit: 1 });
      expect(closed?.txId).toBe('tx-close');
      expect(closed?.amount.toFixed()).toBe('5');
      expect(closed?.pnl?.toFixed()).toBe('30');
    });

    it('counts ignored and skipped events', async () => {
      const transfer: RawEvent = { ...rawTradeOpen({ tx: 'tx-t', block: 1 }), event_name: 'Transfer' };
      const broken = rawTradeOpen({ tx: 'tx-bad', block: 2, amount: 'lots' });
      const source = new PagedSource([transfer, broken, rawTradeClosed({ block: 3 })], 10);
      const { runner } = setup(source);

      const summary = await runner.backfill();

      expect(summary).toMatchObject({ events: 3, applied: 1, skipped: 1, ignored: 1 });
    });

    it('retries retryable fetch failures without advancing the cursor', async () => {
      const paged = new PagedSource(buys(2), 1);
      const fetchPage = vi
        .fn<EventSource['fetchPage']>()
        .mockRejectedValueOnce(new NetworkError('HTTP 503', { status: 503, retryable: true }))
        .mockImplementation((contract, cursor, order) => paged.fetchPage(contract, cursor, order));
      const { runner } = setup({ fetchPage });

      const summary = await runner.backfill();

      expect(summary).toMatchObject({ applied: 2, completed: true });
      expect(fetchPage.mock.calls.map(([, cursor]) => cursor)).toEqual([null, null, 'fp-1']);
      expect(fetchPage.mock.calls.every(([, , order]) => order === 'oldest')).toBe(true);
    });

    it('gives up once retries are exhausted', async () => {
      const fetchPage = vi
        .fn<EventSource['fetchPage']>()
        .mockRejectedValue(new NetworkError('HTTP 500', { status: 500, retryable: true }));
      const { runner } = setup({ fetchPage });

      await expect(runner.backfill()).rejects.toThrow('HTTP 500');
      expect(fetchPage).toHaveBeenCalledTimes(4);
    });

    it('does not retry a missing contract', async () => {
      const fetchPage = vi
        .fn<EventSource['fetchPage']>()
        .mockRejectedValue(new ContractNotFoundError('T-missing', 'https://events.test'));
      const { runner } = setup({ fetchPage });

      await expect(runner.backfill()).rejects.toBeInstanceOf(ContractNotFoundError);
      expect(fetchPage).toHaveBeenCalledTimes(1);
    });

    it('stops when the cursor repeats', async () => {
      const fetchPage = vi.fn<EventSource['fetchPage']>().mockImplementation(async (_c, cursor) => ({
        events: [rawTradeOpen({ tx: `tx-${cursor ?? 'first'}` })],
        malformed: 0,
        nextCursor: 'fp-stuck',
      }));
      const { runner } = setup({ fetchPage });

      const summary = await runner.backfill();

      expect(summary).toMatchObject({ pages: 2, applied: 2, completed: true });
      expect(fetchPage).toHaveBeenCalledTimes(2);
    });

    it('stops on an empty page', async () => {
      const fetchPage = vi
        .fn<EventSource['fetchPage']>()
        .mockResolvedValue({ events: [], malformed: 0, nextCursor: 'fp-next' });
      const { runner } = setup({ fetchPage });

      const summary = await runner.backfill();

      expect(summary).toMatchObject({ pages: 1, events: 0, completed: true });
      expect(fetchPage).toHaveBeenCalledTimes(1);
    });

    it('reports an incomplete run when cancelled', async () => {
      const controller = new AbortController();
      controller.abort();
      const { runner } = setup(new PagedSource(buys(3), 1));

      const summary = await runner.backfill(controller.signal);

      expect(summary).toMatchObject({ pages: 0, events: 0, completed: false });
    });

    it('aborts on a persistence failure', async () => {
      const store = new MemoryLedgerStore();
      vi.spyOn(store, 'insertHistoryOnce').mockRejectedValue(
        new PersistenceError('insertHistoryOnce failed: disk full'),
      );
      const { runner } = setup(new PagedSource(buys(3), 1), { store });

      await expect(runner.backfill()).rejects.toBeInstanceOf(PersistenceError);
      expect(runner.getStatus().totals.applied).toBe(0);
    });
  });

  describe('pollOnce', () => {
    it('skips events seen on an earlier poll', async () => {
      const { runner } = setup(new PagedSource(buys(2), 10));

      const first = await runner.pollOnce();
      const second = await runner.pollOnce();

      expect(first).toMatchObject({ events: 2, applied: 2 });
      expect(second).toMatchObject({ events: 0, applied: 0 });
      expect(runner.getStatus()).toMatchObject({
        totals: { events: 2, pages: 2, applied: 2 },
        seenCacheSize: 2,
      });
    });

    it('picks up events newer than the first page of history', async () => {
      const source = new PagedSource(buys(3), 2);
      const { store, runner } = setup(source);

      const first = await runner.pollOnce();
      source.events.push(rawTradeOpen({ tx: 'tx-new', block: 200, tradeId: '9' }));
      const second = await runner.pollOnce();

      expect(first).toMatchObject({ events: 2, applied: 2 });
      expect(second).toMatchObject({ events: 1, applied: 1 });
      const history = await store.listHistory({ limit: 10 });
      expect(history.map((r) => r.txId)).toEqual(['tx-new', 'tx-2', 'tx-1']);
    });

    it('asks the event source for the newest page', async () => {
      const fetchPage = vi
        .fn<EventSource['fetchPage']>()
        .mockResolvedValue({ events: [], malformed: 0, nextCursor: null });
      const { runner } = setup({ fetchPage });

      await runner.pollOnce();

      expect(fetchPage).toHaveBeenCalledWith(CONTRACT, null, 'newest');
    });

    it('retries an event whose write failed on the next poll', async () => {
      const store = new MemoryLedgerStore();
      vi.spyOn(store, 'upsertPosition').mockRejectedValueOnce(
        new PersistenceError('upsertPosition failed: connection reset'),
      );
      const { runner } = setup(new PagedSource(buys(1), 10), { store });

      await expect(runner.pollOnce()).rejects.toBeInstanceOf(PersistenceError);
      const retried = await runner.pollOnce();

      expect(retried).toMatchObject({ events: 1, applied: 1 });
      expect((await store.getPosition(TOKEN_A_HEX))?.amount.toFixed()).toBe('5');
    });
  });

  describe('tail', () => {
    it('backs off and alerts after repeated failures', async () => {
      const controller = new AbortController();
      let polls = 0;
      const fetchPage = vi.fn<EventSource['fetchPage']>().mockImplementation(async () => {
        polls++;
        if (polls >= 3) controller.abort();
        throw new NetworkError('connect ECONNREFUSED', { retryable: true });
      });
      const { alerts, runner } = setup({ fetchPage });

      await runner.tail(controller.signal);

      expect(fetchPage).toHaveBeenCalledTimes(3);
      expect(alerts.send).toHaveBeenCalledTimes(1);
      expect(alerts.send.mock.calls[0]?.[0]).toMatchObject({
        kind: 'TAIL_DEGRADED',
        severity: 'critical',
        data: { failures: 3, error: 'connect ECONNREFUSED' },
      });
      expect(runner.getStatus()).toMatchObject({
        mode: 'idle',
        consecutiveFailures: 3,
        lastError: 'connect ECONNREFUSED',
      });
    });

    it('resets the failure count after a successful poll', async () => {
      const controller = new AbortController();
      const paged = new PagedSource(buys(1), 10);
      let polls = 0;
      const fetchPage = vi
        .fn<EventSource['fetchPage']>()
        .mockImplementation(async (contract, cursor, order) => {
          polls++;
          if (polls === 1) throw new NetworkError('HTTP 502', { status: 502, retryable: true });
          if (polls === 3) controller.abort();
          return paged.fetchPage(contract, cursor, order);
        });
      const { store, runner } = setup({ fetchPage });

      await runner.tail(controller.signal);

      expect(fetchPage).toHaveBeenCalledTimes(3);
      expect(runner.getStatus().consecutiveFailures).toBe(0);
      expect(await store.listHistory({ limit: 10 })).toHaveLength(1);
    });

    it('ends on a configuration error', async () => {
      const fetchPage = vi
        .fn<EventSource['fetchPage']>()
        .mockRejectedValue(new ContractNotFoundError('T-missing', 'https://events.test'));
      const { runner } = setup({ fetchPage });

      await expect(runner.tail(new AbortController().signal)).rejects.toBeInstanceOf(
        ContractNotFoundError,
      );
      expect(fetchPage).toHaveBeenCalledTimes(1);
    });
  });
});
