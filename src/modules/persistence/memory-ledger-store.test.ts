import { describe, it, expect } from 'vitest';
import { MemoryLedgerStore } from './memory-ledger-store.js';
import type { HistoryRecord, OpenPosition } from '../../types/index.js';
import { Decimal } from '../../utils/decimal.js';
import { TOKEN_A_HEX, TOKEN_B_HEX, TRADER_HEX } from '../../testing/fixtures.js';

function position(tokenKey: string, amount: string): OpenPosition {
  return {
    tokenKey,
    tradeIdOnchain: '1',
    avgEntryPrice: new Decimal(10),
    amount: new Decimal(amount),
    strategy: null,
    trader: TRADER_HEX,
    lastTxId: 'tx-1',
  };
}

function history(eventUid: string, blockNumber: number, eventIndex = 0, tokenKey = TOKEN_A_HEX): HistoryRecord {
  return {
    eventUid,
    tradeIdOnchain: '1',
    tokenKey,
    action: 'BUY',
    price: new Decimal(10),
    amount: new Decimal(1),
    avgEntryPrice: new Decimal(10),
    avgExitPrice: null,
    pnl: null,
    strategy: null,
    txId: `tx-${eventUid}`,
    blockNumber,
    eventIndex,
    blockTimestamp: null,
  };
}

describe('MemoryLedgerStore', () => {
  it('upserts, reads and deletes positions', async () => {
    const store = new MemoryLedgerStore();

    await store.upsertPosition(position(TOKEN_A_HEX, '5'));
    await store.upsertPosition(position(TOKEN_A_HEX, '7'));
    expect((await store.getPosition(TOKEN_A_HEX))?.amount.toFixed()).toBe('7');

    await store.deletePosition(TOKEN_A_HEX);
    expect(await store.getPosition(TOKEN_A_HEX)).toBeNull();
  });

  it('inserts a history row once per event uid', async () => {
    const store = new MemoryLedgerStore();

    expect(await store.insertHistoryOnce(history('e1', 1))).toBe(true);
    expect(await store.insertHistoryOnce(history('e1', 1))).toBe(false);
    expect(await store.listHistory({ limit: 10 })).toHaveLength(1);
  });

  it('lists positions by token key', async () => {
    const store = new MemoryLedgerStore();
    await store.upsertPosition(position(TOKEN_B_HEX, '1'));
    await store.upsertPosition(position(TOKEN_A_HEX, '2'));

    const keys = (await store.listPositions()).map((p) => p.tokenKey);
    expect(keys).toEqual([TOKEN_A_HEX, TOKEN_B_HEX]);
  });

  it('lists history newest first with a token filter and limit', async () => {
    const store = new MemoryLedgerStore();
    await store.insertHistoryOnce(history('e1', 1));
    await store.insertHistoryOnce(history('e2', 2, 1));
    await store.insertHistoryOnce(history('e3', 2, 0, TOKEN_B_HEX));
    await store.insertHistoryOnce(history('e4', 3));

    expect((await store.listHistory({ limit: 10 })).map((r) => r.eventUid)).toEqual([
      'e4',
      'e2',
      'e3',
      'e1',
    ]);
    expect((await store.listHistory({ token: TOKEN_A_HEX, limit: 2 })).map((r) => r.eventUid)).toEqual([
      'e4',
      'e2',
    ]);
  });

  it('restores both tables when a transaction throws', async () => {
    const store = new MemoryLedgerStore();
    await store.upsertPosition(position(TOKEN_A_HEX, '5'));

    await expect(
      store.transaction(async (tx) => {
        await tx.insertHistoryOnce(history('e1', 1));
        await tx.deletePosition(TOKEN_A_HEX);
        throw new Error('boom');
      }),
    ).rejects.toThrow('boom');

    expect((await store.getPosition(TOKEN_A_HEX))?.amount.toFixed()).toBe('5');
    expect(await store.listHistory({ limit: 10 })).toEqual([]);
  });

  it('commits a transaction that completes', async () => {
    const store = new MemoryLedgerStore();

    const result = await store.transaction(async (tx) => {
      await tx.upsertPosition(position(TOKEN_A_HEX, '5'));
      return tx.insertHistoryOnce(history('e1', 1));
    });

    expect(result).toBe(true);
    expect(await store.listPositions()).toHaveLength(1);
  });

  it('rejects nested transactions', async () => {
    const store = new MemoryLedgerStore();

    await expect(
      store.transaction(() => store.transaction(async () => 'inner')),
    ).rejects.toThrow('Nested transactions are not supported');
  });

  it('returns copies so callers cannot mutate stored rows', async () => {
    const store = new MemoryLedgerStore();
    await store.upsertPosition(position(TOKEN_A_HEX, '5'));

    const read = await store.getPosition(TOKEN_A_HEX);
    if (read) read.strategy = 'changed';

    expect((await store.getPosition(TOKEN_A_HEX))?.strategy).toBeNull();
  });
});
