import { compareEventPosition, type HistoryRecord, type OpenPosition } from '../../types/index.js';
import type { HistoryQuery, LedgerStore, LedgerWriter } from './ledger-store.js';

/**
 * In-process store for dry runs and tests. Transactions snapshot both maps
 * and restore them if the callback throws.
 */
export class MemoryLedgerStore implements LedgerStore {
  private positions = new Map<string, OpenPosition>();
  private history = new Map<string, HistoryRecord>();
  private inTransaction = false;

  async getPosition(tokenKey: string): Promise<OpenPosition | null> {
    const position = this.positions.get(tokenKey);
    return position ? { ...position } : null;
  }

  async upsertPosition(position: OpenPosition): Promise<void> {
    this.positions.set(position.tokenKey, { ...position });
  }

  async deletePosition(tokenKey: string): Promise<void> {
    this.positions.delete(tokenKey);
  }

  async insertHistoryOnce(record: HistoryRecord): Promise<boolean> {
    if (this.history.has(record.eventUid)) return false;
    this.history.set(record.eventUid, { ...record });
    return true;
  }

  async transaction<T>(fn: (tx: LedgerWriter) => Promise<T>): Promise<T> {
    if (this.inTransaction) {
      throw new Error('Nested transactions are not supported');
    }

    const positions = new Map(this.positions);
    const history = new Map(this.history);
    this.inTransaction = true;
    try {
      return await fn(this);
    } catch (err) {
      this.positions = positions;
      this.history = history;
      throw err;
    } finally {
      this.inTransaction = false;
    }
  }

  async listPositions(): Promise<OpenPosition[]> {
    return [...this.positions.values()]
      .map((position) => ({ ...position }))
      .sort((a, b) => a.tokenKey.localeCompare(b.tokenKey));
  }

  async listHistory(query: HistoryQuery): Promise<HistoryRecord[]> {
    return [...this.history.values()]
      .filter((record) => query.token === undefined || record.tokenKey === query.token)
      .sort((a, b) => compareEventPosition(b, a))
      .slice(0, query.limit)
      .map((record) => ({ ...record }));
  }

  async ping(): Promise<void> {}

  async close(): Promise<void> {}
}
