import type { HistoryRecord, OpenPosition } from '../../types/index.js';

export interface HistoryQuery {
  token?: string;
  limit: number;
}

/** Operations available inside a transaction. */
export interface LedgerWriter {
  getPosition(tokenKey: string): Promise<OpenPosition | null>;
  upsertPosition(position: OpenPosition): Promise<void>;
  deletePosition(tokenKey: string): Promise<void>;
  /**
   * Inserts unless a row with the same event uid exists.
   * Resolves true when a row was written.
   */
  insertHistoryOnce(record: HistoryRecord): Promise<boolean>;
}

/**
 * Row store behind the ledger: `open_trades` keyed by token address and
 * `trade_history` keyed by event uid. Implementations throw PersistenceError.
 */
export interface LedgerStore extends LedgerWriter {
  transaction<T>(fn: (tx: LedgerWriter) => Promise<T>): Promise<T>;
  listPositions(): Promise<OpenPosition[]>;
  /** Newest first. */
  listHistory(query: HistoryQuery): Promise<HistoryRecord[]>;
  ping(): Promise<void>;
  close(): Promise<void>;
}
