export { MemoryLedgerStore } from './memory-ledger-store.js';
export { PostgresLedgerStore, applySchema } from './postgres-ledger-store.js';
export type { HistoryQuery, LedgerStore, LedgerWriter } from './ledger-store.js';
