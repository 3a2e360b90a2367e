export { applyTradeEvent } from './ledger-engine.js';
export type { LedgerEffect, LedgerRules, LedgerTransition, PnlDivergence } from './ledger-engine.js';
export { LedgerService } from './ledger.service.js';
export type { ApplyOutcome, ApplyStatus } from './ledger.service.js';
