import type { AppConfig } from '../config/env.js';
import type { Logger } from './logger.js';
import type { LedgerStore } from '../modules/persistence/ledger-store.js';
import type { AlertSink } from '../services/alert-sink.js';

export interface Container {
  config: AppConfig;
  logger: Logger;
  store: LedgerStore;
  alerts: AlertSink;
}
