import type { AppConfig } from './config/env.js';
import { requireDatabaseUrl } from './config/env.js';
import { createLogger, createPgPool, createRedisClient } from './infra/index.js';
import type { Container, Logger, RedisClient } from './infra/index.js';
import { EventParser } from './modules/event-parser/index.js';
import { EventSourceClient } from './modules/event-source/index.js';
import { LedgerService } from './modules/ledger-engine/index.js';
import { MemoryLedgerStore, PostgresLedgerStore } from './modules/persistence/index.js';
import type { LedgerStore } from './modules/persistence/index.js';
import { Runner } from './modules/runner/index.js';
import { LogAlertSink, RedisAlertSink, type AlertSink } from './services/alert-sink.js';

export interface AppOptions {
  /** Use the in-memory store; nothing is written to Postgres. */
  dryRun?: boolean;
  intervalMs?: number;
  logger?: Logger;
}

export interface App {
  container: Container;
  runner: Runner;
  close(): Promise<void>;
}

async function createAlertSink(
  config: AppConfig,
  logger: Logger,
): Promise<{ alerts: AlertSink; redis: RedisClient | null }> {
  if (!config.redisUrl) {
    return { alerts: new LogAlertSink(logger), redis: null };
  }

  const redis = createRedisClient(config.redisUrl, logger);
  await redis.connect().catch((err: unknown) => {
    // No offline queue: alerts sent before ioredis reconnects fail and are logged.
    logger.warn({ err }, 'Redis unavailable at startup; alerts are dropped until it reconnects');
  });
  return {
    alerts: new RedisAlertSink(redis, { streamPrefix: config.alertStreamPrefix }, logger),
    redis,
  };
}

/** Wires the store, alert sink and services for one run of the CLI. */
export async function createApp(config: AppConfig, options: AppOptions = {}): Promise<App> {
  const logger = options.logger ?? createLogger(config);

  let store: LedgerStore;
  if (options.dryRun) {
    logger.warn('Dry run: using the in-memory store, nothing will be persisted');
    store = new MemoryLedgerStore();
  } else {
    store = new PostgresLedgerStore(createPgPool(requireDatabaseUrl(config), logger), logger);
    await store.ping();
    logger.info('Database connected');
  }

  const { alerts, redis } = await createAlertSink(config, logger);
  const container: Container = { config, logger, store, alerts };

  const runner = new Runner(
    container,
    new EventSourceClient(config.eventSource, logger),
    new EventParser(config.scaling),
    new LedgerService(container),
    { intervalMs: options.intervalMs },
  );

  return {
    container,
    runner,
    async close() {
      await store.close();
      redis?.disconnect();
    },
  };
}
