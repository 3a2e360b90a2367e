#!/usr/bin/env node
import dotenv from 'dotenv';
import { Command, InvalidArgumentError } from 'commander';
import { loadConfig, requireDatabaseUrl } from './config/env.js';
import { ConfigError, createLogger, createPgPool } from './infra/index.js';
import { canonicalize } from './modules/address/index.js';
import { applySchema } from './modules/persistence/index.js';
import { createServer } from './api/server.js';
import { createApp } from './bootstrap.js';

const EXIT_FAILURE = 1;
const EXIT_CONFIG = 2;

interface OnceOptions {
  dryRun?: boolean;
}

interface TailOptions {
  dryRun?: boolean;
  interval?: number;
  serve?: boolean;
}

function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
}

/** Aborts on the first SIGINT/SIGTERM so loops finish the current event. */
function shutdownSignal(onSignal: (signal: string) => void): AbortSignal {
  const controller = new AbortController();
  const handler = (signal: NodeJS.Signals): void => {
    onSignal(signal);
    controller.abort();
  };
  process.once('SIGINT', handler);
  process.once('SIGTERM', handler);
  return controller.signal;
}

async function runOnce(options: OnceOptions): Promise<void> {
  const config = loadConfig();
  const app = await createApp(config, { dryRun: options.dryRun });
  const { logger } = app.container;
  const signal = shutdownSignal((name) => logger.info({ signal: name }, 'Cancelling backfill'));

  try {
    const summary = await app.runner.backfill(signal);
    process.stdout.write(`${JSON.stringify({ contract: config.contractAddress, ...summary }, null, 2)}\n`);
    if (!summary.completed) {
      process.exitCode = EXIT_FAILURE;
    }
  } finally {
    await app.close();
  }
}

async function runTail(options: TailOptions): Promise<void> {
  const config = loadConfig();
  const app = await createApp(config, { dryRun: options.dryRun, intervalMs: options.interval });
  const { container, runner } = app;
  const signal = shutdownSignal((name) =>
    container.logger.info({ signal: name }, 'Shutdown signal received'),
  );

  const server = options.serve ? await createServer({ container, runner }) : null;
  try {
    if (server) {
      await server.listen({ host: config.api.host, port: config.api.port });
      container.logger.info(config.api, 'Status API listening');
    }
    await runner.tail(signal);
  } finally {
    await server?.close();
    await app.close();
    container.logger.info('Shutdown complete');
  }
}

async function runMigrate(): Promise<void> {
  const config = loadConfig();
  const logger = createLogger(config);
  const pool = createPgPool(requireDatabaseUrl(config), logger);
  try {
    await applySchema(pool, logger);
  } finally {
    await pool.end();
  }
}

async function printAddress(value: string): Promise<void> {
  const address = canonicalize(value);
  if (!address.ok) {
    throw address.error;
  }
  process.stdout.write(`hex     ${address.value.hex}\nbase58  ${address.value.toBase58()}\n`);
}

function action<A extends unknown[]>(fn: (...args: A) => Promise<void>): (...args: A) => Promise<void> {
  return async (...args: A) => {
    try {
      await fn(...args);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      // eslint-disable-next-line no-console
      console.error(`trade-ledger: ${message}`);
      process.exitCode = err instanceof ConfigError ? EXIT_CONFIG : EXIT_FAILURE;
    }
  };
}

dotenv.config();

const program = new Command();

program
  .name('trade-ledger')
  .description('Materializes on-chain trade events into open positions and trade history')
  .version('0.1.0');

program
  .command('once')
  .description('Backfill all confirmed events, print a summary and exit')
  .option('--dry-run', 'use an in-memory store instead of Postgres')
  .action(action((options: OnceOptions) => runOnce(options)));

program
  .command('tail')
  .description('Poll for new events until interrupted')
  .option('--interval <ms>', 'poll interval in milliseconds', parsePositiveInt)
  .option('--serve', 'start the read-only status API')
  .option('--dry-run', 'use an in-memory store instead of Postgres')
  .action(action((options: TailOptions) => runTail(options)));

program
  .command('migrate')
  .description('Create the ledger tables if they do not exist')
  .action(action(() => runMigrate()));

program
  .command('address')
  .description('Print the canonical hex and base58 forms of a TRON address')
  .argument('<value>', 'address in base58 or hex')
  .action(action((value: string) => printAddress(value)));

program.parseAsync(process.argv).catch((err: unknown) => {
  // eslint-disable-next-line no-console
  console.error('Fatal startup error:', err);
  process.exit(EXIT_FAILURE);
});
