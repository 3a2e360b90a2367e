import pg from 'pg';
import type { Logger } from './logger.js';

export type PgPool = pg.Pool;

export function createPgPool(connectionString: string, logger: Logger): PgPool {
  const pool = new pg.Pool({
    connectionString,
    max: 4,
    idleTimeoutMillis: 30_000,
    connectionTimeoutMillis: 10_000,
  });

  pool.on('error', (err: Error) => {
    logger.error({ err }, 'Postgres idle client error');
  });

  pool.on('connect', () => {
    logger.debug('Postgres client connected');
  });

  return pool;
}
