import { Redis } from 'ioredis';
import type { Logger } from './logger.js';

export type RedisClient = Redis;

const MAX_RECONNECT_DELAY_MS = 5_000;

/**
 * Connection used only for publishing alerts, so requests fail fast instead
 * of queueing while disconnected; a lost alert is logged by the sink.
 */
export function createRedisClient(url: string, logger: Logger): RedisClient {
  const client = new Redis(url, {
    connectionName: 'trade-ledger',
    maxRetriesPerRequest: 1,
    enableOfflineQueue: false,
    retryStrategy: (times: number) => Math.min(times * 250, MAX_RECONNECT_DELAY_MS),
    lazyConnect: true,
  });

  client.on('ready', () => {
    logger.info({ connectionName: 'trade-ledger' }, 'Redis alert connection ready');
  });

  client.on('error', (err: Error) => {
    logger.error({ err }, 'Redis alert connection error');
  });

  client.on('end', () => {
    logger.warn('Redis alert connection ended');
  });

  return client;
}
