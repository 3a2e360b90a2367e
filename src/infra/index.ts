export { createLogger } from './logger.js';
export type { Logger } from './logger.js';
export { createRedisClient } from './redis.js';
export type { RedisClient } from './redis.js';
export { createPgPool } from './database.js';
export type { PgPool } from './database.js';
export type { Container } from './container.js';
export {
  LedgerError,
  ConfigError,
  ContractNotFoundError,
  DecodeError,
  ParseError,
  NetworkError,
  TimeoutError,
  PersistenceError,
  isRetryable,
} from './errors.js';
export type { ErrorKind } from './errors.js';
