import { z } from 'zod';
import { ConfigError } from '../infra/errors.js';
import { canonicalize, type AddressEncoding } from '../modules/address/address.js';
import { Decimal } from '../utils/decimal.js';

const integerString = z.string().regex(/^[1-9]\d*$/, 'must be a positive integer');
const decimalString = z.string().regex(/^\d+(\.\d+)?$/, 'must be a non-negative decimal');

const envSchema = z.object({
  CONTRACT_ADDRESS: z.string().optional(),
  NILE_CONTRACT_ADDRESS: z.string().optional(),

  EVENTS_BASE_URL: z.string().url().default('https://nile.trongrid.io'),
  TRON_API_KEY: z.string().optional(),
  PAGE_SIZE: z.coerce.number().int().min(1).max(200).default(200),
  REQUEST_TIMEOUT_MS: z.coerce.number().int().min(100).default(20_000),

  PRICE_SCALE: integerString.default('1000000'),
  TOKEN_DECIMALS_DEFAULT: z.coerce.number().int().min(0).max(36).default(6),
  TOKEN_DECIMALS_MAP: z.string().optional(),
  ADDRESS_ENCODING: z.enum(['hex', 'base58']).default('hex'),

  DATABASE_URL: z.string().url().optional(),
  REDIS_URL: z.string().optional(),
  ALERT_STREAM_PREFIX: z.string().min(1).default('trade-ledger'),
  PNL_DIVERGENCE_TOLERANCE: decimalString.default('0.000001'),

  TAIL_INTERVAL_MS: z.coerce.number().int().min(100).default(5_000),
  TAIL_MAX_BACKOFF_MS: z.coerce.number().int().min(100).default(60_000),
  SEEN_CACHE_SIZE: z.coerce.number().int().min(1).default(10_000),

  API_HOST: z.string().default('0.0.0.0'),
  API_PORT: z.coerce.number().int().min(1).max(65535).default(3100),

  LOG_LEVEL: z
    .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
    .default('info'),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
});

const decimalsMapSchema = z.record(z.string(), z.number().int().min(0).max(36));

export type LogLevel = z.infer<typeof envSchema>['LOG_LEVEL'];
export type NodeEnv = z.infer<typeof envSchema>['NODE_ENV'];

export interface EventSourceConfig {
  baseUrl: string;
  apiKey: string | null;
  pageSize: number;
  timeoutMs: number;
}

export interface ScalingConfig {
  priceScale: Decimal;
  defaultDecimals: number;
  /** Decimals override keyed by canonical hex token address. */
  decimalsByToken: Readonly<Record<string, number>>;
  addressEncoding: AddressEncoding;
}

export interface TailConfig {
  intervalMs: number;
  maxBackoffMs: number;
  seenCacheSize: number;
}

export interface AppConfig {
  contractAddress: string;
  eventSource: EventSourceConfig;
  scaling: ScalingConfig;
  databaseUrl: string | null;
  redisUrl: string | null;
  alertStreamPrefix: string;
  pnlDivergenceTolerance: Decimal;
  tail: TailConfig;
  api: { host: string; port: number };
  logLevel: LogLevel;
  nodeEnv: NodeEnv;
}

function withoutBlanks(source: NodeJS.ProcessEnv): Record<string, string> {
  const cleaned: Record<string, string> = {};
  for (const [key, value] of Object.entries(source)) {
    if (value !== undefined && value.trim() !== '') {
      cleaned[key] = value.trim();
    }
  }
  return cleaned;
}

function parseDecimalsMap(raw: string | undefined): Record<string, number> {
  if (!raw) return {};

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new ConfigError('TOKEN_DECIMALS_MAP is not valid JSON', { cause: err });
  }

  const result = decimalsMapSchema.safeParse(parsed);
  if (!result.success) {
    throw new ConfigError(
      `TOKEN_DECIMALS_MAP must map token addresses to integer decimals: ${result.error.issues
        .map((issue) => `${issue.path.join('.') || '(root)'} ${issue.message}`)
        .join('; ')}`,
    );
  }

  // Keyed by canonical hex so lookups do not depend on how the token was written.
  const byHex: Record<string, number> = {};
  for (const [token, decimals] of Object.entries(result.data)) {
    const address = canonicalize(token);
    if (!address.ok) {
      throw new ConfigError(`TOKEN_DECIMALS_MAP has an invalid token: ${address.error.message}`);
    }
    byHex[address.value.hex] = decimals;
  }
  return byHex;
}

/**
 * Reads and validates the process environment once. Callers keep the
 * returned object and pass it down; nothing here is cached.
 */
export function loadConfig(source: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = envSchema.safeParse(withoutBlanks(source));
  if (!result.success) {
    const messages = result.error.issues
      .map((issue) => `  ${issue.path.join('.')}: ${issue.message}`)
      .join('\n');
    throw new ConfigError(`Environment validation failed:\n${messages}`);
  }
  const env = result.data;

  const contractAddress = env.NILE_CONTRACT_ADDRESS ?? env.CONTRACT_ADDRESS;
  if (!contractAddress) {
    throw new ConfigError('Either NILE_CONTRACT_ADDRESS or CONTRACT_ADDRESS must be set');
  }
  const contract = canonicalize(contractAddress);
  if (!contract.ok) {
    throw new ConfigError(`CONTRACT_ADDRESS is invalid: ${contract.error.message}`);
  }

  return {
    contractAddress,
    eventSource: {
      baseUrl: env.EVENTS_BASE_URL.replace(/\/+$/, ''),
      apiKey: env.TRON_API_KEY ?? null,
      pageSize: env.PAGE_SIZE,
      timeoutMs: env.REQUEST_TIMEOUT_MS,
    },
    scaling: {
      priceScale: new Decimal(env.PRICE_SCALE),
      defaultDecimals: env.TOKEN_DECIMALS_DEFAULT,
      decimalsByToken: parseDecimalsMap(env.TOKEN_DECIMALS_MAP),
      addressEncoding: env.ADDRESS_ENCODING,
    },
    databaseUrl: env.DATABASE_URL ?? null,
    redisUrl: env.REDIS_URL ?? null,
    alertStreamPrefix: env.ALERT_STREAM_PREFIX,
    pnlDivergenceTolerance: new Decimal(env.PNL_DIVERGENCE_TOLERANCE),
    tail: {
      intervalMs: env.TAIL_INTERVAL_MS,
      maxBackoffMs: env.TAIL_MAX_BACKOFF_MS,
      seenCacheSize: env.SEEN_CACHE_SIZE,
    },
    api: { host: env.API_HOST, port: env.API_PORT },
    logLevel: env.LOG_LEVEL,
    nodeEnv: env.NODE_ENV,
  };
}

export function requireDatabaseUrl(config: AppConfig): string {
  if (!config.databaseUrl) {
    throw new ConfigError('DATABASE_URL must be set (or pass --dry-run to use an in-memory store)');
  }
  return config.databaseUrl;
}
