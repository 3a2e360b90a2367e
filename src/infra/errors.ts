export type ErrorKind = 'config' | 'decode' | 'parse' | 'network' | 'persistence';

interface LedgerErrorOptions {
  retryable?: boolean;
  cause?: unknown;
}

export abstract class LedgerError extends Error {
  abstract readonly kind: ErrorKind;
  readonly retryable: boolean;

  constructor(message: string, options: LedgerErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
    this.retryable = options.retryable ?? false;
  }
}

/** Missing or invalid startup setting. Fatal, never retried. */
export class ConfigError extends LedgerError {
  readonly kind = 'config';
}

export class ContractNotFoundError extends ConfigError {
  readonly contract: string;

  constructor(contract: string, url: string) {
    super(`Contract ${contract} not found at ${url}; check EVENTS_BASE_URL and CONTRACT_ADDRESS`);
    this.contract = contract;
  }
}

/** Address that is not a valid base58check or hex TRON address. */
export class DecodeError extends LedgerError {
  readonly kind = 'decode';
  readonly input: string;

  constructor(input: string, reason: string) {
    super(`Cannot decode address "${input}": ${reason}`);
    this.input = input;
  }
}

export class ParseError extends LedgerError {
  readonly kind = 'parse';
  readonly field: string | null;

  constructor(message: string, field: string | null = null) {
    super(message);
    this.field = field;
  }
}

export class NetworkError extends LedgerError {
  readonly kind = 'network';
  readonly status: number | null;

  constructor(message: string, options: LedgerErrorOptions & { status?: number } = {}) {
    super(message, options);
    this.status = options.status ?? null;
  }
}

export class TimeoutError extends NetworkError {
  constructor(message: string, cause?: unknown) {
    super(message, { retryable: true, cause });
  }
}

export class PersistenceError extends LedgerError {
  readonly kind = 'persistence';

  constructor(message: string, cause?: unknown) {
    super(message, { retryable: true, cause });
  }
}

export function isRetryable(err: unknown): boolean {
  return err instanceof LedgerError && err.retryable;
}
