import type { Logger } from '../infra/logger.js';

export interface RetryOptions {
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export interface WithRetryOptions extends Partial<RetryOptions> {
  /** Errors for which this returns false are rethrown immediately. */
  shouldRetry?: (err: unknown) => boolean;
  signal?: AbortSignal;
}

const DEFAULT_OPTIONS: RetryOptions = {
  maxRetries: 5,
  baseDelayMs: 1_000,
  maxDelayMs: 30_000,
};

/**
 * Resolves after `ms`, or as soon as `signal` aborts. Never rejects.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

export function calculateBackoff(
  attempt: number,
  options: Pick<RetryOptions, 'baseDelayMs' | 'maxDelayMs'>,
): number {
  return Math.min(options.baseDelayMs * 2 ** attempt, options.maxDelayMs);
}

export async function withRetry<T>(
  fn: () => Promise<T>,
  label: string,
  logger: Logger,
  options: WithRetryOptions = {},
): Promise<T> {
  const { shouldRetry = () => true, signal, ...overrides } = options;
  const opts: RetryOptions = { ...DEFAULT_OPTIONS, ...overrides };

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn();
    } catch (err) {
      if (attempt >= opts.maxRetries || !shouldRetry(err) || signal?.aborted) {
        throw err;
      }
      const delay = calculateBackoff(attempt, opts);
      logger.warn(
        { err, label, attempt: attempt + 1, maxRetries: opts.maxRetries, delayMs: delay },
        'Retrying after failure',
      );
      await sleep(delay, signal);
    }
  }
}
