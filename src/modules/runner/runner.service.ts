import type { Container } from '../../infra/container.js';
import { ConfigError, isRetryable } from '../../infra/errors.js';
import type { Logger } from '../../infra/logger.js';
import { calculateBackoff, sleep, withRetry, type RetryOptions } from '../../services/retry.js';
import { SeenCache } from '../../services/seen-cache.js';
import type { EventParser } from '../event-parser/event-parser.service.js';
import type { EventSource, RawEvent } from '../event-source/event-source.service.js';
import type { LedgerService } from '../ledger-engine/ledger.service.js';

export interface RunStats {
  /** Raw events handled, including ignored and skipped ones. */
  events: number;
  pages: number;
  applied: number;
  duplicates: number;
  /** Trade events that failed to parse or decode. */
  skipped: number;
  /** Events of other types. */
  ignored: number;
  /** Envelopes dropped by the event source schema. */
  malformed: number;
}

export interface BackfillSummary extends RunStats {
  /** False when the run was cancelled before history was exhausted. */
  completed: boolean;
}

export type RunnerMode = 'idle' | 'backfill' | 'tail';

export interface RunnerStatus {
  mode: RunnerMode;
  totals: RunStats;
  consecutiveFailures: number;
  lastPollAt: string | null;
  lastError: string | null;
  seenCacheSize: number;
}

export interface RunnerOptions {
  retry?: Partial<RetryOptions>;
  /** Overrides TAIL_INTERVAL_MS. */
  intervalMs?: number;
  /** Consecutive failed polls before a TAIL_DEGRADED alert. */
  degradedAfter?: number;
}

type EventResult = 'applied' | 'duplicate' | 'skipped' | 'ignored';

const DEFAULT_DEGRADED_AFTER = 3;

function emptyStats(): RunStats {
  return { events: 0, pages: 0, applied: 0, duplicates: 0, skipped: 0, ignored: 0, malformed: 0 };
}

function byChainPosition(a: RawEvent, b: RawEvent): number {
  return a.block_number - b.block_number || a.event_index - b.event_index;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export class Runner {
  private readonly container: Container;
  private readonly source: EventSource;
  private readonly parser: EventParser;
  private readonly ledger: LedgerService;
  private readonly logger: Logger;
  private readonly retry: Partial<RetryOptions>;
  private readonly intervalMs: number;
  private readonly degradedAfter: number;
  private readonly seen: SeenCache;
  private readonly totals: RunStats = emptyStats();
  private mode: RunnerMode = 'idle';
  private consecutiveFailures = 0;
  private lastPollAt: Date | null = null;
  private lastError: string | null = null;

  constructor(
    container: Container,
    source: EventSource,
    parser: EventParser,
    ledger: LedgerService,
    options: RunnerOptions = {},
  ) {
    this.container = container;
    this.source = source;
    this.parser = parser;
    this.ledger = ledger;
    this.logger = container.logger.child({ module: 'runner' });
    this.retry = options.retry ?? {};
    this.intervalMs = options.intervalMs ?? container.config.tail.intervalMs;
    this.degradedAfter = options.degradedAfter ?? DEFAULT_DEGRADED_AFTER;
    this.seen = new SeenCache(container.config.tail.seenCacheSize);
  }

  /**
   * Walks the full confirmed history page by page. Each page is sorted and
   * applied before the next fetch, so a failure never skips ahead of the
   * last applied event.
   */
  async backfill(signal?: AbortSignal): Promise<BackfillSummary> {
    const contract = this.container.config.contractAddress;
    const summary = emptyStats();
    let cursor: string | null = null;
    let completed = false;

    this.mode = 'backfill';
    this.logger.info({ contract }, 'Starting backfill');
    try {
      while (!signal?.aborted) {
        const page = await withRetry(
          () => this.source.fetchPage(contract, cursor, 'oldest'),
          'fetchPage',
          this.logger,
          { ...this.retry, shouldRetry: isRetryable, signal },
        );
        summary.pages++;
        summary.malformed += page.malformed;

        if (page.events.length === 0 && page.malformed === 0) {
          completed = true;
          break;
        }
        if (!(await this.applyEvents(page.events, summary, signal))) {
          break;
        }

        if (!page.nextCursor) {
          completed = true;
          break;
        }
        if (page.nextCursor === cursor) {
          this.logger.warn({ cursor }, 'Event source repeated the cursor; stopping');
          completed = true;
          break;
        }
        cursor = page.nextCursor;
        this.logger.debug({ pages: summary.pages, events: summary.events }, 'Backfill page applied');
      }
    } finally {
      this.addToTotals(summary);
      this.mode = 'idle';
    }

    this.logger.info({ ...summary, completed }, completed ? 'Backfill complete' : 'Backfill cancelled');
    return { ...summary, completed };
  }

  /**
   * Polls the newest page until `signal` aborts. Failed polls back off
   * exponentially; a configuration error ends the loop.
   */
  async tail(signal: AbortSignal): Promise<void> {
    const { maxBackoffMs } = this.container.config.tail;
    this.mode = 'tail';
    this.logger.info({ intervalMs: this.intervalMs }, 'Tailing events');

    try {
      while (!signal.aborted) {
        let delay = this.intervalMs;
        try {
          await this.pollOnce(signal);
          this.consecutiveFailures = 0;
          this.lastError = null;
        } catch (err) {
          if (err instanceof ConfigError) {
            this.logger.fatal({ err }, 'Tail stopped by configuration error');
            throw err;
          }
          this.consecutiveFailures++;
          this.lastError = errorMessage(err);
          delay = calculateBackoff(this.consecutiveFailures, {
            baseDelayMs: this.intervalMs,
            maxDelayMs: maxBackoffMs,
          });
          this.logger.error(
            { err, failures: this.consecutiveFailures, nextPollMs: delay },
            'Tail poll failed',
          );
          if (this.consecutiveFailures === this.degradedAfter) {
            await this.alertDegraded(err);
          }
        }
        await sleep(delay, signal);
      }
    } finally {
      this.mode = 'idle';
    }
    this.logger.info('Tail stopped');
  }

  /**
   * Fetches the newest page once and applies events not seen recently, in
   * chain order.
   */
  async pollOnce(signal?: AbortSignal): Promise<RunStats> {
    const stats = emptyStats();
    try {
      const page = await this.source.fetchPage(
        this.container.config.contractAddress,
        null,
        'newest',
      );
      this.lastPollAt = new Date();
      stats.pages = 1;
      stats.malformed = page.malformed;

      const fresh = page.events.filter(
        (raw) => !this.parser.supports(raw.event_name) || !this.seen.has(this.parser.eventUid(raw)),
      );
      await this.applyEvents(fresh, stats, signal);
    } finally {
      this.addToTotals(stats);
    }

    if (stats.applied > 0 || stats.skipped > 0) {
      this.logger.info(stats, 'Poll applied new events');
    }
    return stats;
  }

  getStatus(): RunnerStatus {
    return {
      mode: this.mode,
      totals: { ...this.totals },
      consecutiveFailures: this.consecutiveFailures,
      lastPollAt: this.lastPollAt?.toISOString() ?? null,
      lastError: this.lastError,
      seenCacheSize: this.seen.size,
    };
  }

  /** Resolves false when cancelled part-way through. */
  private async applyEvents(
    events: RawEvent[],
    stats: RunStats,
    signal?: AbortSignal,
  ): Promise<boolean> {
    for (const raw of [...events].sort(byChainPosition)) {
      if (signal?.aborted) return false;
      const result = await this.applyEvent(raw);
      stats.events++;
      if (result === 'applied') stats.applied++;
      else if (result === 'duplicate') stats.duplicates++;
      else if (result === 'skipped') stats.skipped++;
      else stats.ignored++;
    }
    return true;
  }

  private async applyEvent(raw: RawEvent): Promise<EventResult> {
    if (!this.parser.supports(raw.event_name)) {
      this.logger.debug({ event: raw.event_name, txId: raw.transaction_id }, 'Ignoring event');
      return 'ignored';
    }

    const uid = this.parser.eventUid(raw);
    const parsed = this.parser.parse(raw);
    if (!parsed.ok) {
      this.logger.warn(
        {
          err: parsed.error,
          eventUid: uid,
          txId: raw.transaction_id,
          block: raw.block_number,
          index: raw.event_index,
        },
        'Skipping malformed trade event',
      );
      this.seen.add(uid);
      return 'skipped';
    }

    const outcome = await this.ledger.applyEvent(parsed.value);
    this.seen.add(uid);
    return outcome.status;
  }

  private addToTotals(stats: RunStats): void {
    this.totals.events += stats.events;
    this.totals.pages += stats.pages;
    this.totals.applied += stats.applied;
    this.totals.duplicates += stats.duplicates;
    this.totals.skipped += stats.skipped;
    this.totals.ignored += stats.ignored;
    this.totals.malformed += stats.malformed;
  }

  private async alertDegraded(err: unknown): Promise<void> {
    await this.container.alerts
      .send({
        kind: 'TAIL_DEGRADED',
        severity: 'critical',
        message: `Tail failed ${this.consecutiveFailures} polls in a row`,
        data: {
          contract: this.container.config.contractAddress,
          failures: this.consecutiveFailures,
          error: errorMessage(err),
        },
        timestamp: Date.now(),
      })
      .catch((alertErr: unknown) => {
        this.logger.error({ err: alertErr }, 'Failed to deliver tail degraded alert');
      });
  }
}
