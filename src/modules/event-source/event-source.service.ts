import axios, { AxiosError, type AxiosAdapter, type AxiosInstance } from 'axios';
import { z } from 'zod';
import type { EventSourceConfig } from '../../config/env.js';
import {
  ContractNotFoundError,
  NetworkError,
  TimeoutError,
} from '../../infra/errors.js';
import type { Logger } from '../../infra/logger.js';

export const MAX_PAGE_SIZE = 200;

const TIMEOUT_CODES = new Set(['ECONNABORTED', 'ETIMEDOUT']);

export const rawEventSchema = z.object({
  transaction_id: z.string().min(1),
  block_number: z.number().int().nonnegative(),
  block_timestamp: z.number().int().nonnegative().nullish(),
  event_index: z.number().int().nonnegative().default(0),
  event_name: z.string().min(1),
  contract_address: z.string().optional(),
  result: z.record(z.string(), z.unknown()).default({}),
});

export type RawEvent = z.infer<typeof rawEventSchema>;

/** Envelope returned by `GET /v1/contracts/{address}/events`. */
export const eventsResponseSchema = z.object({
  success: z.boolean().optional(),
  error: z.string().optional(),
  data: z.array(z.unknown()).default([]),
  fingerprint: z.string().optional(),
  meta: z
    .object({
      at: z.number().optional(),
      page_size: z.number().optional(),
      fingerprint: z.string().optional(),
      links: z.object({ next: z.string().optional() }).optional(),
    })
    .optional(),
});

export type EventsResponse = z.infer<typeof eventsResponseSchema>;

export interface EventPage {
  /** Unsorted; order by (block_number, event_index) before applying. */
  events: RawEvent[];
  /** Envelopes that failed the event schema and were dropped. */
  malformed: number;
  /** Null once the currently available history is exhausted. */
  nextCursor: string | null;
}

/**
 * `oldest` walks history forwards page by page; `newest` returns the latest
 * page, which is what a poller needs.
 */
export type EventOrder = 'oldest' | 'newest';

export interface EventSource {
  fetchPage(contract: string, cursor?: string | null, order?: EventOrder): Promise<EventPage>;
}

const ORDER_BY: Record<EventOrder, string> = {
  oldest: 'block_timestamp,asc',
  newest: 'block_timestamp,desc',
};

function fingerprintFromLink(link: string | undefined): string | null {
  if (!link || !URL.canParse(link)) return null;
  return new URL(link).searchParams.get('fingerprint') || null;
}

/**
 * Pagination cursor, from the first of: `meta.fingerprint`, a top-level
 * `fingerprint`, or the `fingerprint` parameter of `meta.links.next`.
 */
export function extractCursor(body: EventsResponse): string | null {
  return (
    body.meta?.fingerprint ||
    body.fingerprint ||
    fingerprintFromLink(body.meta?.links?.next) ||
    null
  );
}

export class EventSourceClient implements EventSource {
  private readonly http: AxiosInstance;
  private readonly pageSize: number;
  private readonly logger: Logger;

  constructor(config: EventSourceConfig, logger: Logger, adapter?: AxiosAdapter) {
    this.pageSize = Math.min(Math.max(config.pageSize, 1), MAX_PAGE_SIZE);
    this.logger = logger.child({ module: 'event-source' });
    this.http = axios.create({
      baseURL: config.baseUrl,
      timeout: config.timeoutMs,
      headers: {
        Accept: 'application/json',
        ...(config.apiKey ? { 'TRON-PRO-API-KEY': config.apiKey } : {}),
      },
      // Status codes are mapped to error kinds below.
      validateStatus: () => true,
      ...(adapter ? { adapter } : {}),
    });
  }

  async fetchPage(
    contract: string,
    cursor?: string | null,
    order: EventOrder = 'oldest',
  ): Promise<EventPage> {
    const path = `/v1/contracts/${encodeURIComponent(contract)}/events`;
    const params: Record<string, string | number> = {
      limit: this.pageSize,
      only_confirmed: 'true',
      order_by: ORDER_BY[order],
    };
    if (cursor) {
      params['fingerprint'] = cursor;
    }

    const response = await this.http.get<unknown>(path, { params }).catch((err: unknown) => {
      throw this.toNetworkError(err, path);
    });

    const { status } = response;
    if (status === 404) {
      throw new ContractNotFoundError(contract, `${this.http.defaults.baseURL ?? ''}${path}`);
    }
    if (status === 429 || status >= 500) {
      throw new NetworkError(`Event source returned HTTP ${status}`, { status, retryable: true });
    }
    if (status < 200 || status >= 300) {
      throw new NetworkError(`Event source returned HTTP ${status}`, { status });
    }

    const parsed = eventsResponseSchema.safeParse(response.data);
    if (!parsed.success) {
      throw new NetworkError(
        `Unexpected event source response: ${parsed.error.issues[0]?.message ?? 'invalid body'}`,
        { status },
      );
    }
    if (parsed.data.success === false) {
      throw new NetworkError(`Event source reported failure: ${parsed.data.error ?? 'unknown'}`, {
        status,
      });
    }

    const events: RawEvent[] = [];
    let malformed = 0;
    for (const [index, entry] of parsed.data.data.entries()) {
      const event = rawEventSchema.safeParse(entry);
      if (event.success) {
        events.push(event.data);
      } else {
        malformed++;
        this.logger.warn(
          { index, issues: event.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`) },
          'Dropping malformed event envelope',
        );
      }
    }

    const nextCursor = extractCursor(parsed.data);
    this.logger.debug(
      { contract, cursor: cursor ?? null, count: events.length, malformed, nextCursor },
      'Fetched event page',
    );

    return { events, malformed, nextCursor };
  }

  private toNetworkError(err: unknown, path: string): NetworkError {
    if (err instanceof AxiosError) {
      if (err.code && TIMEOUT_CODES.has(err.code)) {
        return new TimeoutError(`Event source request timed out: ${path}`, err);
      }
      return new NetworkError(`Event source request failed: ${err.message}`, {
        retryable: true,
        cause: err,
      });
    }
    const message = err instanceof Error ? err.message : String(err);
    return new NetworkError(`Event source request failed: ${message}`, {
      retryable: true,
      cause: err,
    });
  }
}
