import { describe, it, expect, vi } from 'vitest';
import type { Redis } from 'ioredis';
import { LogAlertSink, RedisAlertSink, type Alert } from './alert-sink.js';
import { createMockLogger } from '../testing/fixtures.js';

const divergence: Alert = {
  kind: 'PNL_DIVERGENCE',
  severity: 'warning',
  message: 'Reported PnL differs from computed PnL',
  data: { eventUid: 'uid-1', reported: '17', computed: '18' },
  timestamp: 1_700_000_000_000,
};

const degraded: Alert = {
  kind: 'TAIL_DEGRADED',
  severity: 'critical',
  message: 'Tail failed 3 polls in a row',
  data: { failures: 3 },
  timestamp: 1_700_000_000_000,
};

describe('LogAlertSink', () => {
  it('logs warnings and critical alerts at matching levels', async () => {
    const logger = createMockLogger();
    const sink = new LogAlertSink(logger);

    await sink.send(divergence);
    await sink.send(degraded);

    expect(logger.warn).toHaveBeenCalledWith(
      { alert: 'PNL_DIVERGENCE', eventUid: 'uid-1', reported: '17', computed: '18' },
      'Reported PnL differs from computed PnL',
    );
    expect(logger.error).toHaveBeenCalledWith(
      { alert: 'TAIL_DEGRADED', failures: 3 },
      'Tail failed 3 polls in a row',
    );
  });
});

describe('RedisAlertSink', () => {
  it('appends the alert to a capped stream', async () => {
    const xadd = vi.fn().mockResolvedValue('1-0');
    const redis = { xadd } as unknown as Redis;
    const sink = new RedisAlertSink(redis, { streamPrefix: 'ledger' }, createMockLogger());

    await sink.send(divergence);

    expect(xadd).toHaveBeenCalledWith(
      'ledger:alerts',
      'MAXLEN',
      '~',
      '10000',
      '*',
      'kind',
      'PNL_DIVERGENCE',
      'payload',
      JSON.stringify(divergence),
    );
  });

  it('logs before publishing and surfaces publish failures', async () => {
    const logger = createMockLogger();
    const redis = {
      xadd: vi.fn().mockRejectedValue(new Error('Stream isn\'t writeable')),
    } as unknown as Redis;
    const sink = new RedisAlertSink(redis, { streamPrefix: 'ledger', maxLen: 50 }, logger);

    await expect(sink.send(degraded)).rejects.toThrow("Stream isn't writeable");
    expect(logger.error).toHaveBeenCalledTimes(1);
  });
});
