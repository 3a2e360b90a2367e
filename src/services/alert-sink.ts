import type { Redis } from 'ioredis';
import type { Logger } from '../infra/logger.js';

export type AlertKind = 'PNL_DIVERGENCE' | 'TAIL_DEGRADED';
export type AlertSeverity = 'warning' | 'critical';

export interface Alert {
  kind: AlertKind;
  severity: AlertSeverity;
  message: string;
  data: Record<string, unknown>;
  timestamp: number;
}

export interface AlertSink {
  send(alert: Alert): Promise<void>;
}

export class LogAlertSink implements AlertSink {
  private readonly logger: Logger;

  constructor(logger: Logger) {
    this.logger = logger.child({ module: 'alerts' });
  }

  async send(alert: Alert): Promise<void> {
    const fields = { alert: alert.kind, ...alert.data };
    if (alert.severity === 'critical') {
      this.logger.error(fields, alert.message);
    } else {
      this.logger.warn(fields, alert.message);
    }
  }
}

export interface RedisAlertSinkConfig {
  streamPrefix: string;
  maxLen?: number;
}

const DEFAULT_STREAM_MAX_LEN = 10_000;

/** Appends alerts to `{prefix}:alerts` for whatever notifier consumes the stream. */
export class RedisAlertSink implements AlertSink {
  private readonly redis: Redis;
  private readonly logSink: LogAlertSink;
  private readonly streamKey: string;
  private readonly maxLen: number;

  constructor(redis: Redis, config: RedisAlertSinkConfig, logger: Logger) {
    this.redis = redis;
    this.logSink = new LogAlertSink(logger);
    this.streamKey = `${config.streamPrefix}:alerts`;
    this.maxLen = config.maxLen ?? DEFAULT_STREAM_MAX_LEN;
  }

  async send(alert: Alert): Promise<void> {
    await this.logSink.send(alert);
    await this.redis.xadd(
      this.streamKey,
      'MAXLEN',
      '~',
      String(this.maxLen),
      '*',
      'kind',
      alert.kind,
      'payload',
      JSON.stringify(alert),
    );
  }
}
