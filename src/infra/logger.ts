import pino from 'pino';
import type { AppConfig } from '../config/env.js';

export function createLogger(config: Pick<AppConfig, 'logLevel' | 'nodeEnv'>): pino.Logger {
  return pino({
    name: 'trade-ledger',
    level: config.logLevel,
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level(label) {
        return { level: label };
      },
    },
    ...(config.nodeEnv === 'development'
      ? {
          transport: {
            target: 'pino/file',
            options: { destination: 1 },
          },
        }
      : {}),
    redact: {
      paths: ['apiKey', 'password', 'TRON_API_KEY', 'DATABASE_URL', 'headers["TRON-PRO-API-KEY"]'],
      censor: '[REDACTED]',
    },
  });
}

export type Logger = pino.Logger;
