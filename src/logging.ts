// src/logging.ts
// What: Application logger factory.
// How: Creates a pino logger from AppConfig. In development, attempts to use the pino-pretty transport
//      for readable logs. Components derive child loggers (`logger.child({ component })`).

import { pino, type Logger, type LoggerOptions } from 'pino';
import type { AppConfig } from './config/env.js';

export type { Logger };

export function createLogger(config: Pick<AppConfig, 'NODE_ENV' | 'LOG_LEVEL'>): Logger {
  const isDev = config.NODE_ENV === 'development';
  const baseOptions: LoggerOptions = {
    level: config.LOG_LEVEL ?? (isDev ? 'debug' : 'info'),
  };

  // Try pretty transport in development; fall back to standard if unavailable.
  if (isDev) {
    try {
      return pino({
        ...baseOptions,
        transport: {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'SYS:standard',
            singleLine: false,
          },
        },
      });
    } catch (err) {
      const logger = pino(baseOptions);
      logger.warn({ err }, 'pino-pretty transport unavailable; using JSON logs');
      return logger;
    }
  }
  return pino(baseOptions);
}

/** Logger that discards everything; used where a caller supplies none. */
export function silentLogger(): Logger {
  return pino({ level: 'silent' });
}
