/**
 * @toolgate/core: Logger
 *
 * Structured logging via pino. Components accept an optional Logger and
 * derive children carrying their own bindings.
 */

import { pino, type Logger } from 'pino';
import { env, type LogLevel } from './env.js';

export type { Logger } from 'pino';

export interface LoggerConfig {
  level?: LogLevel;
  /** Bindings included in every line */
  base?: Record<string, unknown>;
}

function defaultLevel(): LogLevel {
  if (env.LOG_LEVEL) return env.LOG_LEVEL;
  return env.NODE_ENV === 'test' ? 'silent' : 'info';
}

export function createLogger(config: LoggerConfig = {}): Logger {
  return pino({
    level: config.level ?? defaultLevel(),
    base: { service: 'toolgate', ...config.base },
  });
}

/** Process-wide root logger */
export const logger: Logger = createLogger();
