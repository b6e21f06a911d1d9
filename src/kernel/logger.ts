/**
 * Curia — Logging
 *
 * Structured logging using Pino. The level comes from the configuration file
 * and can be overridden with CURIA_LOG_LEVEL. Log lines go to stderr so that
 * stdout carries only command output.
 *
 * @module kernel/logger
 */

import { pino, type DestinationStream, type Logger, type LoggerOptions } from 'pino';
import { getConfig } from '../config/config.js';
import { LogLevelSchema, type LogLevel } from '../types/index.js';

function resolveLevel(level?: string): LogLevel {
  const parsed = LogLevelSchema.safeParse(level ?? process.env.CURIA_LOG_LEVEL);
  return parsed.success ? parsed.data : getConfig().logging.level;
}

export function createRootLogger(options?: { level?: string; destination?: DestinationStream }): Logger {
  const opts: LoggerOptions = {
    name: 'curia',
    level: resolveLevel(options?.level),
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label: string) => ({ level: label }),
    },
  };
  return pino(opts, options?.destination ?? process.stderr);
}

let root: Logger | null = null;

export function createLogger(component: string): Logger {
  if (root === null) {
    root = createRootLogger();
  }
  return root.child({ component });
}
