/**
 * Tagged Logger — TypeScript
 *
 * Leveled logging with a per-module tag. Everything is written to stderr:
 * stdout belongs to the JSON-RPC stream.
 *
 * Usage:
 *   const log = createLogger('clipboard:history');
 *   log.debug('Reading history from', file);
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

let globalLogLevel: LogLevel = 'info';

export function setLogLevel(level: LogLevel): void {
  globalLogLevel = level;
}

export function getLogLevel(): LogLevel {
  return globalLogLevel;
}

/** Create a logger whose lines are prefixed with `[tag]`. */
export function createLogger(tag: string): Logger {
  const prefix = `[${tag}]`;

  const shouldLog = (level: LogLevel): boolean =>
    LEVEL_ORDER[level] >= LEVEL_ORDER[globalLogLevel];

  return {
    debug(message: string, ...args: unknown[]) {
      if (shouldLog('debug')) console.error(prefix, 'DEBUG', message, ...args);
    },
    info(message: string, ...args: unknown[]) {
      if (shouldLog('info')) console.error(prefix, 'INFO', message, ...args);
    },
    warn(message: string, ...args: unknown[]) {
      if (shouldLog('warn')) console.warn(prefix, 'WARN', message, ...args);
    },
    error(message: string, ...args: unknown[]) {
      if (shouldLog('error')) console.error(prefix, 'ERROR', message, ...args);
    },
  };
}
