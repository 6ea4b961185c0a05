/**
 * Console logger with a level threshold.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

const RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export interface Logger {
  readonly level: LogLevel;
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string, err?: unknown): void;
}

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && (LOG_LEVELS as readonly string[]).includes(value);
}

export function createLogger(level: LogLevel = 'info'): Logger {
  const enabled = (target: LogLevel): boolean => RANK[target] >= RANK[level];

  return {
    level,
    debug(message) {
      if (enabled('debug')) console.debug(message);
    },
    info(message) {
      if (enabled('info')) console.log(message);
    },
    warn(message) {
      if (enabled('warn')) console.warn(message);
    },
    error(message, err) {
      if (!enabled('error')) return;
      if (err === undefined) {
        console.error(message);
      } else {
        console.error(message, err instanceof Error ? err.message : err);
      }
    },
  };
}
