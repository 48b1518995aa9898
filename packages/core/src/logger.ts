/**
 * Scoped console logger. Lines are prefixed with the scope, e.g.
 * `[STORE]: saved 3 task(s)`, and filtered by level.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

export const LOG_LEVEL_NAMES: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

let currentLevel: LogLevel = 'warn';

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVEL_NAMES.some(level => level === value);
}

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

export interface Logger {
  debug(...args: unknown[]): void;
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
}

function enabled(level: Exclude<LogLevel, 'silent'>): boolean {
  return LOG_LEVELS[level] >= LOG_LEVELS[currentLevel];
}

/** Diagnostics go to stderr so command output on stdout stays clean */
export function createLogger(scope: string): Logger {
  const prefix = `[${scope.toUpperCase()}]:`;
  return {
    debug: (...args) => { if (enabled('debug')) console.error(prefix, ...args); },
    info: (...args) => { if (enabled('info')) console.error(prefix, ...args); },
    warn: (...args) => { if (enabled('warn')) console.warn(prefix, ...args); },
    error: (...args) => { if (enabled('error')) console.error(prefix, ...args); },
  };
}
