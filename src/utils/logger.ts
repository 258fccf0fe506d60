import type { LogLevel } from '../gateway-config';

export interface Logger {
  debug(...args: unknown[]): void;
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
}

const RANK: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

let currentLevel: LogLevel = 'info';

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

const enabled = (level: LogLevel) => RANK[level] >= RANK[currentLevel];

/**
 * Console logger with a `[tag]` prefix, filtered by the process-wide LOG_LEVEL.
 */
export function createLogger(tag: string): Logger {
  const prefix = `[${tag}]`;
  return {
    debug: (...args) => { if (enabled('debug')) console.debug(prefix, ...args); },
    info: (...args) => { if (enabled('info')) console.log(prefix, ...args); },
    warn: (...args) => { if (enabled('warn')) console.warn(prefix, ...args); },
    error: (...args) => { if (enabled('error')) console.error(prefix, ...args); },
  };
}

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
