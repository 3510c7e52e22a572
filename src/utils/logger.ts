// =============================================================================
// LOGGING
// =============================================================================

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_ORDER, value);
}

/**
 * Reads LOG_LEVEL on every call so tests and hosts can change it at runtime.
 */
export function currentLogLevel(): LogLevel {
  const raw = (process.env.LOG_LEVEL ?? '').trim().toLowerCase();
  return isLogLevel(raw) ? raw : 'info';
}

/**
 * Creates a console logger whose lines are prefixed with `[scope]`.
 */
export function createLogger(scope: string): Logger {
  const prefix = `[${scope}]`;
  const enabled = (level: LogLevel) => LEVEL_ORDER[level] >= LEVEL_ORDER[currentLogLevel()];

  return {
    debug(message, ...details) {
      if (enabled('debug')) console.debug(`${prefix} ${message}`, ...details);
    },
    info(message, ...details) {
      if (enabled('info')) console.info(`${prefix} ${message}`, ...details);
    },
    warn(message, ...details) {
      if (enabled('warn')) console.warn(`${prefix} ${message}`, ...details);
    },
    error(message, ...details) {
      if (enabled('error')) console.error(`${prefix} ${message}`, ...details);
    },
  };
}
