export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_ORDER, value);
}

// LOG_LEVEL is read on every call so tests and .env reloads pick it up
function currentLevel(): LogLevel {
  const raw = (process.env.LOG_LEVEL || 'info').trim().toLowerCase();
  return isLogLevel(raw) ? raw : 'info';
}

export function isLevelEnabled(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[currentLevel()];
}

export interface Logger {
  debug(...args: unknown[]): void;
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
}

/**
 * Console logger that prefixes every line with `[TAG]`.
 */
export function createLogger(tag: string): Logger {
  const prefix = `[${tag}]`;
  return {
    debug: (...args) => {
      if (isLevelEnabled('debug')) console.debug(prefix, ...args);
    },
    info: (...args) => {
      if (isLevelEnabled('info')) console.log(prefix, ...args);
    },
    warn: (...args) => {
      if (isLevelEnabled('warn')) console.warn(prefix, ...args);
    },
    error: (...args) => {
      if (isLevelEnabled('error')) console.error(prefix, ...args);
    },
  };
}
