/**
 * Logger
 *
 * Thin console wrapper with a process-wide level filter. Each logger prefixes
 * its messages with a scope, e.g. `[ExpandableText] truncation changed`.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

let currentLevel: LogLevel = 'warn';

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

/**
 * Parse a level name (case-insensitive). Unknown values return undefined.
 */
export function parseLogLevel(value: string | null | undefined): LogLevel | undefined {
  if (!value) return undefined;
  const normalized = value.trim().toLowerCase();
  return isLogLevel(normalized) ? normalized : undefined;
}

function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_ORDER, value);
}

export function isLevelEnabled(level: Exclude<LogLevel, 'silent'>): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[currentLevel];
}

export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

export function createLogger(scope: string): Logger {
  const prefix = `[${scope}]`;
  return {
    debug: (message, ...details) => {
      if (isLevelEnabled('debug')) console.debug(prefix, message, ...details);
    },
    info: (message, ...details) => {
      if (isLevelEnabled('info')) console.info(prefix, message, ...details);
    },
    warn: (message, ...details) => {
      if (isLevelEnabled('warn')) console.warn(prefix, message, ...details);
    },
    error: (message, ...details) => {
      if (isLevelEnabled('error')) console.error(prefix, message, ...details);
    },
  };
}
