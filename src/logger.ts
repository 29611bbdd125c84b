/**
 * Console Logging
 *
 * Components log through a small prefixed wrapper around `console` so every
 * line reads `[Scheduler] ...`, `[Catalog] ...` and so on. The threshold is
 * process-wide and normally set once from `LOG_LEVEL`.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

let threshold: LogLevel = 'info';

export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

export function getLogLevel(): LogLevel {
  return threshold;
}

export function isLevelEnabled(level: Exclude<LogLevel, 'silent'>): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[threshold];
}

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

/**
 * Creates a logger whose lines carry `[component]`.
 *
 * @example
 * ```typescript
 * const log = createLogger('Scheduler');
 * log.info(`Assigned task ${taskId} to session ${sessionId}`);
 * ```
 */
export function createLogger(component: string): Logger {
  const prefix = `[${component}]`;
  return {
    debug: (message, ...args) => {
      if (isLevelEnabled('debug')) console.debug(`${prefix} ${message}`, ...args);
    },
    info: (message, ...args) => {
      if (isLevelEnabled('info')) console.log(`${prefix} ${message}`, ...args);
    },
    warn: (message, ...args) => {
      if (isLevelEnabled('warn')) console.warn(`${prefix} ${message}`, ...args);
    },
    error: (message, ...args) => {
      if (isLevelEnabled('error')) console.error(`${prefix} ${message}`, ...args);
    },
  };
}
