/**
 * Request Logging Middleware
 *
 * Writes one `[HTTP]` line per request once the response is ready:
 *
 * ```
 * [HTTP] POST /api/sessions/7/events -> 200 (3ms)
 * [HTTP] GET /api/tasks/99 -> 404 (1ms)
 * ```
 *
 * The level follows the status: 5xx at error, 4xx at warn, the rest at
 * info. Requests slower than `slowRequestMs` are logged at warn whatever
 * their status.
 */

import type { MiddlewareHandler } from 'hono';
import { createLogger } from '../../logger';
import type { Logger } from '../../logger';

export interface LoggerConfig {
  /** Path prefixes that are never logged */
  skipPaths: string[];
  /** Color the status code (terminal output) */
  colorize: boolean;
  slowRequestMs: number;
}

const DEFAULT_LOGGER_CONFIG: LoggerConfig = {
  skipPaths: ['/health'],
  colorize: process.env.NODE_ENV !== 'production',
  slowRequestMs: 1000,
};

function paintStatus(status: number): string {
  const code = status >= 500 ? 31 : status >= 400 ? 33 : 32;
  return `\x1b[${code}m${status}\x1b[0m`;
}

function levelFor(status: number, elapsedMs: number, slowRequestMs: number): keyof Logger {
  if (status >= 500) {
    return 'error';
  }
  return status >= 400 || elapsedMs >= slowRequestMs ? 'warn' : 'info';
}

export function loggerMiddleware(config: Partial<LoggerConfig> = {}): MiddlewareHandler {
  const { skipPaths, colorize, slowRequestMs } = { ...DEFAULT_LOGGER_CONFIG, ...config };
  const log = createLogger('HTTP');

  return async (c, next) => {
    const path = c.req.path;
    if (skipPaths.some((prefix) => path.startsWith(prefix))) {
      return next();
    }

    const startedAt = Date.now();
    await next();
    const elapsedMs = Date.now() - startedAt;

    const status = c.res.status;
    const shown = colorize ? paintStatus(status) : String(status);
    log[levelFor(status, elapsedMs, slowRequestMs)](`${c.req.method} ${path} -> ${shown} (${elapsedMs}ms)`);
  };
}
