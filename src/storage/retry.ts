/**
 * Transient Store Failure Retry
 *
 * SQLite reports lock contention as SQLITE_BUSY / SQLITE_LOCKED (and their
 * extended codes such as SQLITE_BUSY_SNAPSHOT). Those are retried with
 * exponential backoff; every other error propagates unchanged. When the
 * attempts run out the operation fails with StoreUnavailableError.
 */

import { StoreUnavailableError } from '../core/errors';
import { createLogger } from '../logger';
import type { RetryConfig } from '../config';

const log = createLogger('Store');

export const DEFAULT_RETRY: RetryConfig = {
  attempts: 3,
  baseDelayMs: 50,
  maxDelayMs: 1000,
};

export interface RetryOptions extends RetryConfig {
  /** Replaceable in tests */
  sleep?: (ms: number) => Promise<void>;
}

const TRANSIENT_CODES = ['SQLITE_BUSY', 'SQLITE_LOCKED'];

/**
 * True for lock-contention errors, looking through `cause` chains.
 */
export function isTransientStoreError(error: unknown): boolean {
  let current: unknown = error;
  for (let depth = 0; depth < 5 && typeof current === 'object' && current !== null; depth++) {
    if ('code' in current && typeof current.code === 'string') {
      const code = current.code;
      if (TRANSIENT_CODES.some((prefix) => code === prefix || code.startsWith(`${prefix}_`))) {
        return true;
      }
    }
    current = 'cause' in current ? current.cause : undefined;
  }
  return false;
}

/**
 * Delay before retry number `attempt` (1-based): base * 2^(attempt-1), capped.
 */
export function backoffDelay(attempt: number, baseDelayMs: number, maxDelayMs: number): number {
  return Math.min(maxDelayMs, baseDelayMs * Math.pow(2, attempt - 1));
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Runs `fn`, retrying transient store failures.
 *
 * @param operation - Name used in logs and in the StoreUnavailableError
 * @throws {StoreUnavailableError} After `attempts` transient failures
 */
export async function withStoreRetry<T>(
  operation: string,
  fn: () => T | Promise<T>,
  options: RetryOptions = DEFAULT_RETRY
): Promise<T> {
  const sleep = options.sleep ?? defaultSleep;
  const attempts = Math.max(1, options.attempts);

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      if (!isTransientStoreError(error)) {
        throw error;
      }
      if (attempt >= attempts) {
        log.error(`${operation} failed after ${attempt} attempt(s)`, error);
        throw new StoreUnavailableError(operation, attempt, { cause: error });
      }
      const delay = backoffDelay(attempt, options.baseDelayMs, options.maxDelayMs);
      log.warn(`${operation} hit a locked store, retrying in ${delay}ms (attempt ${attempt}/${attempts})`);
      await sleep(delay);
    }
  }
}
