/**
 * Transactional Store Access
 *
 * Services never touch the database directly: they hand a callback to
 * `read` or `write`, which binds the repositories to the right executor and
 * retries transient lock failures.
 *
 * `write` opens a `BEGIN IMMEDIATE` transaction, taking SQLite's write lock
 * up front so that the read-then-write sequences inside (eligibility check
 * plus insert, compare-and-swap on an assignment) cannot interleave with
 * another writer. Callbacks must be synchronous.
 */

import type { AppDatabase } from './db';
import { createRepositories } from './repositories';
import type { Repositories } from './repositories';
import { DEFAULT_RETRY, withStoreRetry } from './retry';
import type { RetryOptions } from './retry';

export class DrillStore {
  constructor(
    private readonly db: AppDatabase,
    private readonly retry: RetryOptions = DEFAULT_RETRY
  ) {}

  /**
   * Runs read-only work outside a transaction.
   */
  read<T>(operation: string, work: (repos: Repositories) => T): Promise<T> {
    return withStoreRetry(operation, () => work(createRepositories(this.db)), this.retry);
  }

  /**
   * Runs `work` in one immediate transaction; a throw rolls everything back.
   */
  write<T>(operation: string, work: (repos: Repositories) => T): Promise<T> {
    return withStoreRetry(
      operation,
      () => this.db.transaction((tx) => work(createRepositories(tx)), { behavior: 'immediate' }),
      this.retry
    );
  }
}
