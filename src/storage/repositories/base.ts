/**
 * Base Repository Interface
 *
 * Repositories hide Drizzle queries behind domain-typed methods. They are
 * synchronous (better-sqlite3 runs every statement synchronously) and take a
 * StoreExecutor, so the same repository works on the database and inside a
 * transaction opened by a service.
 *
 * @example
 * ```typescript
 * db.transaction((tx) => {
 *   const tasks = new TaskRepository(tx);
 *   return tasks.findById(42);
 * });
 * ```
 */

/**
 * Lookup shared by every repository.
 *
 * @typeParam T - Domain model returned by the repository
 * @typeParam TKey - Primary key type
 */
export interface Repository<T, TKey = number> {
  /**
   * @returns The domain model, or null if no row has this key
   */
  findById(id: TKey): T | null;
}
