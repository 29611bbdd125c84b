/**
 * Storage Module - Barrel Export
 *
 * Usage:
 *   import { createDatabase, DrillStore } from './storage';
 *
 *   const { db } = createDatabase(':memory:');
 *   const store = new DrillStore(db);
 */

export { createDatabase } from './db';
export type { AppDatabase, StoreExecutor, DatabaseHandle, CreateDatabaseOptions } from './db';

export { applyMigrations, listMigrations, runMigrations, MIGRATIONS_DIR } from './migrations';

export { DrillStore } from './store';

export { withStoreRetry, isTransientStoreError, backoffDelay, DEFAULT_RETRY } from './retry';
export type { RetryOptions } from './retry';

export { userInfo, userState, taskInfo, userTask, userAnswer } from './schema';

export type {
  UserInfoRow,
  NewUserInfoRow,
  UserStateRow,
  NewUserStateRow,
  TaskInfoRow,
  NewTaskInfoRow,
  UserTaskRow,
  NewUserTaskRow,
  UserAnswerRow,
  NewUserAnswerRow,
} from './schema';

export * from './repositories';
