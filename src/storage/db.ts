/**
 * Database Connection Factory for the Drill Engine
 *
 * Opens an SQLite database through better-sqlite3, wraps it with Drizzle ORM
 * and brings the schema up to date by applying the SQL migrations.
 *
 * Usage:
 *   import { createDatabase } from './storage/db';
 *
 *   const { db, close } = createDatabase('vocab-drill.db');
 *   const testDb = createDatabase(':memory:'); // in-memory for tests
 */

import Database from 'better-sqlite3';
import type { RunResult } from 'better-sqlite3';
import { drizzle } from 'drizzle-orm/better-sqlite3';
import type { BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import type { BaseSQLiteDatabase } from 'drizzle-orm/sqlite-core';
import * as schema from './schema';
import { applyMigrations } from './migrations';

/**
 * Type alias for the Drizzle database instance.
 */
export type AppDatabase = BetterSQLite3Database<typeof schema>;

/**
 * Anything queries can run against: the database itself or a transaction
 * opened on it. Repositories take this so the same code runs in both.
 */
export type StoreExecutor = BaseSQLiteDatabase<'sync', RunResult, typeof schema>;

export interface DatabaseHandle {
  db: AppDatabase;
  /** Raw connection, for pragmas and migrations */
  sqlite: Database.Database;
  close(): void;
}

export interface CreateDatabaseOptions {
  /** Apply pending migrations on open (default true) */
  migrate?: boolean;
  /** How long a writer waits for the lock before SQLITE_BUSY (default 5000) */
  busyTimeoutMs?: number;
}

/**
 * Creates a Drizzle database over the SQLite file at `dbPath`.
 *
 * 1. Opens/creates the file (`:memory:` for an in-memory database)
 * 2. Enables foreign keys, which SQLite leaves off by default
 * 3. Switches file databases to WAL so readers do not block the writer
 * 4. Applies pending migrations unless `migrate: false`
 */
export function createDatabase(
  dbPath: string = 'vocab-drill.db',
  options: CreateDatabaseOptions = {}
): DatabaseHandle {
  const sqlite = new Database(dbPath, { timeout: options.busyTimeoutMs ?? 5000 });

  // user_answer.uid -> user_info.uid cascades on delete
  sqlite.pragma('foreign_keys = ON');

  if (dbPath !== ':memory:') {
    sqlite.pragma('journal_mode = WAL');
  }

  if (options.migrate ?? true) {
    applyMigrations(sqlite);
  }

  const db = drizzle(sqlite, { schema });

  return {
    db,
    sqlite,
    close: () => sqlite.close(),
  };
}
