/**
 * SQL Migration Runner
 *
 * Migrations are plain `.sql` files in the top-level `migrations/` folder.
 * They are applied in file-name order, each inside its own transaction, and
 * recorded in `schema_migrations` so that re-running is a no-op.
 */

import { readdirSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';
import Database from 'better-sqlite3';
import { createLogger } from '../logger';

const log = createLogger('migrate');

/**
 * Default location of the migration files, relative to this module.
 */
export const MIGRATIONS_DIR = fileURLToPath(new URL('../../migrations', import.meta.url));

/**
 * Lists the migration files in apply order.
 */
export function listMigrations(migrationsDir: string = MIGRATIONS_DIR): string[] {
  return readdirSync(migrationsDir)
    .filter((file) => file.endsWith('.sql'))
    .sort();
}

/**
 * Applies every migration not yet recorded.
 *
 * @returns Names of the migrations applied by this call
 */
export function applyMigrations(
  sqlite: Database.Database,
  migrationsDir: string = MIGRATIONS_DIR
): string[] {
  sqlite.exec(
    'CREATE TABLE IF NOT EXISTS schema_migrations (name TEXT PRIMARY KEY, applied_at INTEGER NOT NULL)'
  );

  const applied = new Set(
    sqlite
      .prepare<[], { name: string }>('SELECT name FROM schema_migrations')
      .all()
      .map((row) => row.name)
  );

  const record = sqlite.prepare<[string, number]>(
    'INSERT INTO schema_migrations (name, applied_at) VALUES (?, ?)'
  );

  const pending = listMigrations(migrationsDir).filter((name) => !applied.has(name));

  for (const name of pending) {
    const sql = readFileSync(join(migrationsDir, name), 'utf8');
    sqlite.transaction(() => {
      sqlite.exec(sql);
      record.run(name, Date.now());
    })();
  }

  return pending;
}

/**
 * Opens the database file, applies pending migrations and logs the result.
 * Used by `npm run db:migrate` and the `migrate` CLI command.
 */
export function runMigrations(dbPath: string, migrationsDir: string = MIGRATIONS_DIR): string[] {
  log.info(`Database path: ${dbPath}`);
  log.info(`Migrations folder: ${migrationsDir}`);

  const sqlite = new Database(dbPath);
  try {
    sqlite.pragma('foreign_keys = ON');
    const applied = applyMigrations(sqlite, migrationsDir);

    if (applied.length === 0) {
      log.info('Database is up to date.');
    }
    for (const name of applied) {
      log.info(`Applied ${name}`);
    }

    return applied;
  } finally {
    sqlite.close();
  }
}
