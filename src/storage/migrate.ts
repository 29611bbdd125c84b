/**
 * Database Migration Script
 *
 * Applies pending SQL migrations to the configured database.
 *
 * Usage:
 *   npm run db:migrate
 *   DATABASE_PATH=/path/to/db npm run db:migrate
 */

import { getConfig } from '../config';
import { setLogLevel } from '../logger';
import { runMigrations } from './migrations';

try {
  const config = getConfig();
  setLogLevel(config.logging.level);
  runMigrations(config.database.path);
} catch (error) {
  console.error('[migrate] Migration failed:', error);
  process.exit(1);
}
