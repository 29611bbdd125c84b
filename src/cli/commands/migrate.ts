/**
 * Migrate Command
 *
 * Applies pending SQL migrations to the configured database.
 */

import { runMigrations } from '../../storage/migrations';
import { dim, green } from '../utils/terminal';

export function runMigrateCommand(dbPath: string): string[] {
  const applied = runMigrations(dbPath);
  console.log(
    applied.length > 0 ? green(`Applied ${applied.length} migration(s).`) : dim('Database is up to date.')
  );
  return applied;
}
