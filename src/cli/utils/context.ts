/**
 * CLI Context
 *
 * Opens the configured database and wires the services for one CLI
 * invocation. Commands receive the services, never the raw database.
 */

import { getConfig, type Config } from '../../config';
import { setLogLevel } from '../../logger';
import { createDrillServices, serviceOptionsFromConfig, type DrillServices } from '../../services';
import { createDatabase } from '../../storage/db';

export interface CliContext {
  config: Config;
  services: DrillServices;
  close(): void;
}

export function openContext(): CliContext {
  const config = getConfig();
  setLogLevel(config.logging.level);

  const database = createDatabase(config.database.path);
  const services = createDrillServices(database.db, serviceOptionsFromConfig(config));

  return { config, services, close: database.close };
}

/**
 * Runs `work` against a fresh context and closes the database afterwards,
 * whether or not the work succeeded.
 */
export async function withContext<T>(work: (context: CliContext) => Promise<T>): Promise<T> {
  const context = openContext();
  try {
    return await work(context);
  } finally {
    context.close();
  }
}
