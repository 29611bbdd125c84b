/**
 * Vocabulary Drill API Server
 *
 * Opens the configured database, wires the services and serves the Hono
 * application on Node's HTTP server. When SCHEDULER_SWEEP_INTERVAL_MINUTES
 * is set, overdue assignments are also expired in the background.
 *
 * Usage:
 *   npm run server
 *
 * @example
 * ```bash
 * PORT=8080 DATABASE_PATH=/var/data/drill.db npm run server
 * ```
 */

import { serve } from '@hono/node-server';
import { getConfig } from '../config';
import { createLogger, setLogLevel } from '../logger';
import { createDrillServices, serviceOptionsFromConfig } from '../services';
import { createDatabase } from '../storage/db';
import { createApp } from './app';

const log = createLogger('Server');

export function startServer(): void {
  const config = getConfig();
  setLogLevel(config.logging.level);

  const database = createDatabase(config.database.path);
  const services = createDrillServices(database.db, serviceOptionsFromConfig(config));

  const app = createApp(services, {
    tasksDir: config.tasks.dir,
    environment: config.server.nodeEnv,
  });

  const stopSweep =
    config.scheduler.sweepIntervalMs > 0
      ? services.scheduler.startSweep(config.scheduler.sweepIntervalMs)
      : () => {};

  const server = serve(
    { fetch: app.fetch, port: config.server.port, hostname: config.server.host },
    (info) => {
      log.info(`Listening on http://${config.server.host}:${info.port} (${config.server.nodeEnv})`);
      log.info(`Database: ${config.database.path}`);
    }
  );

  const shutdown = (signal: string) => {
    log.info(`${signal} received, shutting down`);
    stopSweep();
    server.close(() => {
      database.close();
      process.exit(0);
    });
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

try {
  startServer();
} catch (error) {
  log.error('Failed to start server:', error);
  process.exit(1);
}
