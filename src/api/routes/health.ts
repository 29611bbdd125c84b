/**
 * Health Check Route
 *
 * GET /health reads the active catalog once. A store that cannot be read
 * turns the answer into 503 with `status: 'degraded'`.
 */

import { Hono } from 'hono';
import { createLogger } from '../../logger';
import type { DrillServices } from '../../services';
import { success } from '../utils/response';

const log = createLogger('Health');

export const APP_VERSION = '0.1.0';

export interface HealthCheckData {
  status: 'ok' | 'degraded';
  /** ISO 8601 */
  timestamp: string;
  environment: string;
  version: string;
  /** null when the store could not be read */
  activeTasks: number | null;
}

export function healthRoutes(services: DrillServices, environment: string): Hono {
  const router = new Hono();

  router.get('/', async (c) => {
    let activeTasks: number | null = null;
    try {
      activeTasks = (await services.catalog.query(null)).length;
    } catch (error) {
      log.error('Store check failed', error);
    }

    const data: HealthCheckData = {
      status: activeTasks === null ? 'degraded' : 'ok',
      timestamp: new Date().toISOString(),
      environment,
      version: APP_VERSION,
      activeTasks,
    };
    return success(c, data, activeTasks === null ? 503 : 200);
  });

  return router;
}
