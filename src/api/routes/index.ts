/**
 * API Router
 *
 * Mounts every route module under /api and serves an index of them at
 * GET /api.
 */

import { Hono } from 'hono';
import type { DrillServices } from '../../services';
import { success } from '../utils/response';
import { APP_VERSION } from './health';
import { sessionsRoutes } from './sessions';
import { tasksRoutes } from './tasks';
import type { TasksRoutesOptions } from './tasks';
import { usersRoutes } from './users';

export { healthRoutes, APP_VERSION } from './health';
export type { HealthCheckData } from './health';
export { tasksRoutes } from './tasks';
export type { TasksRoutesOptions } from './tasks';
export { sessionsRoutes } from './sessions';
export { usersRoutes } from './users';

export interface ApiInfo {
  name: string;
  version: string;
  endpoints: {
    path: string;
    description: string;
  }[];
}

export function createApiRouter(services: DrillServices, options: TasksRoutesOptions): Hono {
  const router = new Hono();

  router.get('/', (c) => {
    const apiInfo: ApiInfo = {
      name: 'Vocabulary Drill API',
      version: APP_VERSION,
      endpoints: [
        { path: '/api/tasks', description: 'Task catalog: list, add, sync, retire' },
        { path: '/api/tasks/filters', description: 'Tag names and values for filters' },
        { path: '/api/sessions/:sessionId/events', description: 'Session events (next, filter, answer)' },
        { path: '/api/sessions/:sessionId/filter', description: 'Read or overwrite a session filter' },
        { path: '/api/users/:uid', description: 'User profile, answers and stats' },
        { path: '/health', description: 'Health check endpoint' },
      ],
    };
    return success(c, apiInfo);
  });

  router.route('/tasks', tasksRoutes(services, options));
  router.route('/sessions', sessionsRoutes(services));
  router.route('/users', usersRoutes(services));

  return router;
}
