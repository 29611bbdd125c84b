/**
 * Task Catalog Routes
 *
 * - GET  /api/tasks                  active tasks, optionally filtered (?filter=...)
 * - POST /api/tasks                  add a task (idempotent by content)
 * - GET  /api/tasks/filters          tag names and their values
 * - POST /api/tasks/sync             replace the active catalog
 * - GET  /api/tasks/:id              one task, retired or not
 * - POST /api/tasks/:id/deactivate   retire a task
 */

import { Hono } from 'hono';
import { formatFilter, parseFilter } from '../../core/catalog/filter';
import { loadTaskDirectory } from '../../core/catalog/task-loader';
import type { TaskContent } from '../../core/models';
import type { DrillServices } from '../../services';
import { validateBody, validateParams, validateQuery } from '../middleware/validate';
import {
  createTaskSchema,
  listTasksQuerySchema,
  syncTasksSchema,
  taskIdParamSchema,
} from '../types';
import { notFound, success } from '../utils/response';

export interface TasksRoutesOptions {
  /** Directory read by POST /sync when no tasks are posted */
  tasksDir: string;
}

export function tasksRoutes(services: DrillServices, options: TasksRoutesOptions): Hono {
  const router = new Hono();
  const { catalog } = services;

  router.get('/', async (c) => {
    const query = validateQuery(c, listTasksQuerySchema);
    const predicate = parseFilter(query.filter);
    const tasks = await catalog.query(predicate, { orderBy: 'id' });

    return success(c, {
      filter: formatFilter(predicate),
      count: tasks.length,
      tasks,
    });
  });

  router.post('/', async (c) => {
    const body = await validateBody(c, createTaskSchema);
    const id = await catalog.upsert(body.tags, body.payload);
    return success(c, { id });
  });

  router.get('/filters', async (c) => {
    return success(c, await catalog.collectFilterInfo());
  });

  /**
   * POST /sync
   *
   * Body `{ tasks: [{ tags, payload }] }`, or `{}` to load the task files.
   * Any unreadable task file aborts the sync, since its tasks would be retired.
   */
  router.post('/sync', async (c) => {
    const body = await validateBody(c, syncTasksSchema);

    let entries: TaskContent[];
    let files: string[] = [];

    if (body.tasks) {
      entries = body.tasks.map((task) => ({ filterTags: task.tags, payload: task.payload }));
    } else {
      const loaded = await loadTaskDirectory(options.tasksDir);
      if (loaded.errors.length > 0) {
        throw loaded.errors[0];
      }
      entries = loaded.entries;
      files = loaded.files;
    }

    const result = await catalog.sync(entries);
    return success(c, { ...result, files });
  });

  router.get('/:id', async (c) => {
    const { id } = validateParams(c, taskIdParamSchema);
    const ref = await catalog.get(id);

    if (ref.kind === 'unknown') {
      return notFound(c, 'Task', id);
    }
    return success(c, ref.task);
  });

  router.post('/:id/deactivate', async (c) => {
    const { id } = validateParams(c, taskIdParamSchema);
    await catalog.deactivate(id);
    return success(c, { id, active: false });
  });

  return router;
}
