/**
 * User Routes
 *
 * - GET /api/users/:uid            profile and activity
 * - GET /api/users/:uid/answers    answer history, newest first (?limit=50)
 * - GET /api/users/:uid/stats      answer counts over the last ?days=7
 */

import { Hono } from 'hono';
import type { DrillServices } from '../../services';
import { validateParams, validateQuery } from '../middleware/validate';
import { listAnswersQuerySchema, statsQuerySchema, uidParamSchema } from '../types';
import { notFound, success } from '../utils/response';

const DAY_MS = 24 * 60 * 60 * 1000;

export function usersRoutes(services: DrillServices): Hono {
  const router = new Hono();
  const { users, history } = services;

  router.get('/:uid', async (c) => {
    const { uid } = validateParams(c, uidParamSchema);
    const user = await users.get(uid);
    if (!user) {
      return notFound(c, 'User', uid);
    }
    return success(c, user);
  });

  router.get('/:uid/answers', async (c) => {
    const { uid } = validateParams(c, uidParamSchema);
    const { limit } = validateQuery(c, listAnswersQuerySchema);

    if (!(await users.get(uid))) {
      return notFound(c, 'User', uid);
    }

    const answers = await history.listForUser(uid, limit);
    return success(c, { uid, count: answers.length, answers });
  });

  router.get('/:uid/stats', async (c) => {
    const { uid } = validateParams(c, uidParamSchema);
    const { days } = validateQuery(c, statsQuerySchema);

    if (!(await users.get(uid))) {
      return notFound(c, 'User', uid);
    }

    const stats = await history.stats(uid, days * DAY_MS);
    return success(c, { uid, days, ...stats });
  });

  return router;
}
