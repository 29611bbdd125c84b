/**
 * Session Routes
 *
 * The transport-facing surface. A transport posts every user action as an
 * event and renders the reply:
 *
 * POST /api/sessions/:sessionId/events
 * ```json
 * { "user": { "uid": 42, "fullName": "Ada" }, "event": { "type": "request-next" } }
 * ```
 *
 * GET/PUT /api/sessions/:sessionId/filter read and overwrite the filter
 * directly (operator use; no check that anything matches).
 */

import { Hono } from 'hono';
import { formatFilter, parseFilter } from '../../core/catalog/filter';
import type { DrillServices } from '../../services';
import { validateBody, validateParams } from '../middleware/validate';
import { sessionEventBodySchema, sessionIdParamSchema, setFilterSchema } from '../types';
import { success } from '../utils/response';

export function sessionsRoutes(services: DrillServices): Hono {
  const router = new Hono();
  const { engine, filters } = services;

  router.post('/:sessionId/events', async (c) => {
    const { sessionId } = validateParams(c, sessionIdParamSchema);
    const body = await validateBody(c, sessionEventBodySchema);

    const result = await engine.handle({
      sessionId,
      user: body.user,
      event: body.event,
    });

    return success(c, result);
  });

  router.get('/:sessionId/filter', async (c) => {
    const { sessionId } = validateParams(c, sessionIdParamSchema);
    const filter = await filters.getFilter(sessionId);
    return success(c, { sessionId, filter: formatFilter(filter) });
  });

  router.put('/:sessionId/filter', async (c) => {
    const { sessionId } = validateParams(c, sessionIdParamSchema);
    const body = await validateBody(c, setFilterSchema);

    const predicate = parseFilter(body.filter);
    await filters.setFilter(sessionId, predicate);

    return success(c, { sessionId, filter: formatFilter(predicate) });
  });

  return router;
}
