/**
 * Response Helpers
 *
 * Build the standard envelopes so route handlers stay one-liners.
 *
 * @example
 * ```typescript
 * router.get('/:id', async (c) => {
 *   const task = await catalog.get(id);
 *   if (task.kind === 'unknown') {
 *     return notFound(c, 'Task', id);
 *   }
 *   return success(c, task.task);
 * });
 * ```
 */

import type { Context } from 'hono';
import type { ContentfulStatusCode } from 'hono/utils/http-status';
import type { ApiResponse, ApiErrorResponse } from '../types';

export function success<T>(c: Context, data: T, statusCode: ContentfulStatusCode = 200): Response {
  const response: ApiResponse<T> = {
    success: true,
    data,
  };
  return c.json(response, statusCode);
}

export function error(
  c: Context,
  code: string,
  message: string,
  statusCode: ContentfulStatusCode = 400,
  details?: unknown
): Response {
  const response: ApiErrorResponse = {
    success: false,
    error: {
      code,
      message,
      ...(details !== undefined && { details }),
    },
  };
  return c.json(response, statusCode);
}

export function notFound(c: Context, resource: string, id: string | number): Response {
  return error(c, 'NOT_FOUND', `${resource} with ID '${id}' not found`, 404, { resource, id });
}

export function badRequest(c: Context, message: string, details?: unknown): Response {
  return error(c, 'BAD_REQUEST', message, 400, details);
}
