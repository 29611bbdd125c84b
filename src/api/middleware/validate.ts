/**
 * Request Validation Helpers
 *
 * Route handlers read their inputs through these functions, which validate
 * with zod and return typed data. A failure throws an AppError that the
 * error handler renders as 400 VALIDATION_ERROR with one detail per issue:
 *
 * ```json
 * {
 *   "success": false,
 *   "error": {
 *     "code": "VALIDATION_ERROR",
 *     "message": "Invalid request body",
 *     "details": [{ "path": "user.fullName", "message": "Full name is required" }]
 *   }
 * }
 * ```
 *
 * @example
 * ```typescript
 * router.post('/', async (c) => {
 *   const body = await validateBody(c, createTaskSchema);
 *   // body is fully typed
 * });
 * ```
 */

import type { Context } from 'hono';
import type { z } from 'zod';
import type { ValidationErrorDetail } from '../types';
import { AppError, ErrorCodes } from './error-handler';

function toDetails(error: z.ZodError): ValidationErrorDetail[] {
  return error.errors.map((e) => ({
    path: e.path.join('.'),
    message: e.message,
  }));
}

function check<T extends z.ZodTypeAny>(schema: T, input: unknown, message: string): z.output<T> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    throw new AppError(ErrorCodes.VALIDATION_ERROR, message, 400, toDetails(parsed.error));
  }
  return parsed.data;
}

/**
 * Parses the JSON body and validates it.
 */
export async function validateBody<T extends z.ZodTypeAny>(c: Context, schema: T): Promise<z.output<T>> {
  let body: unknown;
  try {
    body = await c.req.json();
  } catch {
    throw new AppError(ErrorCodes.INVALID_JSON, 'Request body must be valid JSON', 400);
  }
  return check(schema, body, 'Invalid request body');
}

export function validateParams<T extends z.ZodTypeAny>(c: Context, schema: T): z.output<T> {
  return check(schema, c.req.param(), 'Invalid path parameters');
}

export function validateQuery<T extends z.ZodTypeAny>(c: Context, schema: T): z.output<T> {
  return check(schema, c.req.query(), 'Invalid query parameters');
}
