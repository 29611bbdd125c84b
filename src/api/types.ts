/**
 * API Type Definitions
 *
 * Response envelopes shared by every endpoint and the zod schemas for
 * request bodies, path parameters and query strings.
 *
 * Every response is either:
 *
 * ```json
 * { "success": true, "data": { ... } }
 * { "success": false, "error": { "code": "NOT_FOUND", "message": "...", "details": { ... } } }
 * ```
 */

import { z } from 'zod';
import { exercisePayloadSchema, filterTagsSchema } from '../core/catalog/schemas';

// ============================================================================
// Response Envelopes
// ============================================================================

export interface ApiResponse<T> {
  success: true;
  data: T;
}

export interface ApiError {
  /** Machine-readable code, e.g. 'VALIDATION_ERROR', 'ALREADY_AWAITING' */
  code: string;
  message: string;
  details?: unknown;
}

export interface ApiErrorResponse {
  success: false;
  error: ApiError;
}

export type ApiResult<T> = ApiResponse<T> | ApiErrorResponse;

export interface ValidationErrorDetail {
  /** Dot-notation path to the invalid field (e.g., 'event.type') */
  path: string;
  message: string;
}

// ============================================================================
// Path Parameters
// ============================================================================

export const taskIdParamSchema = z.object({
  id: z.coerce.number().int().positive(),
});

/** Chat ids may be negative (group chats) but must survive a round trip through a JS number */
export const sessionIdParamSchema = z.object({
  sessionId: z.coerce.number().int().safe(),
});

export const uidParamSchema = z.object({
  uid: z.coerce.number().int().safe(),
});

// ============================================================================
// Query Strings
// ============================================================================

export const listTasksQuerySchema = z.object({
  /** Filter in textual form, e.g. `case=genitive; plural` */
  filter: z.string().optional(),
});

export const listAnswersQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(500).default(50),
});

export const statsQuerySchema = z.object({
  /** Length of the period, counted back from now */
  days: z.coerce.number().positive().max(3650).default(7),
});

// ============================================================================
// Request Bodies
// ============================================================================

export const createTaskSchema = z.object({
  tags: filterTagsSchema.default({}),
  payload: exercisePayloadSchema,
});

export type CreateTaskBody = z.infer<typeof createTaskSchema>;

/**
 * Without `tasks` the catalog is synced from the configured tasks directory.
 */
export const syncTasksSchema = z.object({
  tasks: z.array(createTaskSchema).optional(),
});

export const userProfileSchema = z.object({
  uid: z.number().int().safe(),
  username: z.string().min(1).nullable().optional(),
  fullName: z.string().min(1, 'Full name is required'),
});

export const sessionEventSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('request-next') }),
  z.object({ type: z.literal('filter-change'), filter: z.string().nullable() }),
  z.object({ type: z.literal('answer-submitted'), answer: z.string() }),
  z.object({ type: z.literal('describe-filters') }),
]);

export const sessionEventBodySchema = z.object({
  user: userProfileSchema,
  event: sessionEventSchema,
});

export type SessionEventBody = z.infer<typeof sessionEventBodySchema>;

export const setFilterSchema = z.object({
  /** Textual filter; null, '' or '-' clear it */
  filter: z.string().nullable(),
});
