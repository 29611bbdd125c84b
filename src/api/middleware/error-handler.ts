/**
 * Global Error Handler for the Drill API
 *
 * Installed with `app.onError(errorHandler)`. Every error leaving a route is
 * turned into the standard envelope:
 *
 * ```json
 * {
 *   "success": false,
 *   "error": { "code": "ALREADY_AWAITING", "message": "...", "details": { ... } }
 * }
 * ```
 *
 * | Error                          | Status |
 * |--------------------------------|--------|
 * | NotFoundError                  | 404    |
 * | AlreadyAwaitingError           | 409    |
 * | NoOutstandingAssignmentError   | 409    |
 * | StoreUnavailableError          | 503    |
 * | InvalidTaskFileError           | 400    |
 * | AppError                       | its own|
 * | HTTPException (hono)           | its own|
 * | anything else                  | 500    |
 */

import type { Context, ErrorHandler } from 'hono';
import { HTTPException } from 'hono/http-exception';
import type { ContentfulStatusCode } from 'hono/utils/http-status';
import { DrillError } from '../../core/errors';
import type { DrillErrorCode } from '../../core/errors';
import { createLogger } from '../../logger';
import type { ApiErrorResponse } from '../types';

const log = createLogger('API');

/**
 * Error codes produced by the API layer itself.
 */
export const ErrorCodes = {
  BAD_REQUEST: 'BAD_REQUEST',
  NOT_FOUND: 'NOT_FOUND',
  VALIDATION_ERROR: 'VALIDATION_ERROR',
  INVALID_JSON: 'INVALID_JSON',
  INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

export const DRILL_ERROR_STATUS: Record<DrillErrorCode, ContentfulStatusCode> = {
  NOT_FOUND: 404,
  ALREADY_AWAITING: 409,
  NO_OUTSTANDING_ASSIGNMENT: 409,
  SERVICE_UNAVAILABLE: 503,
  INVALID_TASK_FILE: 400,
};

/**
 * A controlled API error with its HTTP status.
 *
 * @example
 * ```typescript
 * throw new AppError('VALIDATION_ERROR', 'Invalid request body', 400, details);
 * ```
 */
export class AppError extends Error {
  public readonly code: ErrorCode | string;
  public readonly statusCode: ContentfulStatusCode;
  public readonly details?: unknown;

  constructor(
    code: ErrorCode | string,
    message: string,
    statusCode: ContentfulStatusCode = 500,
    details?: unknown
  ) {
    super(message);
    this.name = 'AppError';
    this.code = code;
    this.statusCode = statusCode;
    this.details = details;

    Error.captureStackTrace?.(this, AppError);
  }
}

function envelope(code: string, message: string, details?: unknown): ApiErrorResponse {
  return {
    success: false,
    error: {
      code,
      message,
      ...(details !== undefined && { details }),
    },
  };
}

/**
 * Maps an error onto the envelope and status code.
 */
export function formatErrorResponse(error: unknown): {
  response: ApiErrorResponse;
  statusCode: ContentfulStatusCode;
} {
  if (error instanceof DrillError) {
    return {
      response: envelope(error.code, error.message, error.details),
      statusCode: DRILL_ERROR_STATUS[error.code],
    };
  }

  if (error instanceof AppError) {
    return {
      response: envelope(error.code, error.message, error.details),
      statusCode: error.statusCode,
    };
  }

  if (error instanceof HTTPException) {
    const statusCode: ContentfulStatusCode = error.status === 400 ? 400 : 500;
    return {
      response: envelope(
        statusCode === 400 ? ErrorCodes.BAD_REQUEST : ErrorCodes.INTERNAL_ERROR,
        error.message || 'Request failed'
      ),
      statusCode,
    };
  }

  const isDev = process.env.NODE_ENV !== 'production';

  if (error instanceof Error) {
    return {
      response: envelope(
        ErrorCodes.INTERNAL_ERROR,
        isDev ? error.message : 'An unexpected error occurred. Please try again.',
        isDev ? { stack: error.stack } : undefined
      ),
      statusCode: 500,
    };
  }

  return {
    response: envelope(
      ErrorCodes.INTERNAL_ERROR,
      'An unexpected error occurred',
      isDev ? { rawError: String(error) } : undefined
    ),
    statusCode: 500,
  };
}

/**
 * Hono `onError` handler. Controlled errors log at warn, the rest at error.
 */
export const errorHandler: ErrorHandler = (err, c: Context) => {
  const { response, statusCode } = formatErrorResponse(err);

  if (statusCode >= 500) {
    log.error(`${c.req.method} ${c.req.path} failed`, err);
  } else {
    log.warn(`${c.req.method} ${c.req.path}: ${response.error.code} ${response.error.message}`);
  }

  return c.json(response, statusCode);
};
