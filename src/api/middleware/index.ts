/**
 * API Middleware - Barrel Export
 */

export { errorHandler, formatErrorResponse, AppError, ErrorCodes, DRILL_ERROR_STATUS } from './error-handler';
export type { ErrorCode } from './error-handler';
export { loggerMiddleware } from './logger';
export type { LoggerConfig } from './logger';
export { validateBody, validateParams, validateQuery } from './validate';
