/**
 * API Module - Barrel Export
 *
 * @example
 * ```typescript
 * import { createApp } from './api';
 *
 * const app = createApp(services, { tasksDir: './data/tasks', environment: 'test' });
 * const res = await app.request('/api/tasks');
 * ```
 */

export { createApp } from './app';
export type { AppOptions } from './app';

export {
  errorHandler,
  formatErrorResponse,
  AppError,
  ErrorCodes,
  DRILL_ERROR_STATUS,
  loggerMiddleware,
  validateBody,
  validateParams,
  validateQuery,
} from './middleware';
export type { ErrorCode, LoggerConfig } from './middleware';

export { success, error, notFound, badRequest } from './utils/response';

export type {
  ApiResponse,
  ApiError,
  ApiErrorResponse,
  ApiResult,
  ValidationErrorDetail,
  CreateTaskBody,
  SessionEventBody,
} from './types';

export {
  createApiRouter,
  healthRoutes,
  tasksRoutes,
  sessionsRoutes,
  usersRoutes,
  APP_VERSION,
} from './routes';
export type { ApiInfo, HealthCheckData, TasksRoutesOptions } from './routes';
