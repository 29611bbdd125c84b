/**
 * Hono Application Factory
 *
 * Builds the HTTP application around an already wired set of services, so
 * that tests can drive it with `app.request()` against an in-memory database.
 *
 * Middleware order:
 * 1. Logger - logs all requests with timing
 * 2. Routes - /health and /api/*
 * 3. onError / notFound - standard error envelopes
 */

import { Hono } from 'hono';
import type { DrillServices } from '../services';
import { errorHandler, loggerMiddleware } from './middleware';
import type { LoggerConfig } from './middleware';
import { createApiRouter, healthRoutes } from './routes';
import { error } from './utils/response';

export interface AppOptions {
  tasksDir: string;
  environment: string;
  logger?: Partial<LoggerConfig>;
}

export function createApp(services: DrillServices, options: AppOptions): Hono {
  const app = new Hono();

  app.use('*', loggerMiddleware(options.logger));

  app.route('/health', healthRoutes(services, options.environment));
  app.route('/api', createApiRouter(services, { tasksDir: options.tasksDir }));

  app.onError(errorHandler);

  app.notFound((c) => error(c, 'NOT_FOUND', `Route ${c.req.method} ${c.req.path} not found`, 404));

  return app;
}
