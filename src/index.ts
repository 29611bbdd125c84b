/**
 * Vocabulary Drill Engine - Library Entry Point
 *
 * Re-exports the in-process API for transports that embed the engine:
 *
 * ```typescript
 * import { createDatabase, createDrillServices, loadConfig, serviceOptionsFromConfig } from 'vocab-drill';
 *
 * const config = loadConfig();
 * const { db } = createDatabase(config.database.path);
 * const { engine } = createDrillServices(db, serviceOptionsFromConfig(config));
 *
 * const result = await engine.handle({
 *   sessionId: 1001,
 *   user: { uid: 42, fullName: 'Ada' },
 *   event: { type: 'request-next' },
 * });
 * ```
 */

export { loadConfig, getConfig, ConfigValidationError } from './config';
export type { Config, RetryConfig } from './config';
export { createLogger, setLogLevel } from './logger';
export type { Logger, LogLevel } from './logger';
export { createDrillServices, serviceOptionsFromConfig } from './services';
export type { DrillServices, ServiceOptions } from './services';
export { createDatabase, DrillStore } from './storage';
export type { AppDatabase } from './storage';

export * from './core/errors';
export type * from './core/models';
export * from './core/catalog';
export * from './core/sessions';
export * from './core/history';
export * from './core/scheduling';
export * from './core/grading';
export * from './core/presentation';
export * from './core/engine';

export { createApp } from './api';
export type { AppOptions } from './api';
