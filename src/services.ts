/**
 * Service Wiring
 *
 * Builds the engine's components over one database. The HTTP server, the CLI
 * and the tests all start here.
 */

import type { Config } from './config';
import { TaskCatalog } from './core/catalog/task-catalog';
import { DrillEngine } from './core/engine/drill-engine';
import { AnswerRecorder } from './core/grading/answer-recorder';
import { AnswerHistory } from './core/history/answer-history';
import { Scheduler } from './core/scheduling/scheduler';
import { SessionFilterStore } from './core/sessions/session-filter-store';
import { UserDirectory } from './core/sessions/user-directory';
import type { AppDatabase } from './storage/db';
import { DrillStore } from './storage/store';
import type { RetryOptions } from './storage/retry';

export interface DrillServices {
  store: DrillStore;
  catalog: TaskCatalog;
  filters: SessionFilterStore;
  users: UserDirectory;
  history: AnswerHistory;
  scheduler: Scheduler;
  recorder: AnswerRecorder;
  engine: DrillEngine;
}

export interface ServiceOptions {
  scheduler: Config['scheduler'];
  retry: RetryOptions;
  operatorChatId?: number | null;
  autoAdvance?: boolean;
  /** Clock shared by every component */
  now?: () => Date;
  random?: () => number;
}

export function createDrillServices(db: AppDatabase, options: ServiceOptions): DrillServices {
  const now = options.now ?? (() => new Date());
  const random = options.random ?? Math.random;

  const store = new DrillStore(db, options.retry);
  const catalog = new TaskCatalog(store);
  const filters = new SessionFilterStore(store);
  const users = new UserDirectory(store, now);
  const history = new AnswerHistory(store, now);
  const scheduler = new Scheduler(store, {
    cooldownMs: options.scheduler.cooldownMs,
    expiryMs: options.scheduler.expiryMs,
    redeliverOutstanding: options.scheduler.redeliverOutstanding,
    now,
    random,
  });
  const recorder = new AnswerRecorder(store, { expiryMs: options.scheduler.expiryMs, now });
  const engine = new DrillEngine(
    { catalog, filters, users, scheduler, recorder },
    {
      autoAdvance: options.autoAdvance,
      operatorChatId: options.operatorChatId,
      random,
    }
  );

  return { store, catalog, filters, users, history, scheduler, recorder, engine };
}

/**
 * Options taken from the loaded configuration.
 */
export function serviceOptionsFromConfig(config: Config): ServiceOptions {
  return {
    scheduler: config.scheduler,
    retry: config.store.retry,
    operatorChatId: config.operator.chatId,
  };
}
