/**
 * Scheduler - Assigns the Next Exercise to a Session
 *
 * A session is either Idle (no awaiting assignment) or Awaiting (exactly one).
 * `next()` runs as a single immediate transaction:
 *
 * 1. An awaiting assignment past the expiry timeout is expired. A live one is
 *    re-delivered, or rejected with AlreadyAwaitingError when re-delivery is
 *    disabled.
 * 2. Active tasks are filtered by the session filter.
 * 3. Tasks answered correctly within the cool-down are dropped.
 * 4. The rest are ranked (see ranking.ts) and the top task is assigned with a
 *    snapshot of its tags and payload.
 *
 * Because the check and the insert share a transaction holding SQLite's
 * write lock, two calls for one session cannot both create an assignment.
 * The partial unique index on user_task backs this up.
 */

import type { DrillStore } from '../../storage/store';
import type { Repositories } from '../../storage/repositories';
import { AlreadyAwaitingError } from '../errors';
import type { Assignment } from '../models';
import { matchesFilter } from '../catalog/filter';
import { readSessionTaskHistory } from '../history/task-history';
import { createLogger } from '../../logger';
import { pickNext } from './ranking';
import type { Exercise, NextOutcome, SchedulerOptions } from './types';
import { DEFAULT_SCHEDULER_OPTIONS } from './types';

const log = createLogger('Scheduler');

function isUniqueViolation(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    (error.code === 'SQLITE_CONSTRAINT_UNIQUE' || error.code === 'SQLITE_CONSTRAINT_PRIMARYKEY')
  );
}

/**
 * The exercise an assignment stands for: the task as currently stored, or
 * the snapshot taken at assignment time if the task is gone.
 */
export function resolveExercise(repos: Repositories, assignment: Assignment): Exercise | null {
  const task = repos.tasks.findById(assignment.taskId);
  if (task) {
    return { taskId: task.id, filterTags: task.filterTags, payload: task.payload };
  }
  if (assignment.snapshot) {
    return { taskId: assignment.taskId, ...assignment.snapshot };
  }
  return null;
}

/**
 * True once an awaiting assignment has outlived the expiry timeout.
 */
export function isOverdue(assignment: Assignment, now: Date, expiryMs: number): boolean {
  return now.getTime() - assignment.assignedAt.getTime() >= expiryMs;
}

export class Scheduler {
  private readonly options: Required<SchedulerOptions>;

  constructor(
    private readonly store: DrillStore,
    options: Partial<SchedulerOptions> = {}
  ) {
    this.options = {
      ...DEFAULT_SCHEDULER_OPTIONS,
      random: Math.random,
      now: () => new Date(),
      ...options,
    };
  }

  /**
   * Picks and assigns the next exercise for a session.
   *
   * @throws {AlreadyAwaitingError} If an exercise is outstanding and re-delivery is off
   */
  async next(sessionId: number): Promise<NextOutcome> {
    const { cooldownMs, redeliverOutstanding, random } = this.options;
    const now = this.options.now();

    let outcome: NextOutcome;
    try {
      outcome = await this.store.write('scheduler.next', (repos): NextOutcome => {
        const awaiting = repos.assignments.findAwaiting(sessionId);

        if (awaiting) {
          if (isOverdue(awaiting, now, this.options.expiryMs)) {
            repos.assignments.close(awaiting.id, 'expired', now);
            log.debug(`Expired assignment ${awaiting.id} of session ${sessionId}`);
          } else if (!redeliverOutstanding) {
            throw new AlreadyAwaitingError(sessionId, awaiting.id);
          } else {
            const exercise = resolveExercise(repos, awaiting);
            if (exercise) {
              return { status: 'redelivered', assignment: awaiting, exercise };
            }
            // Neither the task nor a snapshot is left to show
            repos.assignments.close(awaiting.id, 'expired', now);
            log.warn(`Assignment ${awaiting.id} lost its task ${awaiting.taskId}, expiring it`);
          }
        }

        const filter = repos.sessions.findById(sessionId)?.filter ?? null;
        const candidates = repos.tasks
          .findActive({ orderById: true })
          .filter((task) => matchesFilter(task.filterTags, filter));
        const history = readSessionTaskHistory(repos, sessionId);

        const task = pickNext(candidates, history, { now, cooldownMs, random });
        if (!task) {
          return { status: 'exhausted', filter };
        }

        const assignment = repos.assignments.create({
          sessionId,
          taskId: task.id,
          snapshot: { filterTags: task.filterTags, payload: task.payload },
          assignedAt: now,
        });

        return {
          status: 'assigned',
          assignment,
          exercise: { taskId: task.id, filterTags: task.filterTags, payload: task.payload },
        };
      });
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new AlreadyAwaitingError(sessionId, null);
      }
      throw error;
    }

    if (outcome.status === 'assigned') {
      log.info(`Assigned task ${outcome.exercise.taskId} to session ${sessionId}`);
    } else if (outcome.status === 'exhausted') {
      log.info(`No eligible task for session ${sessionId}`);
    }
    return outcome;
  }

  /**
   * Expires every overdue awaiting assignment. Sessions see the same result
   * as lazy expiry in `next()`.
   *
   * @returns Number of assignments expired
   */
  async expireStale(): Promise<number> {
    const now = this.options.now();
    const cutoff = new Date(now.getTime() - this.options.expiryMs);

    const expired = await this.store.write('scheduler.expireStale', (repos) =>
      repos.assignments.expireAssignedUntil(cutoff, now)
    );

    if (expired > 0) {
      log.info(`Expired ${expired} stale assignment(s)`);
    }
    return expired;
  }

  /**
   * Runs `expireStale` every `intervalMs` until the returned function is called.
   */
  startSweep(intervalMs: number): () => void {
    const timer = setInterval(() => {
      this.expireStale().catch((error: unknown) => {
        log.error('Expiry sweep failed', error);
      });
    }, intervalMs);
    timer.unref();

    log.info(`Expiry sweep every ${Math.round(intervalMs / 1000)}s`);
    return () => clearInterval(timer);
  }
}
