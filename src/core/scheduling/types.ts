/**
 * Scheduling Types
 */

import type { Assignment, FilterPredicate, FilterTags, ExercisePayload } from '../models';

/**
 * The exercise handed to a session: the task's content at delivery time.
 */
export interface Exercise {
  taskId: number;
  filterTags: FilterTags;
  payload: ExercisePayload;
}

/**
 * Result of `Scheduler.next()`.
 *
 * - 'assigned': a new assignment was created
 * - 'redelivered': the session's outstanding assignment, unchanged
 * - 'exhausted': nothing is eligible under the current filter
 */
export type NextOutcome =
  | { status: 'assigned'; assignment: Assignment; exercise: Exercise }
  | { status: 'redelivered'; assignment: Assignment; exercise: Exercise }
  | { status: 'exhausted'; filter: FilterPredicate | null };

export interface SchedulerOptions {
  /** A task answered correctly in a session is skipped there for this long */
  cooldownMs: number;
  /** Unanswered assignments this old are abandoned */
  expiryMs: number;
  /** Return the outstanding assignment instead of throwing AlreadyAwaitingError */
  redeliverOutstanding: boolean;
  /** Picks among never-asked tasks; values in [0, 1) */
  random?: () => number;
  now?: () => Date;
}

export const DEFAULT_SCHEDULER_OPTIONS: SchedulerOptions = {
  cooldownMs: 12 * 60 * 60 * 1000,
  expiryMs: 30 * 60 * 1000,
  redeliverOutstanding: true,
};
