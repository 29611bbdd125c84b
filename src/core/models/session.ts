/**
 * Session Domain Types
 *
 * A session is one chat. Exercises are delivered to it one at a time: the
 * scheduler creates an Assignment, and the session stays "awaiting" until
 * the assignment is answered or expires.
 *
 * ```
 * Idle --next()--> Awaiting --grade()--> Idle
 *                     |
 *                     +--expiry (lazy, on next())--> Idle
 * ```
 */

import type { FilterPredicate, TaskContent } from './task';

export interface SessionState {
  sessionId: number;
  /** `null` means no filter: every active task is eligible */
  filter: FilterPredicate | null;
}

/**
 * - 'awaiting': shown to the session, no answer yet (at most one per session)
 * - 'answered': closed by a graded answer
 * - 'expired': abandoned; the session may be given a task again
 */
export type AssignmentStatus = 'awaiting' | 'answered' | 'expired';

export interface Assignment {
  id: number;
  sessionId: number;
  /** No referential constraint: the task may have been deleted since */
  taskId: number;
  status: AssignmentStatus;
  /**
   * Copy of the task's tags and payload at assignment time. Lets a deleted
   * task still be re-delivered and graded. `null` on rows written without one.
   */
  snapshot: TaskContent | null;
  assignedAt: Date;
  closedAt: Date | null;
}

/**
 * Append-only record of a graded answer.
 */
export interface GradedAnswer {
  id: number;
  uid: number;
  sessionId: number;
  assignmentId: number | null;
  taskId: number;
  /** `null` when no answer key could be found for the task */
  correct: boolean | null;
  /** The text the user submitted */
  answer: string | null;
  askedAt: Date;
  /** Always >= askedAt */
  answeredAt: Date;
}

/**
 * What a session has done with one task, used for ranking.
 */
export interface TaskHistoryEntry {
  taskId: number;
  lastAskedAt: Date | null;
  lastAnsweredAt: Date | null;
  /** Correctness of the latest answer (`null` if unknown or never answered) */
  lastCorrect: boolean | null;
  lastCorrectAt: Date | null;
}

export interface AnswerStats {
  count: number;
  correct: number;
}
