/**
 * AnswerRecorder - Grades and Closes Outstanding Assignments
 *
 * Grading happens in one transaction: the answer row is written, the
 * assignment moves from 'awaiting' to 'answered' by compare-and-swap, and the
 * user's last activity is refreshed. If any step fails nothing is kept.
 * An answer that arrives after the expiry closes the assignment as
 * 'expired' instead, exactly as the sweep would have.
 *
 * The answer key comes from the task as stored now; when the task has been
 * deleted the snapshot taken at assignment time is used. Without either,
 * the answer is recorded with unknown correctness.
 */

import type { DrillStore } from '../../storage/store';
import { NoOutstandingAssignmentError, NotFoundError } from '../errors';
import type { GradedAnswer } from '../models';
import { createLogger } from '../../logger';
import { isOverdue, resolveExercise } from '../scheduling/scheduler';
import type { Exercise } from '../scheduling/types';
import { isCorrectAnswer } from './answer-matching';

const log = createLogger('Grading');

export interface GradeResult {
  answer: GradedAnswer;
  /** The answer key, or null if none could be found */
  expected: string | null;
  /** The graded exercise, or null if neither task nor snapshot remain */
  exercise: Exercise | null;
}

export interface AnswerRecorderOptions {
  /** Same timeout the scheduler applies; overdue assignments are not graded */
  expiryMs: number;
  now?: () => Date;
}

type GradeAttempt = { kind: 'graded'; result: GradeResult } | { kind: 'expired'; assignmentId: number };

export class AnswerRecorder {
  private readonly expiryMs: number;
  private readonly now: () => Date;

  constructor(
    private readonly store: DrillStore,
    options: AnswerRecorderOptions
  ) {
    this.expiryMs = options.expiryMs;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Grades the session's outstanding exercise.
   *
   * @throws {NotFoundError} If the user does not exist
   * @throws {NoOutstandingAssignmentError} If the session is not awaiting an
   *   answer, or its exercise is past the expiry (it is expired on the way)
   */
  async grade(sessionId: number, userId: number, answer: string): Promise<GradeResult> {
    const now = this.now();

    const attempt = await this.store.write('grading.grade', (repos): GradeAttempt => {
      if (!repos.users.findById(userId)) {
        throw new NotFoundError('user', userId);
      }

      const assignment = repos.assignments.findAwaiting(sessionId);
      if (!assignment) {
        throw new NoOutstandingAssignmentError(sessionId);
      }

      if (isOverdue(assignment, now, this.expiryMs)) {
        repos.assignments.close(assignment.id, 'expired', now);
        return { kind: 'expired', assignmentId: assignment.id };
      }

      const exercise = resolveExercise(repos, assignment);
      const expected = exercise ? exercise.payload.a : null;
      const correct = expected === null ? null : isCorrectAnswer(answer, expected);

      // Clock skew must not produce an answer older than its question
      const answeredAt =
        now.getTime() < assignment.assignedAt.getTime() ? assignment.assignedAt : now;

      if (!repos.assignments.close(assignment.id, 'answered', answeredAt)) {
        throw new NoOutstandingAssignmentError(sessionId);
      }

      const graded = repos.answers.create({
        uid: userId,
        sessionId,
        assignmentId: assignment.id,
        taskId: assignment.taskId,
        correct,
        answer,
        askedAt: assignment.assignedAt,
        answeredAt,
      });

      repos.users.setLastActive(userId, answeredAt);

      return { kind: 'graded', result: { answer: graded, expected, exercise } };
    });

    if (attempt.kind === 'expired') {
      log.info(`Session ${sessionId} answered expired assignment ${attempt.assignmentId}`);
      throw new NoOutstandingAssignmentError(sessionId);
    }

    const { result } = attempt;

    log.info(
      `Session ${sessionId} answered task ${result.answer.taskId}: ${
        result.answer.correct === null ? 'unknown' : result.answer.correct ? 'correct' : 'wrong'
      }`
    );
    return result;
  }
}
