/**
 * Per-Session Task History
 *
 * Folds a session's assignments and answers into one entry per task. The
 * scheduler ranks candidates with it.
 */

import type { GradedAnswer, TaskHistoryEntry } from '../models';
import type { Repositories } from '../../storage/repositories';

function later(a: Date | null, b: Date): Date {
  return a && a.getTime() >= b.getTime() ? a : b;
}

/**
 * @param lastAsked - Latest assignment time per task
 * @param answers - The session's answers, oldest first
 */
export function buildTaskHistory(
  lastAsked: Map<number, Date>,
  answers: GradedAnswer[]
): Map<number, TaskHistoryEntry> {
  const history = new Map<number, TaskHistoryEntry>();

  for (const [taskId, askedAt] of lastAsked) {
    history.set(taskId, {
      taskId,
      lastAskedAt: askedAt,
      lastAnsweredAt: null,
      lastCorrect: null,
      lastCorrectAt: null,
    });
  }

  for (const answer of answers) {
    const entry = history.get(answer.taskId) ?? {
      taskId: answer.taskId,
      lastAskedAt: null,
      lastAnsweredAt: null,
      lastCorrect: null,
      lastCorrectAt: null,
    };

    entry.lastAskedAt = later(entry.lastAskedAt, answer.askedAt);
    entry.lastAnsweredAt = answer.answeredAt;
    entry.lastCorrect = answer.correct;
    if (answer.correct === true) {
      entry.lastCorrectAt = answer.answeredAt;
    }

    history.set(answer.taskId, entry);
  }

  return history;
}

/**
 * Reads and folds the history of one session.
 */
export function readSessionTaskHistory(
  repos: Repositories,
  sessionId: number
): Map<number, TaskHistoryEntry> {
  return buildTaskHistory(
    repos.assignments.lastAskedByTask(sessionId),
    repos.answers.findBySession(sessionId)
  );
}
