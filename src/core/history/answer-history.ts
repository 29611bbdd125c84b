/**
 * AnswerHistory - Read Side of Assignments and Answers
 *
 * History rows reference tasks by id only. Every read here resolves those ids
 * against the catalog and turns a deleted task into `{ kind: 'unknown' }`
 * instead of failing.
 */

import type { DrillStore } from '../../storage/store';
import type { Repositories } from '../../storage/repositories';
import type {
  AnswerStats,
  Assignment,
  GradedAnswer,
  TaskHistoryEntry,
  TaskRef,
} from '../models';
import { readSessionTaskHistory } from './task-history';

export type AnswerWithTask = GradedAnswer & { task: TaskRef };
export type AssignmentWithTask = Assignment & { task: TaskRef };

export const DEFAULT_ANSWER_LIMIT = 50;

/**
 * Resolves task ids, looking each distinct id up once.
 */
export function createTaskResolver(repos: Repositories): (taskId: number) => TaskRef {
  const cache = new Map<number, TaskRef>();
  return (taskId) => {
    let ref = cache.get(taskId);
    if (!ref) {
      const task = repos.tasks.findById(taskId);
      ref = task ? { kind: 'known', task } : { kind: 'unknown', taskId };
      cache.set(taskId, ref);
    }
    return ref;
  };
}

export class AnswerHistory {
  constructor(
    private readonly store: DrillStore,
    private readonly now: () => Date = () => new Date()
  ) {}

  async sessionTaskHistory(sessionId: number): Promise<Map<number, TaskHistoryEntry>> {
    return this.store.read('history.session', (repos) => readSessionTaskHistory(repos, sessionId));
  }

  /**
   * A user's answers, newest first, each with its task resolved.
   */
  async listForUser(uid: number, limit: number = DEFAULT_ANSWER_LIMIT): Promise<AnswerWithTask[]> {
    return this.store.read('history.listForUser', (repos) => {
      const resolve = createTaskResolver(repos);
      return repos.answers
        .findByUser(uid, limit)
        .map((answer) => ({ ...answer, task: resolve(answer.taskId) }));
    });
  }

  /**
   * Number of answers, and of correct ones, given within the last `periodMs`.
   */
  async stats(uid: number, periodMs: number): Promise<AnswerStats> {
    const since = new Date(this.now().getTime() - periodMs);
    return this.store.read('history.stats', (repos) => repos.answers.statsSince(uid, since));
  }

  async findAssignment(id: number): Promise<AssignmentWithTask | null> {
    return this.store.read('history.findAssignment', (repos) => {
      const assignment = repos.assignments.findById(id);
      if (!assignment) {
        return null;
      }
      return { ...assignment, task: createTaskResolver(repos)(assignment.taskId) };
    });
  }
}
