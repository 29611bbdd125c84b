/**
 * Assignment Repository Implementation
 *
 * Data access for `user_task`. A row is created when an exercise is shown to
 * a session and closed exactly once, moving from 'awaiting' to 'answered' or
 * 'expired'. Closing is a compare-and-swap on the status column.
 */

import { and, asc, eq, lte, max } from 'drizzle-orm';
import type { StoreExecutor } from '../db';
import { userTask } from '../schema';
import type { UserTaskRow } from '../schema';
import type { Assignment, TaskContent } from '../../core/models';
import type { Repository } from './base';

export interface CreateAssignmentInput {
  sessionId: number;
  taskId: number;
  snapshot: TaskContent | null;
  assignedAt: Date;
}

function mapToDomain(row: UserTaskRow): Assignment {
  return {
    id: row.id,
    sessionId: row.chatId,
    taskId: row.taskId,
    status: row.status,
    snapshot: row.taskSnapshot,
    assignedAt: row.assignedAt,
    closedAt: row.closedAt,
  };
}

export class AssignmentRepository implements Repository<Assignment> {
  constructor(private readonly db: StoreExecutor) {}

  findById(id: number): Assignment | null {
    const row = this.db.select().from(userTask).where(eq(userTask.id, id)).get();
    return row ? mapToDomain(row) : null;
  }

  /**
   * The session's outstanding assignment, if any.
   */
  findAwaiting(sessionId: number): Assignment | null {
    const row = this.db
      .select()
      .from(userTask)
      .where(and(eq(userTask.chatId, sessionId), eq(userTask.status, 'awaiting')))
      .get();
    return row ? mapToDomain(row) : null;
  }

  /**
   * Inserts an awaiting assignment. Fails with a unique-constraint error when
   * the session already has one.
   */
  create(input: CreateAssignmentInput): Assignment {
    const rows = this.db
      .insert(userTask)
      .values({
        chatId: input.sessionId,
        taskId: input.taskId,
        status: 'awaiting',
        taskSnapshot: input.snapshot,
        assignedAt: input.assignedAt,
        closedAt: null,
      })
      .returning()
      .all();

    return mapToDomain(rows[0]);
  }

  /**
   * Closes an awaiting assignment.
   *
   * @returns false if the assignment was not awaiting anymore
   */
  close(id: number, status: 'answered' | 'expired', at: Date): boolean {
    const result = this.db
      .update(userTask)
      .set({ status, closedAt: at })
      .where(and(eq(userTask.id, id), eq(userTask.status, 'awaiting')))
      .run();
    return result.changes > 0;
  }

  /**
   * Expires every awaiting assignment created at or before `cutoff`.
   *
   * @returns Number of assignments expired
   */
  expireAssignedUntil(cutoff: Date, at: Date): number {
    return this.db
      .update(userTask)
      .set({ status: 'expired', closedAt: at })
      .where(and(eq(userTask.status, 'awaiting'), lte(userTask.assignedAt, cutoff)))
      .run().changes;
  }

  /**
   * Latest assignment time per task for a session.
   */
  lastAskedByTask(sessionId: number): Map<number, Date> {
    const rows = this.db
      .select({ taskId: userTask.taskId, lastAskedAt: max(userTask.assignedAt) })
      .from(userTask)
      .where(eq(userTask.chatId, sessionId))
      .groupBy(userTask.taskId)
      .orderBy(asc(userTask.taskId))
      .all();

    const result = new Map<number, Date>();
    for (const row of rows) {
      if (row.lastAskedAt) {
        result.set(row.taskId, row.lastAskedAt);
      }
    }
    return result;
  }
}
