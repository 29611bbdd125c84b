/**
 * Task Repository Implementation
 *
 * Data access for the `task_info` catalog table. Rows are keyed twice: by the
 * autoincrement id used everywhere else, and by the unique content hash that
 * makes inserting identical content a no-op.
 */

import { and, asc, eq, notInArray } from 'drizzle-orm';
import type { StoreExecutor } from '../db';
import { taskInfo } from '../schema';
import type { TaskInfoRow } from '../schema';
import type { ExercisePayload, FilterTags, Task } from '../../core/models';
import type { Repository } from './base';

/**
 * Input for inserting a task. The hash is computed by the caller.
 */
export interface CreateTaskInput {
  hash: number;
  filterTags: FilterTags;
  payload: ExercisePayload;
}

function mapToDomain(row: TaskInfoRow): Task {
  return {
    id: row.id,
    hash: row.hash,
    active: row.active,
    filterTags: row.filters,
    payload: row.taskData,
  };
}

export class TaskRepository implements Repository<Task> {
  constructor(private readonly db: StoreExecutor) {}

  findById(id: number): Task | null {
    const row = this.db.select().from(taskInfo).where(eq(taskInfo.id, id)).get();
    return row ? mapToDomain(row) : null;
  }

  findByHash(hash: number): Task | null {
    const row = this.db.select().from(taskInfo).where(eq(taskInfo.hash, hash)).get();
    return row ? mapToDomain(row) : null;
  }

  /**
   * Inserts an active task unless a row with the same hash exists.
   * An existing row is left untouched, retired or not.
   *
   * @returns The id of the new or existing row, and whether it was created
   */
  insertIfAbsent(input: CreateTaskInput): { id: number; created: boolean } {
    const inserted: { id: number } | undefined = this.db
      .insert(taskInfo)
      .values({
        hash: input.hash,
        active: true,
        filters: input.filterTags,
        taskData: input.payload,
      })
      .onConflictDoNothing({ target: taskInfo.hash })
      .returning({ id: taskInfo.id })
      .get();

    if (inserted) {
      return { id: inserted.id, created: true };
    }

    const existing = this.findByHash(input.hash);
    if (!existing) {
      throw new Error(`Task with hash ${input.hash} vanished during insert`);
    }
    return { id: existing.id, created: false };
  }

  /**
   * Inserts the task, or re-activates the row that already has its hash.
   *
   * @returns The task id
   */
  upsertActive(input: CreateTaskInput): number {
    const row: { id: number } | undefined = this.db
      .insert(taskInfo)
      .values({
        hash: input.hash,
        active: true,
        filters: input.filterTags,
        taskData: input.payload,
      })
      .onConflictDoUpdate({ target: taskInfo.hash, set: { active: true } })
      .returning({ id: taskInfo.id })
      .get();

    if (!row) {
      throw new Error(`Upsert of task with hash ${input.hash} returned no row`);
    }
    return row.id;
  }

  /**
   * @returns false if no task has this id
   */
  setActive(id: number, active: boolean): boolean {
    const result = this.db.update(taskInfo).set({ active }).where(eq(taskInfo.id, id)).run();
    return result.changes > 0;
  }

  /**
   * Active tasks, optionally ordered by id.
   */
  findActive(options: { orderById?: boolean } = {}): Task[] {
    const query = this.db.select().from(taskInfo).where(eq(taskInfo.active, true));
    const rows = options.orderById ? query.orderBy(asc(taskInfo.id)).all() : query.all();
    return rows.map(mapToDomain);
  }

  findAll(): Task[] {
    return this.db.select().from(taskInfo).orderBy(asc(taskInfo.id)).all().map(mapToDomain);
  }

  /**
   * Retires every active task whose id is not listed.
   *
   * @returns Number of tasks retired
   */
  deactivateAllExcept(keepIds: number[]): number {
    const condition =
      keepIds.length === 0
        ? eq(taskInfo.active, true)
        : and(eq(taskInfo.active, true), notInArray(taskInfo.id, keepIds));

    return this.db.update(taskInfo).set({ active: false }).where(condition).run().changes;
  }

  /**
   * Deletes retired tasks. History rows keep their (now dangling) task ids.
   *
   * @returns Number of rows deleted
   */
  deleteInactive(): number {
    return this.db.delete(taskInfo).where(eq(taskInfo.active, false)).run().changes;
  }
}
