/**
 * Database Schema Definitions for the Vocabulary Drill Engine
 *
 * Drizzle ORM definitions for SQLite. The tables mirror the SQL in
 * `migrations/`, which is what actually creates them:
 *
 * - user_info:   users known to the service
 * - user_state:  per-session (chat) filter
 * - task_info:   the content-addressed exercise catalog
 * - user_task:   assignments, i.e. exercises shown to a session
 * - user_answer: append-only graded answers
 *
 * All timestamps are stored as milliseconds since epoch (integer).
 * `user_task.task_id` and `user_answer.task_id` deliberately have no foreign
 * key: history outlives catalog pruning.
 */

import { sql } from 'drizzle-orm';
import {
  sqliteTable,
  text,
  integer,
  index,
  uniqueIndex,
  check,
} from 'drizzle-orm/sqlite-core';
import type { ExercisePayload, FilterTags, TaskContent } from '../core/models';

/**
 * Users Table
 *
 * `uid` is the id the chat transport assigns, not a generated key.
 */
export const userInfo = sqliteTable('user_info', {
  uid: integer('uid').primaryKey(),

  // Handle without the leading @, when the user has one
  username: text('username'),

  fullName: text('full_name').notNull(),

  createdAt: integer('created_at', { mode: 'timestamp_ms' }).notNull(),

  // Refreshed on every inbound event and every graded answer
  lastActiveAt: integer('last_active_at', { mode: 'timestamp_ms' }).notNull(),
});

/**
 * Session State Table
 *
 * One row per chat. `filter` holds the textual filter form
 * (e.g. `case=genitive; plural`); NULL means no filter.
 */
export const userState = sqliteTable('user_state', {
  chatId: integer('chat_id').primaryKey(),
  filter: text('filter'),
});

/**
 * Task Catalog Table
 *
 * `hash` is derived from `filters` + `task_data` and is unique, which makes
 * inserting the same content twice a no-op.
 */
export const taskInfo = sqliteTable(
  'task_info',
  {
    id: integer('id').primaryKey({ autoIncrement: true }),

    hash: integer('hash').notNull().unique(),

    // Retired tasks stay in the table but are never selected
    active: integer('active', { mode: 'boolean' }).notNull(),

    filters: text('filters', { mode: 'json' }).$type<FilterTags>().notNull(),

    taskData: text('task_data', { mode: 'json' }).$type<ExercisePayload>().notNull(),
  },
  (table) => [index('task_info_active_idx').on(table.active)]
);

/**
 * Assignments Table
 *
 * Status lifecycle: 'awaiting' -> 'answered' | 'expired'.
 * The partial unique index allows a single awaiting row per chat.
 */
export const userTask = sqliteTable(
  'user_task',
  {
    id: integer('id').primaryKey({ autoIncrement: true }),

    chatId: integer('chat_id').notNull(),

    // No foreign key: the task may be pruned later
    taskId: integer('task_id').notNull(),

    status: text('status', { enum: ['awaiting', 'answered', 'expired'] }).notNull(),

    // Tags + payload at assignment time
    taskSnapshot: text('task_snapshot', { mode: 'json' }).$type<TaskContent>(),

    assignedAt: integer('assigned_at', { mode: 'timestamp_ms' }).notNull(),

    closedAt: integer('closed_at', { mode: 'timestamp_ms' }),
  },
  (table) => [
    uniqueIndex('user_task_one_awaiting_idx')
      .on(table.chatId)
      .where(sql`status = 'awaiting'`),
    index('user_task_chat_idx').on(table.chatId, table.taskId),
    index('user_task_status_idx').on(table.status, table.assignedAt),
  ]
);

/**
 * Graded Answers Table
 *
 * Append-only. Rows go away only when their user is deleted (cascade).
 */
export const userAnswer = sqliteTable(
  'user_answer',
  {
    id: integer('id').primaryKey({ autoIncrement: true }),

    uid: integer('uid')
      .notNull()
      .references(() => userInfo.uid, { onDelete: 'cascade' }),

    chatId: integer('chat_id').notNull(),

    // Soft reference to user_task
    assignmentId: integer('assignment_id'),

    // Soft reference to task_info
    taskId: integer('task_id').notNull(),

    // NULL when no answer key was available
    correct: integer('correct', { mode: 'boolean' }),

    answer: text('answer'),

    askedAt: integer('asked_at', { mode: 'timestamp_ms' }).notNull(),

    answeredAt: integer('answered_at', { mode: 'timestamp_ms' }).notNull(),
  },
  (table) => [
    check('user_answer_order_check', sql`${table.answeredAt} >= ${table.askedAt}`),
    index('user_answer_uid_idx').on(table.uid, table.answeredAt),
    index('user_answer_chat_idx').on(table.chatId, table.taskId),
  ]
);

// =============================================================================
// Type Exports
// =============================================================================

export type UserInfoRow = typeof userInfo.$inferSelect;
export type NewUserInfoRow = typeof userInfo.$inferInsert;

export type UserStateRow = typeof userState.$inferSelect;
export type NewUserStateRow = typeof userState.$inferInsert;

export type TaskInfoRow = typeof taskInfo.$inferSelect;
export type NewTaskInfoRow = typeof taskInfo.$inferInsert;

export type UserTaskRow = typeof userTask.$inferSelect;
export type NewUserTaskRow = typeof userTask.$inferInsert;

export type UserAnswerRow = typeof userAnswer.$inferSelect;
export type NewUserAnswerRow = typeof userAnswer.$inferInsert;
