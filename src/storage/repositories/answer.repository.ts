/**
 * Answer Repository Implementation
 *
 * Append-only access to `user_answer`. Rows are inserted and read, never
 * updated; they disappear only through the cascade on user deletion.
 */

import { and, asc, count, desc, eq, gt, sql } from 'drizzle-orm';
import type { StoreExecutor } from '../db';
import { userAnswer } from '../schema';
import type { UserAnswerRow } from '../schema';
import type { AnswerStats, GradedAnswer } from '../../core/models';
import type { Repository } from './base';

export interface CreateAnswerInput {
  uid: number;
  sessionId: number;
  assignmentId: number | null;
  taskId: number;
  correct: boolean | null;
  answer: string | null;
  askedAt: Date;
  answeredAt: Date;
}

function mapToDomain(row: UserAnswerRow): GradedAnswer {
  return {
    id: row.id,
    uid: row.uid,
    sessionId: row.chatId,
    assignmentId: row.assignmentId,
    taskId: row.taskId,
    correct: row.correct,
    answer: row.answer,
    askedAt: row.askedAt,
    answeredAt: row.answeredAt,
  };
}

export class AnswerRepository implements Repository<GradedAnswer> {
  constructor(private readonly db: StoreExecutor) {}

  findById(id: number): GradedAnswer | null {
    const row = this.db.select().from(userAnswer).where(eq(userAnswer.id, id)).get();
    return row ? mapToDomain(row) : null;
  }

  create(input: CreateAnswerInput): GradedAnswer {
    const rows = this.db
      .insert(userAnswer)
      .values({
        uid: input.uid,
        chatId: input.sessionId,
        assignmentId: input.assignmentId,
        taskId: input.taskId,
        correct: input.correct,
        answer: input.answer,
        askedAt: input.askedAt,
        answeredAt: input.answeredAt,
      })
      .returning()
      .all();

    return mapToDomain(rows[0]);
  }

  /**
   * Answers given in a session, oldest first.
   */
  findBySession(sessionId: number): GradedAnswer[] {
    return this.db
      .select()
      .from(userAnswer)
      .where(eq(userAnswer.chatId, sessionId))
      .orderBy(asc(userAnswer.answeredAt), asc(userAnswer.id))
      .all()
      .map(mapToDomain);
  }

  /**
   * A user's answers, newest first.
   */
  findByUser(uid: number, limit: number): GradedAnswer[] {
    return this.db
      .select()
      .from(userAnswer)
      .where(eq(userAnswer.uid, uid))
      .orderBy(desc(userAnswer.answeredAt), desc(userAnswer.id))
      .limit(limit)
      .all()
      .map(mapToDomain);
  }

  /**
   * Answer count and correct count for answers given after `since`.
   */
  statsSince(uid: number, since: Date): AnswerStats {
    const row = this.db
      .select({
        count: count(),
        correct: sql<number>`coalesce(sum(case when ${userAnswer.correct} = 1 then 1 else 0 end), 0)`.mapWith(Number),
      })
      .from(userAnswer)
      .where(and(eq(userAnswer.uid, uid), gt(userAnswer.answeredAt, since)))
      .get();

    return { count: row?.count ?? 0, correct: row?.correct ?? 0 };
  }
}
