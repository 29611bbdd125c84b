/**
 * Session State Repository Implementation
 *
 * One `user_state` row per chat, holding the filter in its textual form.
 * Writes are last-write-wins upserts.
 */

import { eq } from 'drizzle-orm';
import type { StoreExecutor } from '../db';
import { userState } from '../schema';
import type { UserStateRow } from '../schema';
import type { FilterPredicate, SessionState } from '../../core/models';
import { formatFilter, parseFilter } from '../../core/catalog/filter';
import type { Repository } from './base';

function mapToDomain(row: UserStateRow): SessionState {
  return {
    sessionId: row.chatId,
    filter: parseFilter(row.filter),
  };
}

export class SessionStateRepository implements Repository<SessionState> {
  constructor(private readonly db: StoreExecutor) {}

  findById(sessionId: number): SessionState | null {
    const row = this.db.select().from(userState).where(eq(userState.chatId, sessionId)).get();
    return row ? mapToDomain(row) : null;
  }

  /**
   * Creates the row if needed and replaces its filter.
   */
  saveFilter(sessionId: number, filter: FilterPredicate | null): SessionState {
    const text = filter ? formatFilter(filter) : null;

    this.db
      .insert(userState)
      .values({ chatId: sessionId, filter: text })
      .onConflictDoUpdate({ target: userState.chatId, set: { filter: text } })
      .run();

    return { sessionId, filter: parseFilter(text) };
  }
}
