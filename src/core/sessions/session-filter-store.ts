/**
 * SessionFilterStore - Per-Session Filter
 *
 * Last write wins; there is no history of earlier filters. A session that
 * never set a filter has none, which matches every active task.
 */

import type { DrillStore } from '../../storage/store';
import type { FilterPredicate } from '../models';

export class SessionFilterStore {
  constructor(private readonly store: DrillStore) {}

  /**
   * Replaces the session's filter, creating its row if needed.
   * `null` clears the filter.
   */
  async setFilter(sessionId: number, predicate: FilterPredicate | null): Promise<void> {
    await this.store.write('sessions.setFilter', (repos) => repos.sessions.saveFilter(sessionId, predicate));
  }

  async getFilter(sessionId: number): Promise<FilterPredicate | null> {
    const state = await this.store.read('sessions.getFilter', (repos) => repos.sessions.findById(sessionId));
    return state?.filter ?? null;
  }
}
