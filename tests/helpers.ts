/**
 * Test Helpers Module
 *
 * Builders for catalog content and user profiles, so tests state only the
 * fields they care about.
 */

import type { ExercisePayload, FilterTags, TaskContent, UserProfile } from '../src/core/models';
import type { DrillServices } from '../src/services';

// ============================================================================
// Catalog Content
// ============================================================================

/**
 * A payload with a question and answer derived from `key`, plus overrides.
 */
export function payload(key: string, overrides: Partial<ExercisePayload> = {}): ExercisePayload {
  return { q: `Question ${key}`, a: `answer-${key}`, ...overrides };
}

export function taskContent(
  key: string,
  filterTags: FilterTags = {},
  overrides: Partial<ExercisePayload> = {}
): TaskContent {
  return { filterTags, payload: payload(key, overrides) };
}

/**
 * Adds tasks to the catalog in order and returns their ids.
 */
export async function addTasks(services: DrillServices, entries: TaskContent[]): Promise<number[]> {
  const ids: number[] = [];
  for (const entry of entries) {
    ids.push(await services.catalog.upsert(entry.filterTags, entry.payload));
  }
  return ids;
}

// ============================================================================
// Users
// ============================================================================

export function profile(uid: number, fullName: string = `User ${uid}`, username?: string | null): UserProfile {
  return { uid, fullName, ...(username !== undefined && { username }) };
}

/**
 * Registers a user so that answers can reference it.
 */
export async function registerUser(services: DrillServices, uid: number): Promise<void> {
  await services.users.touch(profile(uid));
}

// ============================================================================
// HTTP
// ============================================================================

/**
 * Request options for a JSON body.
 */
export function jsonRequest(method: 'POST' | 'PUT', body: unknown): RequestInit {
  return {
    method,
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify(body),
  };
}
