/**
 * Content Hashing for Catalog Deduplication
 *
 * A task is identified by its content: the SHA-256 of a canonical JSON
 * encoding of `{ filters, payload }`. Object keys are sorted recursively so
 * that key order never changes the hash; extra payload keys are included.
 *
 * The digest is truncated to its top 53 bits so that the value fits in a
 * JavaScript number and in an SQLite INTEGER without loss.
 */

import { createHash } from 'node:crypto';
import type { ExercisePayload, FilterTags } from '../models';

/**
 * JSON encoding with recursively sorted object keys.
 * `undefined` object members are dropped, as JSON.stringify does.
 */
export function canonicalJson(value: unknown): string {
  if (Array.isArray(value)) {
    return `[${value.map((item) => (item === undefined ? 'null' : canonicalJson(item))).join(',')}]`;
  }

  if (value !== null && typeof value === 'object') {
    const entries = Object.entries(value)
      .filter(([, member]) => member !== undefined)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([key, member]) => `${JSON.stringify(key)}:${canonicalJson(member)}`);
    return `{${entries.join(',')}}`;
  }

  return JSON.stringify(value) ?? 'null';
}

/**
 * Computes the catalog hash of a task's tags and payload.
 *
 * @returns A non-negative integer below 2^53
 */
export function contentHash(filterTags: FilterTags, payload: ExercisePayload): number {
  const digest = createHash('sha256')
    .update(canonicalJson({ filters: filterTags, payload }))
    .digest();

  return Number(digest.readBigUInt64BE(0) >> 11n);
}
