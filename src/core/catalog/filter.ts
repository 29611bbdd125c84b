/**
 * Session Filter Predicates
 *
 * Textual form, as typed by a user and stored in `user_state.filter`:
 *
 * ```
 * case=genitive, accusative; plural
 * ```
 *
 * - `;` separates groups, all of which must match (AND)
 * - `,` separates values inside a group, any of which may match (OR)
 * - `name=` scopes a group to one tag; scoped values must equal the tag value
 * - unscoped values match when any tag value contains them
 * - `-` or an empty string mean "no filter"
 *
 * Comparisons ignore case. Parsing lower-cases names and values.
 */

import type { FilterGroup, FilterPredicate, FilterTags } from '../models';

export const NO_FILTER_TEXT = '-';

function splitValues(text: string): string[] {
  return text
    .split(',')
    .map((value) => value.trim().toLowerCase())
    .filter((value) => value.length > 0);
}

/**
 * Parses the textual filter form.
 *
 * @returns The predicate, or `null` for "no filter"
 *
 * @example
 * ```typescript
 * parseFilter('case=genitive; plural');
 * // { groups: [{ field: 'case', values: ['genitive'] },
 * //            { field: null, values: ['plural'] }] }
 * ```
 */
export function parseFilter(text: string | null | undefined): FilterPredicate | null {
  if (text === null || text === undefined) {
    return null;
  }

  const trimmed = text.trim();
  if (trimmed === '' || trimmed === NO_FILTER_TEXT) {
    return null;
  }

  const groups: FilterGroup[] = [];

  for (const rawGroup of trimmed.split(';')) {
    const eqIndex = rawGroup.indexOf('=');
    const field = eqIndex >= 0 ? rawGroup.slice(0, eqIndex).trim().toLowerCase() : '';
    const values = splitValues(eqIndex >= 0 ? rawGroup.slice(eqIndex + 1) : rawGroup);

    if (values.length === 0) {
      continue;
    }

    groups.push({ field: field === '' ? null : field, values });
  }

  return groups.length === 0 ? null : { groups };
}

/**
 * Renders a predicate back to its textual form. `parseFilter` reads the
 * result back into an equal predicate.
 */
export function formatFilter(predicate: FilterPredicate | null): string {
  if (!predicate || predicate.groups.length === 0) {
    return NO_FILTER_TEXT;
  }

  return predicate.groups
    .map((group) => {
      const values = group.values.join(', ');
      return group.field ? `${group.field}=${values}` : values;
    })
    .join('; ');
}

function groupMatches(entries: Array<[string, string]>, group: FilterGroup): boolean {
  return group.values.some((expected) => {
    const value = expected.toLowerCase();
    if (group.field !== null) {
      const field = group.field.toLowerCase();
      return entries.some(([name, tagValue]) => name === field && tagValue === value);
    }
    return entries.some(([, tagValue]) => tagValue.includes(value));
  });
}

/**
 * True when the tags satisfy every group of the predicate.
 * A `null` predicate matches everything.
 */
export function matchesFilter(tags: FilterTags, predicate: FilterPredicate | null): boolean {
  if (!predicate) {
    return true;
  }

  const entries = Object.entries(tags).map(
    ([name, value]): [string, string] => [name.toLowerCase(), String(value).toLowerCase()]
  );

  return predicate.groups.every((group) => groupMatches(entries, group));
}
