/**
 * Task Domain Types
 *
 * A Task is one vocabulary-drill exercise. Tasks are content-addressed: the
 * catalog hashes the filter tags together with the exercise payload, so the
 * same exercise submitted twice maps onto a single row.
 *
 * Tasks are never edited in place. Retiring a task flips its `active` flag,
 * and pruning deletes the row while assignments and answers keep pointing at
 * the old id.
 */

/**
 * Structured tags used by session filters, e.g. `{ case: 'genitive', number: 'plural' }`.
 */
export type FilterTags = Record<string, string>;

/**
 * A named hint shown under the question (e.g. `{ name: 'Translation', value: 'water' }`).
 */
export interface Hint {
  name: string;
  value: string;
}

/**
 * The exercise itself.
 *
 * `q` may contain `*****` blanks; `base` then lists the base forms of the
 * missing words. Unknown keys are preserved and take part in the content hash.
 */
export interface ExercisePayload {
  /** Question text */
  q: string;
  /** Answer key */
  a: string;
  /** Base form(s) of the missing word(s), space separated */
  base?: string;
  /** Translations or notes shown with the question */
  info?: string[];
  hints?: Hint[];
  /** Distractors for multiple-choice delivery */
  choices?: string[];
  [key: string]: unknown;
}

/**
 * Everything that identifies a task's content. Also stored as the snapshot
 * carried on an assignment.
 */
export interface TaskContent {
  filterTags: FilterTags;
  payload: ExercisePayload;
}

/**
 * A catalog row.
 */
export interface Task extends TaskContent {
  id: number;
  /** Content hash of filterTags + payload (non-negative, fits in 53 bits) */
  hash: number;
  /** Retired tasks are kept but never selected */
  active: boolean;
}

/**
 * Resolution of a task id that may no longer exist.
 *
 * History rows reference tasks without a foreign key, so a lookup can come
 * back empty. That is the steady state after pruning, not an integrity error.
 */
export type TaskRef =
  | { kind: 'known'; task: Task }
  | { kind: 'unknown'; taskId: number };

/**
 * One conjunct of a filter: the task matches when any of `values` matches.
 *
 * With `field` set, a value matches the tag of that name by case-insensitive
 * equality. Without it, a value matches when any tag contains it.
 */
export interface FilterGroup {
  field: string | null;
  values: string[];
}

/**
 * A session filter: all groups must match.
 */
export interface FilterPredicate {
  groups: FilterGroup[];
}

/**
 * Tag name with the distinct values found in the active catalog.
 */
export interface FilterInfo {
  name: string;
  possibleValues: string[];
}
