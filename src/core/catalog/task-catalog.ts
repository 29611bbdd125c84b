/**
 * TaskCatalog - Content-Addressed Exercise Store
 *
 * Tasks are deduplicated by the hash of their tags and payload: submitting
 * the same content twice returns the first id and creates nothing. Tasks are
 * retired with `deactivate` rather than deleted, so assignments and answers
 * referencing them stay meaningful. `pruneInactive` is the only path that
 * removes rows, and history survives it as dangling ids.
 */

import type { DrillStore } from '../../storage/store';
import { NotFoundError } from '../errors';
import type {
  ExercisePayload,
  FilterInfo,
  FilterPredicate,
  FilterTags,
  Task,
  TaskContent,
  TaskRef,
} from '../models';
import { createLogger } from '../../logger';
import { contentHash } from './content-hash';
import { matchesFilter } from './filter';

const log = createLogger('Catalog');

export interface CatalogQueryOptions {
  /** Without an ordering the result order is unspecified */
  orderBy?: 'id';
}

export interface SyncResult {
  /** Distinct tasks now active from the supplied entries */
  upserted: number;
  /** Previously active tasks retired because they were not supplied */
  deactivated: number;
}

function compareText(a: string, b: string): number {
  const left = a.toLowerCase();
  const right = b.toLowerCase();
  return left < right ? -1 : left > right ? 1 : 0;
}

/**
 * Lists each tag name with its distinct values, both sorted.
 * Values differing only in case are reported once, in their first spelling.
 */
export function buildFilterInfo(tasks: Task[]): FilterInfo[] {
  const byName = new Map<string, Map<string, string>>();

  for (const task of tasks) {
    for (const [name, value] of Object.entries(task.filterTags)) {
      let values = byName.get(name);
      if (!values) {
        values = new Map();
        byName.set(name, values);
      }
      const key = value.toLowerCase();
      if (!values.has(key)) {
        values.set(key, value);
      }
    }
  }

  return [...byName.entries()]
    .sort(([a], [b]) => compareText(a, b))
    .map(([name, values]) => ({
      name,
      possibleValues: [...values.values()].sort(compareText),
    }));
}

export class TaskCatalog {
  constructor(private readonly store: DrillStore) {}

  /**
   * Adds a task unless identical content is already stored.
   *
   * @returns The id of the new or existing task
   */
  async upsert(filterTags: FilterTags, payload: ExercisePayload): Promise<number> {
    const hash = contentHash(filterTags, payload);

    const { id, created } = await this.store.write('catalog.upsert', (repos) =>
      repos.tasks.insertIfAbsent({ hash, filterTags, payload })
    );

    if (created) {
      log.debug(`Created task ${id}`);
    }
    return id;
  }

  /**
   * Retires a task. Assignments and answers referencing it are untouched.
   *
   * @throws {NotFoundError} If no task has this id
   */
  async deactivate(taskId: number): Promise<void> {
    const found = await this.store.write('catalog.deactivate', (repos) =>
      repos.tasks.setActive(taskId, false)
    );

    if (!found) {
      throw new NotFoundError('task', taskId);
    }
    log.info(`Deactivated task ${taskId}`);
  }

  /**
   * Active tasks whose tags satisfy the predicate (`null` matches all).
   */
  async query(predicate: FilterPredicate | null, options: CatalogQueryOptions = {}): Promise<Task[]> {
    const tasks = await this.store.read('catalog.query', (repos) =>
      repos.tasks.findActive({ orderById: options.orderBy === 'id' })
    );
    return tasks.filter((task) => matchesFilter(task.filterTags, predicate));
  }

  /**
   * Resolves a task id, including retired tasks. A deleted task resolves to
   * the unknown placeholder.
   */
  async get(taskId: number): Promise<TaskRef> {
    const task = await this.store.read('catalog.get', (repos) => repos.tasks.findById(taskId));
    return task ? { kind: 'known', task } : { kind: 'unknown', taskId };
  }

  /**
   * Makes the listed entries the whole active catalog: each is inserted or
   * re-activated, every other active task is retired. One transaction.
   */
  async sync(entries: TaskContent[]): Promise<SyncResult> {
    const prepared = entries.map((entry) => ({
      hash: contentHash(entry.filterTags, entry.payload),
      filterTags: entry.filterTags,
      payload: entry.payload,
    }));

    const result = await this.store.write('catalog.sync', (repos) => {
      const ids = new Set<number>();
      for (const entry of prepared) {
        ids.add(repos.tasks.upsertActive(entry));
      }
      const deactivated = repos.tasks.deactivateAllExcept([...ids]);
      return { upserted: ids.size, deactivated };
    });

    log.info(`Synced catalog: ${result.upserted} active task(s), ${result.deactivated} retired`);
    return result;
  }

  /**
   * Tag names used by active tasks, each with its distinct values.
   */
  async collectFilterInfo(): Promise<FilterInfo[]> {
    const tasks = await this.store.read('catalog.filters', (repos) => repos.tasks.findActive());
    return buildFilterInfo(tasks);
  }

  /**
   * Deletes retired tasks.
   *
   * @returns Number of tasks deleted
   */
  async pruneInactive(): Promise<number> {
    const deleted = await this.store.write('catalog.prune', (repos) => repos.tasks.deleteInactive());
    if (deleted > 0) {
      log.info(`Pruned ${deleted} retired task(s)`);
    }
    return deleted;
  }
}
