/**
 * Integration Tests: TaskCatalog
 *
 * Runs the catalog against an in-memory database: content deduplication,
 * retirement, filtered queries, sync and pruning.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { NotFoundError } from '../../src/core/errors';
import { parseFilter } from '../../src/core/catalog/filter';
import { cleanupTestContext, createTestContext, type TestContext } from '../setup';
import { addTasks, payload, taskContent } from '../helpers';

describe('TaskCatalog', () => {
  let ctx: TestContext;

  beforeEach(() => {
    ctx = createTestContext();
  });

  afterEach(() => {
    cleanupTestContext(ctx);
  });

  describe('upsert', () => {
    it('returns the same id for identical content', async () => {
      const { catalog } = ctx.services;
      const first = await catalog.upsert({ case: 'genitive' }, payload('1'));
      const second = await catalog.upsert({ case: 'genitive' }, { a: 'answer-1', q: 'Question 1' });

      expect(second).toBe(first);
      expect(ctx.repos.tasks.findAll()).toHaveLength(1);
    });

    it('creates a new task when tags or payload differ', async () => {
      const { catalog } = ctx.services;
      const a = await catalog.upsert({ case: 'genitive' }, payload('1'));
      const b = await catalog.upsert({ case: 'dative' }, payload('1'));
      const c = await catalog.upsert({ case: 'genitive' }, payload('1', { info: ['note'] }));

      expect(new Set([a, b, c]).size).toBe(3);
    });

    it('does not reactivate a retired task', async () => {
      const { catalog } = ctx.services;
      const id = await catalog.upsert({}, payload('1'));
      await catalog.deactivate(id);

      expect(await catalog.upsert({}, payload('1'))).toBe(id);
      expect(ctx.repos.tasks.findById(id)?.active).toBe(false);
    });
  });

  describe('deactivate', () => {
    it('hides the task from queries but keeps it resolvable', async () => {
      const { catalog } = ctx.services;
      const [keep, retire] = await addTasks(ctx.services, [taskContent('1'), taskContent('2')]);

      await catalog.deactivate(retire);

      expect((await catalog.query(null)).map((t) => t.id)).toEqual([keep]);
      const ref = await catalog.get(retire);
      expect(ref.kind === 'known' && ref.task.active).toBe(false);
    });

    it('throws NotFoundError for an unknown id', async () => {
      await expect(ctx.services.catalog.deactivate(999)).rejects.toBeInstanceOf(NotFoundError);
    });
  });

  describe('query', () => {
    it('returns active tasks matching the filter, ordered by id on request', async () => {
      const ids = await addTasks(ctx.services, [
        taskContent('1', { case: 'genitive', number: 'plural' }),
        taskContent('2', { case: 'dative', number: 'singular' }),
        taskContent('3', { case: 'genitive', number: 'singular' }),
      ]);

      const genitive = await ctx.services.catalog.query(parseFilter('case=genitive'), { orderBy: 'id' });
      expect(genitive.map((t) => t.id)).toEqual([ids[0], ids[2]]);

      const singular = await ctx.services.catalog.query(parseFilter('case=genitive; singular'), { orderBy: 'id' });
      expect(singular.map((t) => t.id)).toEqual([ids[2]]);
    });

    it('stores tags and payload unchanged, extra keys included', async () => {
      const [id] = await addTasks(ctx.services, [
        taskContent('1', { theme: 'nouns' }, { hints: [{ name: 'Case', value: 'genitive' }], level: 'A1' }),
      ]);

      const ref = await ctx.services.catalog.get(id);
      expect(ref).toEqual({
        kind: 'known',
        task: {
          id,
          hash: expect.any(Number),
          active: true,
          filterTags: { theme: 'nouns' },
          payload: {
            q: 'Question 1',
            a: 'answer-1',
            hints: [{ name: 'Case', value: 'genitive' }],
            level: 'A1',
          },
        },
      });
    });
  });

  describe('get', () => {
    it('resolves a missing id to the unknown placeholder', async () => {
      expect(await ctx.services.catalog.get(42)).toEqual({ kind: 'unknown', taskId: 42 });
    });
  });

  describe('sync', () => {
    it('activates the listed tasks and retires the others', async () => {
      const { catalog } = ctx.services;
      const [kept, dropped] = await addTasks(ctx.services, [taskContent('1'), taskContent('2')]);

      const result = await catalog.sync([taskContent('1'), taskContent('3'), taskContent('3')]);

      expect(result).toEqual({ upserted: 2, deactivated: 1 });
      const active = await catalog.query(null, { orderBy: 'id' });
      expect(active.map((t) => t.payload.q)).toEqual(['Question 1', 'Question 3']);
      expect(active[0].id).toBe(kept);
      expect(ctx.repos.tasks.findById(dropped)?.active).toBe(false);
    });

    it('reactivates retired tasks with the same content under their old id', async () => {
      const { catalog } = ctx.services;
      const [id] = await addTasks(ctx.services, [taskContent('1')]);
      await catalog.deactivate(id);

      await catalog.sync([taskContent('1')]);

      expect(ctx.repos.tasks.findById(id)?.active).toBe(true);
      expect(ctx.repos.tasks.findAll()).toHaveLength(1);
    });

    it('retires everything when given no entries', async () => {
      await addTasks(ctx.services, [taskContent('1'), taskContent('2')]);

      expect(await ctx.services.catalog.sync([])).toEqual({ upserted: 0, deactivated: 2 });
      expect(await ctx.services.catalog.query(null)).toEqual([]);
    });
  });

  describe('collectFilterInfo', () => {
    it('describes active tasks only', async () => {
      const { catalog } = ctx.services;
      const [, retired] = await addTasks(ctx.services, [
        taskContent('1', { theme: 'nouns', case: 'genitive' }),
        taskContent('2', { theme: 'verbs', tense: 'past' }),
      ]);
      await catalog.deactivate(retired);

      expect(await catalog.collectFilterInfo()).toEqual([
        { name: 'case', possibleValues: ['genitive'] },
        { name: 'theme', possibleValues: ['nouns'] },
      ]);
    });
  });

  describe('pruneInactive', () => {
    it('deletes retired tasks only', async () => {
      const { catalog } = ctx.services;
      const [active, retired] = await addTasks(ctx.services, [taskContent('1'), taskContent('2')]);
      await catalog.deactivate(retired);

      expect(await catalog.pruneInactive()).toBe(1);
      expect(ctx.repos.tasks.findAll().map((t) => t.id)).toEqual([active]);
      expect(await catalog.get(retired)).toEqual({ kind: 'unknown', taskId: retired });
    });
  });
});
