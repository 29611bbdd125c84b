/**
 * Integration Tests: SessionFilterStore and UserDirectory
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { parseFilter } from '../../src/core/catalog/filter';
import { NotFoundError } from '../../src/core/errors';
import { MINUTE_MS, T0, cleanupTestContext, createTestContext, type TestContext } from '../setup';
import { profile } from '../helpers';

describe('SessionFilterStore', () => {
  let ctx: TestContext;

  beforeEach(() => {
    ctx = createTestContext();
  });

  afterEach(() => {
    cleanupTestContext(ctx);
  });

  it('has no filter for an unknown session', async () => {
    expect(await ctx.services.filters.getFilter(100)).toBeNull();
  });

  it('keeps the last filter written', async () => {
    const { filters } = ctx.services;
    await filters.setFilter(100, parseFilter('case=genitive'));
    await filters.setFilter(100, parseFilter('case=dative; plural'));

    expect(await filters.getFilter(100)).toEqual({
      groups: [
        { field: 'case', values: ['dative'] },
        { field: null, values: ['plural'] },
      ],
    });
  });

  it('clears the filter with null', async () => {
    const { filters } = ctx.services;
    await filters.setFilter(100, parseFilter('plural'));
    await filters.setFilter(100, null);

    expect(await filters.getFilter(100)).toBeNull();
    expect(ctx.repos.sessions.findById(100)).toEqual({ sessionId: 100, filter: null });
  });

  it('keeps sessions apart', async () => {
    const { filters } = ctx.services;
    await filters.setFilter(1, parseFilter('plural'));

    expect(await filters.getFilter(2)).toBeNull();
  });
});

describe('UserDirectory', () => {
  let ctx: TestContext;

  beforeEach(() => {
    ctx = createTestContext();
  });

  afterEach(() => {
    cleanupTestContext(ctx);
  });

  it('creates a user on first contact', async () => {
    const result = await ctx.services.users.touch(profile(7, 'Ada Lovelace', 'ada'));

    expect(result).toEqual({
      isNew: true,
      user: { uid: 7, username: 'ada', fullName: 'Ada Lovelace', createdAt: T0, lastActiveAt: T0 },
    });
  });

  it('refreshes profile and activity on later contact', async () => {
    const { users } = ctx.services;
    await users.touch(profile(7, 'Ada', 'ada'));
    const later = ctx.clock.advance(5 * MINUTE_MS);

    const result = await users.touch(profile(7, 'Ada Lovelace', 'countess'));

    expect(result).toEqual({
      isNew: false,
      user: { uid: 7, username: 'countess', fullName: 'Ada Lovelace', createdAt: T0, lastActiveAt: later },
    });
  });

  it('keeps the stored handle when none is given and clears it on null', async () => {
    const { users } = ctx.services;
    await users.touch(profile(7, 'Ada', 'ada'));

    expect((await users.touch(profile(7, 'Ada'))).user.username).toBe('ada');
    expect((await users.touch(profile(7, 'Ada', null))).user.username).toBeNull();
  });

  it('returns null for an unknown user', async () => {
    expect(await ctx.services.users.get(404)).toBeNull();
  });

  it('marks a user active', async () => {
    const { users } = ctx.services;
    await users.touch(profile(7));
    const at = new Date(T0.getTime() + 60 * MINUTE_MS);

    await users.markActive(7, at);

    expect((await users.get(7))?.lastActiveAt).toEqual(at);
  });

  it('refuses to mark an unknown user active', async () => {
    await expect(ctx.services.users.markActive(404)).rejects.toBeInstanceOf(NotFoundError);
  });
});
