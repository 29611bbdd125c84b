/**
 * Users API Endpoint Tests
 *
 * Endpoints tested:
 * - GET /api/users/:uid
 * - GET /api/users/:uid/answers
 * - GET /api/users/:uid/stats
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { Hono } from 'hono';
import { cleanupTestContext, createTestApp, createTestContext, DAY_MS, T0, type TestContext } from '../setup';
import { addTasks, profile, taskContent } from '../helpers';

describe('Users API', () => {
  let ctx: TestContext;
  let app: Hono;

  beforeEach(() => {
    ctx = createTestContext({ autoAdvance: false });
    app = createTestApp(ctx);
  });

  afterEach(() => {
    cleanupTestContext(ctx);
  });

  /**
   * User 42 answers the only task: wrong at T0, right the next day.
   */
  async function answerTwice(): Promise<number> {
    const [taskId] = await addTasks(ctx.services, [taskContent('1')]);
    const user = profile(42, 'Ada');

    await ctx.services.engine.handle({ sessionId: 7, user, event: { type: 'request-next' } });
    await ctx.services.engine.handle({
      sessionId: 7,
      user,
      event: { type: 'answer-submitted', answer: 'wrong' },
    });

    ctx.clock.advance(DAY_MS);
    await ctx.services.engine.handle({ sessionId: 7, user, event: { type: 'request-next' } });
    await ctx.services.engine.handle({
      sessionId: 7,
      user,
      event: { type: 'answer-submitted', answer: 'answer-1' },
    });

    return taskId;
  }

  describe('GET /api/users/:uid', () => {
    it('returns the user', async () => {
      await ctx.services.users.touch(profile(42, 'Ada', 'ada'));

      const response = await app.request('/api/users/42');

      expect(await response.json()).toEqual({
        success: true,
        data: {
          uid: 42,
          username: 'ada',
          fullName: 'Ada',
          createdAt: T0.toISOString(),
          lastActiveAt: T0.toISOString(),
        },
      });
    });

    it('returns 404 for an unknown user', async () => {
      const response = await app.request('/api/users/5');

      expect(response.status).toBe(404);
      expect(await response.json()).toEqual({
        success: false,
        error: {
          code: 'NOT_FOUND',
          message: "User with ID '5' not found",
          details: { resource: 'User', id: 5 },
        },
      });
    });
  });

  describe('GET /api/users/:uid/answers', () => {
    it('lists answers newest first', async () => {
      const taskId = await answerTwice();

      const response = await app.request('/api/users/42/answers');

      expect(await response.json()).toMatchObject({
        success: true,
        data: {
          uid: 42,
          count: 2,
          answers: [
            { taskId, correct: true, answer: 'answer-1', task: { kind: 'known' } },
            { taskId, correct: false, answer: 'wrong', task: { kind: 'known' } },
          ],
        },
      });
    });

    it('honours the limit', async () => {
      await answerTwice();

      const response = await app.request('/api/users/42/answers?limit=1');

      expect(await response.json()).toMatchObject({
        data: { count: 1, answers: [{ answer: 'answer-1' }] },
      });
    });

    it('reports a pruned task as unknown', async () => {
      const taskId = await answerTwice();
      await ctx.services.catalog.deactivate(taskId);
      await ctx.services.catalog.pruneInactive();

      const response = await app.request('/api/users/42/answers?limit=1');

      expect(await response.json()).toMatchObject({
        data: { answers: [{ taskId, task: { kind: 'unknown', taskId } }] },
      });
    });

    it('rejects a zero limit', async () => {
      await ctx.services.users.touch(profile(42));

      const response = await app.request('/api/users/42/answers?limit=0');

      expect(response.status).toBe(400);
      expect(await response.json()).toMatchObject({
        error: { code: 'VALIDATION_ERROR', message: 'Invalid query parameters' },
      });
    });

    it('rejects a uid beyond the safe integer range', async () => {
      const response = await app.request('/api/users/9007199254740993/answers');

      expect(response.status).toBe(400);
      expect(await response.json()).toMatchObject({
        error: { code: 'VALIDATION_ERROR', message: 'Invalid path parameters' },
      });
    });

    it('returns 404 for an unknown user', async () => {
      const response = await app.request('/api/users/5/answers');

      expect(response.status).toBe(404);
    });
  });

  describe('GET /api/users/:uid/stats', () => {
    it('counts answers over the default week', async () => {
      await answerTwice();

      const response = await app.request('/api/users/42/stats');

      expect(await response.json()).toEqual({
        success: true,
        data: { uid: 42, days: 7, count: 2, correct: 1 },
      });
    });

    it('counts only answers inside the period', async () => {
      await answerTwice();
      ctx.clock.advance(DAY_MS / 2);

      const response = await app.request('/api/users/42/stats?days=1');

      expect(await response.json()).toEqual({
        success: true,
        data: { uid: 42, days: 1, count: 1, correct: 1 },
      });
    });

    it('returns 404 for an unknown user', async () => {
      const response = await app.request('/api/users/5/stats');

      expect(response.status).toBe(404);
    });
  });
});
