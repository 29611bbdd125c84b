/**
 * Health and Index Endpoint Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { Hono } from 'hono';
import { cleanupTestContext, createTestApp, createTestContext, type TestContext } from '../setup';
import { addTasks, taskContent } from '../helpers';

describe('Health and index', () => {
  let ctx: TestContext;
  let app: Hono;

  beforeEach(() => {
    ctx = createTestContext();
    app = createTestApp(ctx);
  });

  afterEach(() => {
    cleanupTestContext(ctx);
  });

  it('GET /health reports ok with the active task count', async () => {
    await addTasks(ctx.services, [taskContent('1'), taskContent('2')]);

    const response = await app.request('/health');

    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({
      success: true,
      data: {
        status: 'ok',
        timestamp: expect.any(String),
        environment: 'test',
        version: '0.1.0',
        activeTasks: 2,
      },
    });
  });

  it('GET /health reports a closed store as degraded', async () => {
    ctx.sqlite.close();

    const response = await app.request('/health');

    expect(response.status).toBe(503);
    expect(await response.json()).toMatchObject({
      success: true,
      data: { status: 'degraded', activeTasks: null },
    });
  });

  it('GET /api lists the endpoints', async () => {
    const response = await app.request('/api');

    expect(await response.json()).toMatchObject({
      success: true,
      data: {
        name: 'Vocabulary Drill API',
        endpoints: expect.arrayContaining([
          { path: '/api/sessions/:sessionId/events', description: 'Session events (next, filter, answer)' },
        ]),
      },
    });
  });

  it('answers unknown routes with the error envelope', async () => {
    const response = await app.request('/api/nothing-here');

    expect(response.status).toBe(404);
    expect(await response.json()).toEqual({
      success: false,
      error: { code: 'NOT_FOUND', message: 'Route GET /api/nothing-here not found' },
    });
  });
});
