/**
 * Store Retry Unit Tests
 *
 * Transient error detection, backoff arithmetic and the retry loop, with a
 * recorded sleep instead of real timers.
 */

import { describe, it, expect } from 'vitest';
import { StoreUnavailableError } from '../core/errors';
import { backoffDelay, isTransientStoreError, withStoreRetry } from './retry';

function sqliteError(code: string): Error & { code: string } {
  return Object.assign(new Error(`database error ${code}`), { code });
}

describe('isTransientStoreError', () => {
  it('recognizes busy and locked codes, including extended ones', () => {
    expect(isTransientStoreError(sqliteError('SQLITE_BUSY'))).toBe(true);
    expect(isTransientStoreError(sqliteError('SQLITE_BUSY_SNAPSHOT'))).toBe(true);
    expect(isTransientStoreError(sqliteError('SQLITE_LOCKED'))).toBe(true);
  });

  it('rejects everything else', () => {
    expect(isTransientStoreError(sqliteError('SQLITE_CONSTRAINT_UNIQUE'))).toBe(false);
    expect(isTransientStoreError(sqliteError('SQLITE_BUSYNESS'))).toBe(false);
    expect(isTransientStoreError(new Error('plain'))).toBe(false);
    expect(isTransientStoreError('SQLITE_BUSY')).toBe(false);
    expect(isTransientStoreError(null)).toBe(false);
  });

  it('looks through the cause chain', () => {
    const wrapped = new Error('query failed', { cause: sqliteError('SQLITE_BUSY') });
    expect(isTransientStoreError(wrapped)).toBe(true);
  });
});

describe('backoffDelay', () => {
  it('doubles from the base and stops at the cap', () => {
    expect([1, 2, 3, 4, 5, 6].map((attempt) => backoffDelay(attempt, 50, 1000))).toEqual([
      50, 100, 200, 400, 800, 1000,
    ]);
  });
});

describe('withStoreRetry', () => {
  function recorder(): { delays: number[]; sleep: (ms: number) => Promise<void> } {
    const delays: number[] = [];
    return {
      delays,
      sleep: async (ms) => {
        delays.push(ms);
      },
    };
  }

  it('returns the first successful result', async () => {
    const { delays, sleep } = recorder();
    let calls = 0;

    const result = await withStoreRetry(
      'test.op',
      () => {
        calls++;
        if (calls < 3) {
          throw sqliteError('SQLITE_BUSY');
        }
        return 'done';
      },
      { attempts: 3, baseDelayMs: 10, maxDelayMs: 100, sleep }
    );

    expect(result).toBe('done');
    expect(calls).toBe(3);
    expect(delays).toEqual([10, 20]);
  });

  it('gives up with StoreUnavailableError after the last attempt', async () => {
    const { delays, sleep } = recorder();
    const busy = sqliteError('SQLITE_BUSY');

    const failure = withStoreRetry(
      'test.op',
      () => {
        throw busy;
      },
      { attempts: 2, baseDelayMs: 10, maxDelayMs: 100, sleep }
    );

    await expect(failure).rejects.toBeInstanceOf(StoreUnavailableError);
    await expect(failure).rejects.toMatchObject({
      code: 'SERVICE_UNAVAILABLE',
      operation: 'test.op',
      attempts: 2,
      cause: busy,
    });
    expect(delays).toEqual([10]);
  });

  it('propagates other errors without retrying', async () => {
    const { delays, sleep } = recorder();
    const boom = new Error('boom');
    let calls = 0;

    await expect(
      withStoreRetry(
        'test.op',
        () => {
          calls++;
          throw boom;
        },
        { attempts: 5, baseDelayMs: 10, maxDelayMs: 100, sleep }
      )
    ).rejects.toBe(boom);
    expect(calls).toBe(1);
    expect(delays).toEqual([]);
  });
});
