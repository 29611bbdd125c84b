/**
 * Candidate Ranking Unit Tests
 *
 * Bucket order, tie-breaking, cool-down and the random pick among tasks a
 * session has never seen.
 */

import { describe, it, expect } from 'vitest';
import type { Task, TaskHistoryEntry } from '../models';
import { isCoolingDown, pickNext, rankCandidates } from './ranking';

const HOUR_MS = 60 * 60 * 1000;
const now = new Date('2024-03-01T12:00:00Z');
const hoursAgo = (hours: number): Date => new Date(now.getTime() - hours * HOUR_MS);

function makeTask(id: number): Task {
  return { id, hash: id, active: true, filterTags: {}, payload: { q: `q${id}`, a: `a${id}` } };
}

function entry(taskId: number, overrides: Partial<TaskHistoryEntry> = {}): TaskHistoryEntry {
  return {
    taskId,
    lastAskedAt: null,
    lastAnsweredAt: null,
    lastCorrect: null,
    lastCorrectAt: null,
    ...overrides,
  };
}

function historyOf(...entries: TaskHistoryEntry[]): Map<number, TaskHistoryEntry> {
  return new Map(entries.map((e) => [e.taskId, e]));
}

const options = { now, cooldownMs: 12 * HOUR_MS };

describe('isCoolingDown', () => {
  it('is false without a correct answer', () => {
    expect(isCoolingDown(undefined, now, options.cooldownMs)).toBe(false);
    expect(isCoolingDown(entry(1, { lastCorrect: false }), now, options.cooldownMs)).toBe(false);
  });

  it('holds strictly inside the window', () => {
    expect(isCoolingDown(entry(1, { lastCorrectAt: hoursAgo(11) }), now, options.cooldownMs)).toBe(true);
    expect(isCoolingDown(entry(1, { lastCorrectAt: hoursAgo(12) }), now, options.cooldownMs)).toBe(false);
  });

  it('is always false with a zero window', () => {
    expect(isCoolingDown(entry(1, { lastCorrectAt: now }), now, 0)).toBe(false);
  });
});

describe('rankCandidates', () => {
  it('puts never-asked tasks first, then wrong ones, then the rest', () => {
    const tasks = [1, 2, 3, 4, 5].map(makeTask);
    const history = historyOf(
      entry(1, { lastAskedAt: hoursAgo(20), lastAnsweredAt: hoursAgo(20), lastCorrect: true, lastCorrectAt: hoursAgo(20) }),
      entry(2, { lastAskedAt: hoursAgo(5), lastAnsweredAt: hoursAgo(5), lastCorrect: false }),
      entry(4, { lastAskedAt: hoursAgo(30) })
    );

    expect(rankCandidates(tasks, history, options).map((t) => t.id)).toEqual([3, 5, 2, 4, 1]);
  });

  it('orders wrong answers most recent first, then by id', () => {
    const tasks = [1, 2, 3].map(makeTask);
    const history = historyOf(
      entry(1, { lastAskedAt: hoursAgo(3), lastAnsweredAt: hoursAgo(3), lastCorrect: false }),
      entry(2, { lastAskedAt: hoursAgo(1), lastAnsweredAt: hoursAgo(1), lastCorrect: false }),
      entry(3, { lastAskedAt: hoursAgo(3), lastAnsweredAt: hoursAgo(3), lastCorrect: false })
    );

    expect(rankCandidates(tasks, history, options).map((t) => t.id)).toEqual([2, 1, 3]);
  });

  it('orders the rest least recently asked first, then by id', () => {
    const tasks = [1, 2, 3].map(makeTask);
    const history = historyOf(
      entry(1, { lastAskedAt: hoursAgo(1) }),
      entry(2, { lastAskedAt: hoursAgo(2) }),
      entry(3, { lastAskedAt: hoursAgo(1) })
    );

    expect(rankCandidates(tasks, history, options).map((t) => t.id)).toEqual([2, 1, 3]);
  });

  it('drops tasks in cool-down', () => {
    const tasks = [1, 2].map(makeTask);
    const history = historyOf(
      entry(1, { lastAskedAt: hoursAgo(1), lastAnsweredAt: hoursAgo(1), lastCorrect: true, lastCorrectAt: hoursAgo(1) }),
      entry(2, { lastAskedAt: hoursAgo(2) })
    );

    expect(rankCandidates(tasks, history, options).map((t) => t.id)).toEqual([2]);
  });

  it('drops a task answered wrong shortly after a correct answer', () => {
    const tasks = [makeTask(1)];
    const history = historyOf(
      entry(1, { lastAskedAt: hoursAgo(1), lastAnsweredAt: hoursAgo(1), lastCorrect: false, lastCorrectAt: hoursAgo(2) })
    );

    expect(rankCandidates(tasks, history, options)).toEqual([]);
  });
});

describe('pickNext', () => {
  it('returns null when nothing is eligible', () => {
    expect(pickNext([], new Map(), { ...options, random: () => 0 })).toBeNull();
  });

  it('picks among never-asked tasks by the random value, in id order', () => {
    const tasks = [3, 1, 2].map(makeTask);
    expect(pickNext(tasks, new Map(), { ...options, random: () => 0 })?.id).toBe(1);
    expect(pickNext(tasks, new Map(), { ...options, random: () => 0.5 })?.id).toBe(2);
    expect(pickNext(tasks, new Map(), { ...options, random: () => 0.999 })?.id).toBe(3);
  });

  it('clamps out-of-range random values', () => {
    const tasks = [1, 2].map(makeTask);
    expect(pickNext(tasks, new Map(), { ...options, random: () => 1 })?.id).toBe(2);
    expect(pickNext(tasks, new Map(), { ...options, random: () => -1 })?.id).toBe(1);
  });

  it('takes the top ranked task once every task has been asked', () => {
    const tasks = [1, 2].map(makeTask);
    const history = historyOf(
      entry(1, { lastAskedAt: hoursAgo(1) }),
      entry(2, { lastAskedAt: hoursAgo(1), lastAnsweredAt: hoursAgo(1), lastCorrect: false })
    );
    expect(pickNext(tasks, history, { ...options, random: () => 0.9 })?.id).toBe(2);
  });
});
