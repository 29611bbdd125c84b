import { describe, it, expect } from 'vitest';
import type { Task } from '../models';
import { buildFilterInfo } from './task-catalog';

function task(id: number, filterTags: Record<string, string>): Task {
  return { id, hash: id, active: true, filterTags, payload: { q: 'q', a: 'a' } };
}

describe('buildFilterInfo', () => {
  it('lists names and distinct values, sorted without regard to case', () => {
    const info = buildFilterInfo([
      task(1, { theme: 'verbs', Case: 'genitive' }),
      task(2, { theme: 'Nouns', Case: 'dative' }),
      task(3, { theme: 'nouns' }),
    ]);

    expect(info).toEqual([
      { name: 'Case', possibleValues: ['dative', 'genitive'] },
      { name: 'theme', possibleValues: ['Nouns', 'verbs'] },
    ]);
  });

  it('is empty for an empty catalog', () => {
    expect(buildFilterInfo([])).toEqual([]);
  });
});
