/**
 * Exercise View Unit Tests
 *
 * Blank filling, the text layout and option selection. Randomness is fixed
 * so option order is exact.
 */

import { describe, it, expect } from 'vitest';
import { buildExerciseView, fillBlanks, sample, shuffle } from './exercise-view';

const first = (): number => 0;

describe('fillBlanks', () => {
  it('fills one blank with the base form', () => {
    expect(fillBlanks('Nie ma ***** w domu.', 'kot')).toBe('Nie ma [kot] w domu.');
  });

  it('fills blanks in order and gives the last blank the remaining words', () => {
    expect(fillBlanks('***** i *****', 'a b c')).toBe('[a] i [b c]');
  });

  it('marks blanks without a word', () => {
    expect(fillBlanks('***** i *****', 'a')).toBe('[a] i [?????]');
    expect(fillBlanks('Brak *****.', undefined)).toBe('Brak [?????].');
  });

  it('leaves questions without blanks unchanged', () => {
    expect(fillBlanks('Translate: cat', 'kot')).toBe('Translate: cat');
  });
});

describe('shuffle and sample', () => {
  it('keeps every item', () => {
    expect([...shuffle([1, 2, 3, 4], Math.random)].sort()).toEqual([1, 2, 3, 4]);
  });

  it('rotates left when random always returns 0', () => {
    expect(shuffle(['a', 'b', 'c', 'd'], first)).toEqual(['b', 'c', 'd', 'a']);
  });

  it('samples without replacement, capped at the pool size', () => {
    expect(sample(['a', 'b', 'c'], 2, first)).toEqual(['a', 'b']);
    expect(sample(['a', 'b'], 5, first)).toEqual(['a', 'b']);
    expect(sample(['a', 'b', 'c'], 3, () => 0.99)).toEqual(['c', 'a', 'b']);
  });

  it('does not modify the input', () => {
    const items = ['a', 'b', 'c'];
    shuffle(items, first);
    sample(items, 2, () => 0.99);
    expect(items).toEqual(['a', 'b', 'c']);
  });
});

describe('buildExerciseView', () => {
  it('lays out question, notes and hints', () => {
    const view = buildExerciseView(
      {
        q: 'Nie ma ***** w domu.',
        a: 'kota',
        base: 'kot',
        info: ['There is no cat at home.', 'Colloquial.'],
        hints: [
          { name: 'Case', value: 'genitive' },
          { name: 'Gender', value: 'masculine' },
        ],
      },
      first
    );

    expect(view.text).toBe(
      'Nie ma [kot] w domu.\n\nThere is no cat at home.\nColloquial.\n\nCase: genitive\nGender: masculine'
    );
    expect(view.options).toEqual([]);
  });

  it('offers the answer among at most three distractors', () => {
    const view = buildExerciseView({ q: 'q', a: 'psów', choices: ['psy', 'psach', 'psami'] }, first);
    expect(view.options).toEqual(['psy', 'psach', 'psami', 'psów']);
  });

  it('drops duplicate distractors and the answer itself', () => {
    const view = buildExerciseView({ q: 'q', a: 'a', choices: ['b', 'a', 'b', 'c', 'd', 'e'] }, first);
    expect(view.options).toHaveLength(4);
    expect(view.options).toContain('a');
    expect(new Set(view.options).size).toBe(4);
  });

  it('has no options when every choice equals the answer', () => {
    expect(buildExerciseView({ q: 'q', a: 'a', choices: ['a'] }, first).options).toEqual([]);
  });

  it('drops choices that only differ from the answer in case or spacing', () => {
    const view = buildExerciseView({ q: 'q', a: 'rot', choices: ['Rot', 'blau', ' ROT ', 'grün'] }, first);
    expect(view.options).toEqual(['blau', 'grün', 'rot']);
  });

  it('has no options when every choice would be graded correct', () => {
    expect(buildExerciseView({ q: 'q', a: 'kot', choices: ['Kot', ' kot'] }, first).options).toEqual([]);
  });
});
