/**
 * Exercise View
 *
 * Turns a payload into what a chat shows: the question with every `*****`
 * blank replaced by the base form to inflect, followed by the notes and
 * hints, plus the shuffled answer options for multiple choice.
 *
 * ```
 * Nie ma [kot] w domu.
 *
 * There are no cats at home.
 *
 * Case: genitive
 * ```
 */

import type { ExercisePayload } from '../models';
import { isCorrectAnswer } from '../grading/answer-matching';

export const BLANK_MARK = '*****';
export const MISSING_WORD = '?????';
export const MAX_DISTRACTORS = 3;

export interface ExerciseView {
  text: string;
  /** Empty when the payload has no distractors (free-text answer) */
  options: string[];
}

/**
 * Replaces each blank with `[word]` from `base`, in order. The last blank
 * receives every remaining word; blanks without a word get `[?????]`.
 */
export function fillBlanks(question: string, base: string | undefined): string {
  const words = (base ?? '').split(' ').filter((word) => word.length > 0);
  const parts = question.split(BLANK_MARK);

  let result = '';
  parts.forEach((part, i) => {
    result += part;
    if (i === parts.length - 1) {
      return;
    }
    if (i >= words.length) {
      result += `[${MISSING_WORD}]`;
    } else if (i + 2 < parts.length) {
      result += `[${words[i]}]`;
    } else {
      result += `[${words.slice(i).join(' ')}]`;
    }
  });
  return result;
}

function randomIndex(random: () => number, size: number): number {
  return Math.min(size - 1, Math.max(0, Math.floor(random() * size)));
}

/**
 * Fisher-Yates shuffle into a new array.
 */
export function shuffle<T>(items: readonly T[], random: () => number): T[] {
  const result = [...items];
  for (let i = result.length - 1; i > 0; i--) {
    const j = randomIndex(random, i + 1);
    [result[i], result[j]] = [result[j], result[i]];
  }
  return result;
}

/**
 * Picks up to `count` items without replacement, in pick order.
 */
export function sample<T>(items: readonly T[], count: number, random: () => number): T[] {
  const pool = [...items];
  const picked = Math.min(count, pool.length);
  for (let k = 0; k < picked; k++) {
    const j = k + randomIndex(random, pool.length - k);
    [pool[k], pool[j]] = [pool[j], pool[k]];
  }
  return pool.slice(0, picked);
}

export function buildExerciseView(
  payload: ExercisePayload,
  random: () => number = Math.random
): ExerciseView {
  let text = fillBlanks(payload.q, payload.base);

  if (payload.info && payload.info.length > 0) {
    text += `\n\n${payload.info.join('\n')}`;
  }

  if (payload.hints && payload.hints.length > 0) {
    text += `\n\n${payload.hints.map((hint) => `${hint.name}: ${hint.value}`).join('\n')}`;
  }

  // A choice that would be graded correct is the answer, not a distractor
  const distractors = [...new Set(payload.choices ?? [])].filter(
    (choice) => !isCorrectAnswer(choice, payload.a)
  );
  if (distractors.length === 0) {
    return { text, options: [] };
  }

  const options = shuffle([payload.a, ...sample(distractors, MAX_DISTRACTORS, random)], random);
  return { text, options };
}
