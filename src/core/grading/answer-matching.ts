/**
 * Answer Normalization and Comparison
 */

/**
 * Canonical form used for comparison: Unicode NFKC, trimmed, lower-cased,
 * runs of whitespace collapsed to one space.
 */
export function normalizeAnswer(text: string): string {
  return text.normalize('NFKC').trim().toLowerCase().replace(/\s+/g, ' ');
}

export function isCorrectAnswer(answer: string, expected: string): boolean {
  return normalizeAnswer(answer) === normalizeAnswer(expected);
}
