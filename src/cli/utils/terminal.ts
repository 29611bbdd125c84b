/**
 * Terminal Utilities for CLI Output Formatting
 *
 * ANSI escape code wrappers plus the formatters the drill CLI uses to print
 * exercises, grading results and filter listings.
 *
 * Usage:
 * ```typescript
 * import { bold, green, formatExercise } from './terminal';
 *
 * console.log(bold('Import finished'));
 * console.log(formatExercise(view).join('\n'));
 * ```
 *
 * In non-TTY environments the codes pass through harmlessly.
 */

import type { FilterInfo } from '../../core/models';
import type { ExerciseView } from '../../core/presentation/exercise-view';

// =============================================================================
// Text Style Modifiers
// =============================================================================

export const bold = (s: string): string => `\x1b[1m${s}\x1b[0m`;

export const dim = (s: string): string => `\x1b[2m${s}\x1b[0m`;

// =============================================================================
// Color Functions
// =============================================================================

/** Success messages and correct answers */
export const green = (s: string): string => `\x1b[32m${s}\x1b[0m`;

/** Warnings and counts worth a second look */
export const yellow = (s: string): string => `\x1b[33m${s}\x1b[0m`;

/** Errors and wrong answers */
export const red = (s: string): string => `\x1b[31m${s}\x1b[0m`;

export const cyan = (s: string): string => `\x1b[36m${s}\x1b[0m`;

// =============================================================================
// Semantic Formatters
// =============================================================================

/**
 * Formats a horizontal separator line for visual section breaks.
 *
 * @example
 * console.log(formatSeparator());
 * // Output: "──────────────────────────────────────────────────"
 */
export function formatSeparator(width: number = 50): string {
  return dim('─'.repeat(width));
}

/**
 * Formats one line of command help, with the command highlighted.
 *
 * @example
 * console.log(formatCommandHelp('/next', 'Ask for an exercise'));
 * // Output: "  /next      - Ask for an exercise"
 */
export function formatCommandHelp(command: string, description: string): string {
  return `  ${yellow(command.padEnd(10))} - ${dim(description)}`;
}

/**
 * Renders an exercise: its text, then numbered options when there are any.
 */
export function formatExercise(view: ExerciseView): string[] {
  const lines = [cyan(view.text)];
  if (view.options.length > 0) {
    lines.push('');
    view.options.forEach((option, i) => {
      lines.push(`  ${yellow(String(i + 1))}. ${option}`);
    });
  }
  return lines;
}

/**
 * Renders the catalog's filter fields, one line per field.
 */
export function formatFilterInfo(info: FilterInfo[]): string[] {
  if (info.length === 0) {
    return [dim('  (no active tasks)')];
  }
  return info.map(({ name, possibleValues }) => `  ${bold(name)}: ${possibleValues.join(', ')}`);
}

/**
 * Formats a share as a percentage, or a dash when there is nothing to divide.
 *
 * @example
 * formatPercent(3, 4); // "75%"
 * formatPercent(0, 0); // "-"
 */
export function formatPercent(part: number, total: number): string {
  if (total === 0) {
    return '-';
  }
  return `${Math.round((part / total) * 100)}%`;
}

/**
 * Prints a blank line for visual spacing.
 */
export function printBlankLine(): void {
  console.log();
}
