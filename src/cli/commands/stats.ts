/**
 * Stats Command Handler
 *
 * Displays a user's answer counts over a recent period followed by their
 * latest answers.
 *
 * Usage (via CLI):
 * ```bash
 * npm run cli -- stats 1001 --days 30 --limit 20
 * ```
 */

import type { AnswerWithTask } from '../../core/history/answer-history';
import type { AnswerStats } from '../../core/models';
import type { DrillServices } from '../../services';
import {
  bold,
  cyan,
  dim,
  green,
  red,
  yellow,
  formatPercent,
  formatSeparator,
  printBlankLine,
} from '../utils/terminal';

const DAY_MS = 24 * 60 * 60 * 1000;

/** Maximum characters of a question shown per answer line */
const MAX_QUESTION_LENGTH = 40;

export interface StatsOptions {
  days: number;
  limit: number;
}

export interface StatsReport {
  stats: AnswerStats;
  recent: AnswerWithTask[];
}

/**
 * @returns The report, or null for an unknown user
 */
export async function runStatsCommand(
  services: DrillServices,
  uid: number,
  options: StatsOptions
): Promise<StatsReport | null> {
  const user = await services.users.get(uid);
  if (!user) {
    console.log(red(`Error: user ${uid} not found.`));
    return null;
  }

  const [stats, recent] = await Promise.all([
    services.history.stats(uid, options.days * DAY_MS),
    services.history.listForUser(uid, options.limit),
  ]);

  printBlankLine();
  console.log(bold(cyan(`===== ${user.fullName} =====`)));
  console.log(dim(`  uid ${user.uid}${user.username ? `, @${user.username}` : ''}`));
  console.log(dim(`  last active ${user.lastActiveAt.toISOString()}`));
  printBlankLine();

  console.log(bold(`Last ${options.days} day(s)`));
  console.log(`  Answers:  ${yellow(String(stats.count))}`);
  console.log(`  Correct:  ${green(String(stats.correct))} (${formatPercent(stats.correct, stats.count)})`);
  printBlankLine();

  console.log(bold('Recent answers'));
  console.log(formatSeparator());
  if (recent.length === 0) {
    console.log(dim('  No answers yet.'));
  }
  for (const answer of recent) {
    console.log(formatAnswerLine(answer));
  }
  printBlankLine();

  return { stats, recent };
}

function formatAnswerLine(answer: AnswerWithTask): string {
  const mark = answer.correct === null ? dim('?') : answer.correct ? green('+') : red('-');
  const question =
    answer.task.kind === 'known' ? truncate(answer.task.task.payload.q) : dim(`task ${answer.task.taskId} (deleted)`);
  return `  ${mark} ${dim(answer.answeredAt.toISOString())}  ${question}  ${dim('->')} ${answer.answer ?? ''}`;
}

function truncate(text: string): string {
  const line = text.replace(/\s+/g, ' ');
  return line.length > MAX_QUESTION_LENGTH ? `${line.slice(0, MAX_QUESTION_LENGTH - 3)}...` : line;
}
