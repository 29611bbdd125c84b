/**
 * Candidate Ranking
 *
 * Orders the eligible tasks of a session:
 *
 * 1. never asked in this session
 * 2. latest answer wrong, most recently wrong first
 * 3. everything else, least recently asked first
 *
 * Ties go to the lower task id. Tasks answered correctly within the cool-down
 * window are dropped before ranking. When the first bucket is not empty the
 * pick among it is random.
 */

import type { Task, TaskHistoryEntry } from '../models';

export interface RankingOptions {
  now: Date;
  cooldownMs: number;
}

/**
 * True while a correct answer is younger than the cool-down window.
 */
export function isCoolingDown(
  entry: TaskHistoryEntry | undefined,
  now: Date,
  cooldownMs: number
): boolean {
  if (!entry?.lastCorrectAt) {
    return false;
  }
  return now.getTime() - entry.lastCorrectAt.getTime() < cooldownMs;
}

function time(date: Date | null): number {
  return date ? date.getTime() : Number.NEGATIVE_INFINITY;
}

/**
 * Splits the candidates into the three ranking buckets, each sorted.
 */
export function bucketCandidates(
  tasks: Task[],
  history: Map<number, TaskHistoryEntry>,
  options: RankingOptions
): { fresh: Task[]; wrong: Task[]; rest: Task[] } {
  const fresh: Task[] = [];
  const wrong: Array<{ task: Task; entry: TaskHistoryEntry }> = [];
  const rest: Array<{ task: Task; entry: TaskHistoryEntry }> = [];

  for (const task of tasks) {
    const entry = history.get(task.id);
    if (!entry) {
      fresh.push(task);
    } else if (isCoolingDown(entry, options.now, options.cooldownMs)) {
      continue;
    } else if (entry.lastCorrect === false) {
      wrong.push({ task, entry });
    } else {
      rest.push({ task, entry });
    }
  }

  fresh.sort((a, b) => a.id - b.id);
  wrong.sort(
    (a, b) => time(b.entry.lastAnsweredAt) - time(a.entry.lastAnsweredAt) || a.task.id - b.task.id
  );
  rest.sort((a, b) => {
    const left = time(a.entry.lastAskedAt);
    const right = time(b.entry.lastAskedAt);
    if (left !== right) {
      return left < right ? -1 : 1;
    }
    return a.task.id - b.task.id;
  });

  return {
    fresh,
    wrong: wrong.map((item) => item.task),
    rest: rest.map((item) => item.task),
  };
}

/**
 * Full deterministic ranking, best first.
 */
export function rankCandidates(
  tasks: Task[],
  history: Map<number, TaskHistoryEntry>,
  options: RankingOptions
): Task[] {
  const { fresh, wrong, rest } = bucketCandidates(tasks, history, options);
  return [...fresh, ...wrong, ...rest];
}

/**
 * Chooses the next task, or null when nothing is eligible.
 */
export function pickNext(
  tasks: Task[],
  history: Map<number, TaskHistoryEntry>,
  options: RankingOptions & { random: () => number }
): Task | null {
  const { fresh, wrong, rest } = bucketCandidates(tasks, history, options);

  if (fresh.length > 0) {
    const index = Math.min(fresh.length - 1, Math.floor(options.random() * fresh.length));
    return fresh[Math.max(0, index)];
  }

  return wrong[0] ?? rest[0] ?? null;
}
