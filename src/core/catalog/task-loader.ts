/**
 * Task File Loader
 *
 * Reads every `*.json` file in a directory. Each file holds one themed group:
 *
 * ```json
 * {
 *   "theme": "Nouns",
 *   "category": "Genitive plural",
 *   "tasks": [
 *     { "tags": { "case": "genitive" }, "q": "Nie ma *****.", "a": "kotów", "base": "kot" }
 *   ]
 * }
 * ```
 *
 * `theme` and `category` become tags on every task unless the task sets a
 * tag of the same name itself. A file that cannot be read or does not
 * validate is reported and skipped; the rest of the scan continues.
 */

import { readdir, readFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { ZodIssue } from 'zod';
import { InvalidTaskFileError } from '../errors';
import type { TaskContent } from '../models';
import { createLogger } from '../../logger';
import { taskFileSchema } from './schemas';

const log = createLogger('TaskLoader');

export interface LoadResult {
  entries: TaskContent[];
  /** Files read successfully */
  files: string[];
  /** Files skipped, with the reason */
  errors: InvalidTaskFileError[];
}

function describeIssue(issue: ZodIssue): string {
  const path = issue.path.join('.');
  return path ? `${path}: ${issue.message}` : issue.message;
}

/**
 * Validates one parsed task file and flattens it into catalog entries.
 *
 * @throws {InvalidTaskFileError} If the content does not match the file format
 */
export function parseTaskFile(content: unknown, file: string): TaskContent[] {
  const parsed = taskFileSchema.safeParse(content);
  if (!parsed.success) {
    throw new InvalidTaskFileError(file, parsed.error.errors.map(describeIssue));
  }

  const { theme, category, tasks } = parsed.data;

  return tasks.map(({ tags, ...payload }) => ({
    filterTags: { theme, category, ...tags },
    payload,
  }));
}

/**
 * Reads and validates one task file.
 *
 * @throws {InvalidTaskFileError} If the file is unreadable, not JSON, or invalid
 */
export async function loadTaskFile(path: string): Promise<TaskContent[]> {
  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (error) {
    throw new InvalidTaskFileError(path, [error instanceof Error ? error.message : String(error)]);
  }

  let content: unknown;
  try {
    content = JSON.parse(text);
  } catch (error) {
    throw new InvalidTaskFileError(path, [
      `not valid JSON (${error instanceof Error ? error.message : String(error)})`,
    ]);
  }

  return parseTaskFile(content, path);
}

/**
 * Loads every task file in `dir`, in file-name order.
 */
export async function loadTaskDirectory(dir: string): Promise<LoadResult> {
  const names = (await readdir(dir)).filter((name) => name.endsWith('.json')).sort();

  const result: LoadResult = { entries: [], files: [], errors: [] };

  for (const name of names) {
    const path = join(dir, name);
    try {
      const entries = await loadTaskFile(path);
      result.entries.push(...entries);
      result.files.push(path);
    } catch (error) {
      if (!(error instanceof InvalidTaskFileError)) {
        throw error;
      }
      log.error(error.message);
      result.errors.push(error);
    }
  }

  log.info(`Loaded ${result.entries.length} task(s) from ${result.files.length} file(s) in ${dir}`);
  return result;
}
