/**
 * Import Command
 *
 * Loads every task file in a directory and makes its tasks the active
 * catalog. Tasks missing from the files are retired; tasks with identical
 * content keep their ids, so assignments and answers stay linked.
 *
 * Usage (via CLI):
 * ```bash
 * npm run cli -- import ./data/tasks
 * npm run cli -- import ./data/tasks --prune
 * ```
 *
 * Nothing is written when any file fails to load: syncing a partial
 * directory would retire the tasks of the broken file.
 */

import { loadTaskDirectory } from '../../core/catalog/task-loader';
import type { SyncResult } from '../../core/catalog/task-catalog';
import type { DrillServices } from '../../services';
import { bold, dim, green, red, yellow, printBlankLine } from '../utils/terminal';

export interface ImportOptions {
  /** Delete retired tasks after the sync */
  prune?: boolean;
}

export interface ImportSummary extends SyncResult {
  files: number;
  pruned: number;
}

/**
 * @returns The summary, or null when the directory had invalid files
 */
export async function runImportCommand(
  services: DrillServices,
  dir: string,
  options: ImportOptions = {}
): Promise<ImportSummary | null> {
  const loaded = await loadTaskDirectory(dir);

  if (loaded.errors.length > 0) {
    console.log(red(`Error: ${loaded.errors.length} task file(s) in ${dir} are invalid.`));
    for (const error of loaded.errors) {
      console.log(`  ${bold(error.file)}`);
      for (const issue of error.issues) {
        console.log(dim(`    - ${issue}`));
      }
    }
    console.log(dim('Fix the files above and run the import again. The catalog was not changed.'));
    return null;
  }

  if (loaded.files.length === 0) {
    console.log(yellow(`No task files found in ${dir}.`));
    return null;
  }

  const result = await services.catalog.sync(loaded.entries);
  const pruned = options.prune ? await services.catalog.pruneInactive() : 0;

  printBlankLine();
  console.log(green(bold('Import finished')));
  console.log(`  Files read:       ${loaded.files.length}`);
  console.log(`  Active tasks:     ${result.upserted}`);
  console.log(`  Retired tasks:    ${result.deactivated}`);
  if (options.prune) {
    console.log(`  Deleted tasks:    ${pruned}`);
  }
  printBlankLine();

  return { ...result, files: loaded.files.length, pruned };
}
