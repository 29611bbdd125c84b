/**
 * Catalog Commands
 *
 * Small maintenance commands over the task catalog:
 *
 * - `filters`          - list the filter fields of the active tasks
 * - `deactivate <id>`  - retire one task
 * - `prune`            - delete retired tasks
 */

import { NotFoundError } from '../../core/errors';
import type { DrillServices } from '../../services';
import { bold, dim, green, red, formatFilterInfo, printBlankLine } from '../utils/terminal';

export async function runFiltersCommand(services: DrillServices): Promise<void> {
  const [info, active] = await Promise.all([
    services.catalog.collectFilterInfo(),
    services.catalog.query(null),
  ]);

  printBlankLine();
  console.log(bold(`Active tasks: ${active.length}`));
  printBlankLine();
  for (const line of formatFilterInfo(info)) {
    console.log(line);
  }
  printBlankLine();
  console.log(dim('Filter syntax: "case=genitive, dative; plural" (groups AND, values OR)'));
}

/**
 * @returns false when the task does not exist
 */
export async function runDeactivateCommand(services: DrillServices, taskId: number): Promise<boolean> {
  try {
    await services.catalog.deactivate(taskId);
  } catch (error) {
    if (error instanceof NotFoundError) {
      console.log(red(`Error: task ${taskId} not found.`));
      return false;
    }
    throw error;
  }

  console.log(green(`Task ${taskId} deactivated.`));
  return true;
}

export async function runPruneCommand(services: DrillServices): Promise<number> {
  const deleted = await services.catalog.pruneInactive();
  console.log(deleted > 0 ? green(`Deleted ${deleted} retired task(s).`) : dim('No retired tasks to delete.'));
  return deleted;
}
