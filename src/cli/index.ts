/**
 * Vocabulary Drill CLI Entry Point
 *
 * Administrative commands plus an interactive terminal drill.
 *
 * Available Commands:
 * - `migrate`                 - Apply pending database migrations
 * - `import [dir]`            - Sync the catalog with a directory of task files
 * - `filters`                 - List filter fields of the active tasks
 * - `deactivate <task-id>`    - Retire one task
 * - `prune`                   - Delete retired tasks
 * - `sweep`                   - Expire stale assignments
 * - `stats <uid>`             - Show a user's recent answers
 * - `drill <session-id>`      - Drill interactively in the terminal
 *
 * Usage Examples:
 * ```bash
 * npm run cli -- import
 * npm run cli -- stats 1001 --days 30
 * npm run cli -- drill 1001 --name "Test User"
 * ```
 *
 * The database and the task directory come from DATABASE_PATH and TASKS_DIR.
 */

import { Command, InvalidArgumentError } from 'commander';
import { getConfig } from '../config';
import { setLogLevel } from '../logger';
import { runFiltersCommand, runDeactivateCommand, runPruneCommand } from './commands/catalog';
import { runDrillCommand } from './commands/drill';
import { runImportCommand } from './commands/import';
import { runMigrateCommand } from './commands/migrate';
import { runStatsCommand } from './commands/stats';
import { runSweepCommand } from './commands/sweep';
import { withContext } from './utils/context';
import { red } from './utils/terminal';

/**
 * Commander argument parser for integer ids and counts.
 */
export function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isSafeInteger(parsed)) {
    throw new InvalidArgumentError('Not an integer.');
  }
  return parsed;
}

function parsePositiveInteger(value: string): number {
  const parsed = parseInteger(value);
  if (parsed <= 0) {
    throw new InvalidArgumentError('Must be greater than zero.');
  }
  return parsed;
}

export function createProgram(): Command {
  const program = new Command('vocab-drill')
    .description('Vocabulary drill engine: catalog maintenance and terminal drills')
    .version('0.1.0');

  program
    .command('migrate')
    .description('Apply pending database migrations')
    .action(() => {
      const config = getConfig();
      setLogLevel(config.logging.level);
      runMigrateCommand(config.database.path);
    });

  program
    .command('import [dir]')
    .description('Make the tasks in a directory of JSON files the active catalog')
    .option('--prune', 'Delete retired tasks afterwards', false)
    .action(async (dir: string | undefined, options: { prune: boolean }) => {
      const summary = await withContext(({ config, services }) =>
        runImportCommand(services, dir ?? config.tasks.dir, options)
      );
      if (!summary) {
        process.exitCode = 1;
      }
    });

  program
    .command('filters')
    .description('List filter fields and values of the active tasks')
    .action(async () => {
      await withContext(({ services }) => runFiltersCommand(services));
    });

  program
    .command('deactivate <task-id>')
    .description('Retire a task; its history is kept')
    .action(async (taskId: string) => {
      const found = await withContext(({ services }) =>
        runDeactivateCommand(services, parseInteger(taskId))
      );
      if (!found) {
        process.exitCode = 1;
      }
    });

  program
    .command('prune')
    .description('Delete retired tasks')
    .action(async () => {
      await withContext(({ services }) => runPruneCommand(services));
    });

  program
    .command('sweep')
    .description('Expire assignments left unanswered past the expiry')
    .action(async () => {
      await withContext(({ services }) => runSweepCommand(services));
    });

  program
    .command('stats <uid>')
    .description("Show a user's answer counts and latest answers")
    .option('-d, --days <days>', 'Period for the counts, in days', parsePositiveInteger, 7)
    .option('-n, --limit <limit>', 'Number of recent answers to show', parsePositiveInteger, 10)
    .action(async (uid: string, options: { days: number; limit: number }) => {
      const report = await withContext(({ services }) =>
        runStatsCommand(services, parseInteger(uid), options)
      );
      if (!report) {
        process.exitCode = 1;
      }
    });

  program
    .command('drill <session-id>')
    .description('Drill interactively; the session id doubles as the user id unless --uid is given')
    .option('-u, --uid <uid>', 'User id', parseInteger)
    .option('--name <name>', 'Full name shown to the operator', 'Terminal User')
    .option('--username <username>', 'Handle without the leading @')
    .action(
      async (
        sessionId: string,
        options: { uid?: number; name: string; username?: string }
      ) => {
        const id = parseInteger(sessionId);
        await withContext(({ services }) =>
          runDrillCommand(services, {
            sessionId: id,
            user: {
              uid: options.uid ?? id,
              username: options.username ?? null,
              fullName: options.name,
            },
          })
        );
      }
    );

  return program;
}

createProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    console.error(red('Fatal error:'), error instanceof Error ? error.message : error);
    process.exit(1);
  });
