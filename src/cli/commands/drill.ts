/**
 * Drill Command Handler
 *
 * Runs an interactive drill in the terminal. The terminal plays the part of
 * a chat: every line becomes an engine event for one session, and every
 * reply is printed back.
 *
 * In-session commands:
 * - /next            - ask for an exercise
 * - /filter <text>   - change the filter (`/filter -` clears it)
 * - /filters         - show the current filter and the available fields
 * - /help            - list these commands
 * - /quit            - leave; an unanswered exercise stays outstanding
 *
 * Any other line is an answer. When the exercise lists options, typing an
 * option's number answers with that option.
 *
 * Usage (via CLI):
 * ```bash
 * npm run cli -- drill 1001 --name "Test User"
 * ```
 */

import * as readline from 'node:readline';
import { DrillError } from '../../core/errors';
import type { EngineReply, NextReply, SessionEvent } from '../../core/engine/types';
import type { UserProfile } from '../../core/models';
import type { DrillServices } from '../../services';
import {
  bold,
  dim,
  green,
  red,
  yellow,
  formatCommandHelp,
  formatExercise,
  formatFilterInfo,
  formatSeparator,
  printBlankLine,
} from '../utils/terminal';

export interface DrillOptions {
  sessionId: number;
  user: UserProfile;
}

export type DrillInput =
  | { kind: 'event'; event: SessionEvent }
  | { kind: 'help' }
  | { kind: 'quit' }
  | { kind: 'unknown'; command: string };

/**
 * Maps one line of input to what the loop should do.
 *
 * @param options - Options of the exercise on screen, for numbered answers
 */
export function parseDrillInput(input: string, options: string[] = []): DrillInput {
  const line = input.trim();

  if (!line.startsWith('/')) {
    const index = /^\d+$/.test(line) ? Number(line) - 1 : -1;
    const answer = index >= 0 && index < options.length ? options[index] : line;
    return { kind: 'event', event: { type: 'answer-submitted', answer } };
  }

  const spaceIndex = line.indexOf(' ');
  const command = (spaceIndex === -1 ? line : line.slice(0, spaceIndex)).toLowerCase();
  const argument = spaceIndex === -1 ? '' : line.slice(spaceIndex + 1).trim();

  switch (command) {
    case '/next':
    case '/n':
      return { kind: 'event', event: { type: 'request-next' } };
    case '/filter':
      return argument === ''
        ? { kind: 'event', event: { type: 'describe-filters' } }
        : { kind: 'event', event: { type: 'filter-change', filter: argument } };
    case '/filters':
      return { kind: 'event', event: { type: 'describe-filters' } };
    case '/help':
    case '/h':
      return { kind: 'help' };
    case '/quit':
    case '/exit':
    case '/q':
      return { kind: 'quit' };
    default:
      return { kind: 'unknown', command };
  }
}

function renderNext(reply: NextReply): string[] {
  if (reply.type === 'exhausted') {
    const scope = reply.filter === '-' ? '' : ` for filter "${reply.filter}"`;
    return [yellow(`No exercise available${scope}. Try again later or change the filter.`)];
  }
  const lines = reply.status === 'redelivered' ? [dim('(still waiting for your answer)')] : [];
  return [...lines, ...formatExercise(reply.view)];
}

/**
 * Renders an engine reply as terminal lines.
 */
export function renderReply(reply: EngineReply): string[] {
  switch (reply.type) {
    case 'exercise':
    case 'exhausted':
      return renderNext(reply);

    case 'filter-updated':
      return [green(`Filter set to "${reply.filter}" (${reply.matchingTasks} matching task(s)).`)];

    case 'filter-rejected':
      return [
        red(`Filter "${reply.filter}" rejected: ${reply.reason}.`),
        dim(`Current filter: ${reply.current}`),
      ];

    case 'graded': {
      const verdict =
        reply.correct === null
          ? [dim('Answer recorded.')]
          : reply.correct
            ? [green('Correct!')]
            : [red('Wrong.'), `Expected: ${bold(reply.expected ?? '')}`];
      return reply.next ? [...verdict, '', ...renderNext(reply.next)] : verdict;
    }

    case 'filters':
      return [`Current filter: ${bold(reply.current)}`, ...formatFilterInfo(reply.available)];
  }
}

/**
 * Options shown by the reply, if it put an exercise on screen.
 */
function optionsShown(reply: EngineReply): string[] | null {
  if (reply.type === 'exercise') {
    return reply.view.options;
  }
  if (reply.type === 'graded' && reply.next) {
    return reply.next.type === 'exercise' ? reply.next.view.options : [];
  }
  return null;
}

function printHelp(): void {
  printBlankLine();
  console.log(bold('Available Commands:'));
  console.log(formatCommandHelp('/next', 'Ask for an exercise'));
  console.log(formatCommandHelp('/filter', 'Set the filter, e.g. /filter case=genitive'));
  console.log(formatCommandHelp('/filters', 'Show the current filter and available fields'));
  console.log(formatCommandHelp('/help', 'Show this help message'));
  console.log(formatCommandHelp('/quit', 'Leave the drill'));
  printBlankLine();
}

export async function runDrillCommand(services: DrillServices, options: DrillOptions): Promise<void> {
  printBlankLine();
  console.log(formatSeparator(60));
  console.log(bold('  Vocabulary Drill'));
  console.log(formatSeparator(60));
  console.log(`  Session ${yellow(String(options.sessionId))} as ${green(options.user.fullName)}`);
  console.log(dim('  Commands: /next | /filter <text> | /filters | /help | /quit'));
  printBlankLine();

  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
    prompt: bold('> '),
  });

  let currentOptions: string[] = [];
  let isProcessing = false;

  const handleLine = async (line: string): Promise<'quit' | undefined> => {
    const input = parseDrillInput(line, currentOptions);

    switch (input.kind) {
      case 'quit':
        return 'quit';
      case 'help':
        printHelp();
        return undefined;
      case 'unknown':
        console.log(yellow(`Unknown command ${input.command}. Type /help.`));
        return undefined;
      case 'event':
        break;
    }

    try {
      const result = await services.engine.handle({
        sessionId: options.sessionId,
        user: options.user,
        event: input.event,
      });
      currentOptions = optionsShown(result.reply) ?? currentOptions;
      printBlankLine();
      for (const text of renderReply(result.reply)) {
        console.log(text);
      }
      printBlankLine();
    } catch (error) {
      if (!(error instanceof DrillError)) {
        throw error;
      }
      console.log(red(error.message));
    }
    return undefined;
  };

  rl.prompt();

  return new Promise<void>((resolve, reject) => {
    rl.on('line', (line: string) => {
      if (line.trim() === '') {
        rl.prompt();
        return;
      }
      if (isProcessing) {
        console.log(dim('Still processing... please wait.'));
        return;
      }
      isProcessing = true;

      handleLine(line)
        .then((outcome) => {
          if (outcome === 'quit') {
            rl.close();
            return;
          }
          rl.prompt();
        })
        .catch((error: unknown) => {
          rl.close();
          reject(error);
        })
        .finally(() => {
          isProcessing = false;
        });
    });

    rl.on('close', () => {
      console.log(dim('\nBye.'));
      resolve();
    });
  });
}
