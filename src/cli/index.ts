/**
 * CLI Entry Point
 *
 * Parses the command line, opens the configured database and routes to the
 * command handler.
 *
 * Available Commands:
 * - `analyze <learnerId>` - Performance analysis
 * - `predict <learnerId> <courseId>` - Completion prediction and feasibility
 * - `review <cardId> <quality>` - Apply one flashcard review
 * - `queue <learnerId>` - Flashcards due for review
 * - `plan ...` - Plan sub-commands (generate, show, adapt, override, session)
 * - (no args) - Show help
 *
 * Usage:
 * ```bash
 * npm run cli analyze learner-demo --course course-algebra
 * npm run cli predict learner-demo course-algebra --by 2024-06-01 --hours 6
 * npm run cli review fc_123 4
 * npm run cli plan generate learner-demo course-algebra --type monthly
 * ```
 */

import { fileURLToPath } from 'node:url';
import { CommanderError } from 'commander';
import { createRuntime } from '../runtime';
import type { StudyEngine } from '../core/engine';
import { runAnalyzeCommand } from './commands/analyze';
import { runPredictCommand } from './commands/predict';
import { runQueueCommand, runReviewCommand } from './commands/review';
import { createPlanCommand } from './commands/plan';
import { bold, dim, green, printBlankLine, red } from './utils/terminal';

/** Value following `name` in `args`, if any. */
function flagValue(args: readonly string[], name: string): string | undefined {
  const index = args.indexOf(name);
  return index === -1 ? undefined : args[index + 1];
}

/** A flag value that cannot be used; reported as a usage error. */
class FlagError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'FlagError';
  }
}

const USAGE = {
  analyze: 'analyze <learnerId> [--course <id>] [--window <days>]',
  predict: 'predict <learnerId> <courseId> [--by <date> --hours <n>]',
  review: 'review <cardId> <quality> [--seconds <n>]',
  queue: 'queue <learnerId> [--course <id>] [--minutes <n>]',
} as const;

function numericFlag(args: readonly string[], name: string): number | undefined {
  const raw = flagValue(args, name);
  if (raw === undefined) return undefined;
  const parsed = Number(raw);
  if (raw.trim() === '' || Number.isNaN(parsed)) {
    throw new FlagError(`${name} expects a number, got "${raw}"`);
  }
  return parsed;
}

function usage(message: string, example: string): number {
  console.log(red(`Error: ${message}`));
  console.log(dim(`Usage: npm run cli ${example}`));
  return 1;
}

/**
 * Runs one CLI invocation against the engine.
 *
 * @param args - Arguments after the script path
 * @returns Process exit code
 */
export async function main(args: readonly string[], engine: StudyEngine): Promise<number> {
  const [command, ...rest] = args;

  if ((args.includes('--help') || args.includes('-h')) && command !== 'plan') {
    printHelp();
    return 0;
  }

  try {
    return await dispatch(command, rest, engine);
  } catch (error) {
    if (error instanceof FlagError) {
      const example = Object.entries(USAGE).find(([name]) => name === command)?.[1];
      return usage(error.message, example ?? '--help');
    }
    throw error;
  }
}

async function dispatch(command: string | undefined, rest: readonly string[], engine: StudyEngine): Promise<number> {
  switch (command) {
    case 'analyze': {
      const learnerId = rest[0];
      if (!learnerId) return usage('Learner id is required.', USAGE.analyze);
      return runAnalyzeCommand(engine, learnerId, {
        courseId: flagValue(rest, '--course'),
        windowDays: numericFlag(rest, '--window'),
      });
    }

    case 'predict': {
      const [learnerId, courseId] = rest;
      if (!learnerId || !courseId) {
        return usage('Learner id and course id are required.', USAGE.predict);
      }
      const by = flagValue(rest, '--by');
      const targetDate = by === undefined ? undefined : new Date(by);
      if (targetDate && Number.isNaN(targetDate.getTime())) {
        return usage(`Invalid date: ${by}`, 'predict <learnerId> <courseId> --by YYYY-MM-DD --hours <n>');
      }
      return runPredictCommand(engine, learnerId, courseId, {
        targetMastery: numericFlag(rest, '--target'),
        targetDate,
        weeklyHours: numericFlag(rest, '--hours'),
      });
    }

    case 'review': {
      const [cardId, quality] = rest;
      const grade = Number(quality);
      if (!cardId || quality === undefined || Number.isNaN(grade)) {
        return usage('Card id and a quality from 0 to 5 are required.', USAGE.review);
      }
      return runReviewCommand(engine, cardId, grade, numericFlag(rest, '--seconds'));
    }

    case 'queue': {
      const learnerId = rest[0];
      if (!learnerId) return usage('Learner id is required.', USAGE.queue);
      return runQueueCommand(engine, learnerId, {
        courseId: flagValue(rest, '--course'),
        availableMinutes: numericFlag(rest, '--minutes'),
      });
    }

    case 'plan': {
      let exitCode = 0;
      const planCmd = createPlanCommand(engine, (code) => {
        exitCode = code;
      });
      try {
        await planCmd.parseAsync(rest, { from: 'user' });
      } catch (error) {
        if (error instanceof CommanderError) return error.exitCode;
        throw error;
      }
      return exitCode;
    }

    case 'help':
    case undefined:
      printHelp();
      return 0;

    default:
      console.log(red(`Unknown command: ${command}`));
      printBlankLine();
      printHelp();
      return 1;
  }
}

function printHelp(): void {
  printBlankLine();
  console.log(bold('Study Planner CLI'));
  console.log(dim('Adaptive study plans and performance analytics'));
  printBlankLine();
  console.log(bold('Usage:'));
  console.log('  npm run cli <command> [options]');
  printBlankLine();
  console.log(bold('Commands:'));
  console.log(`  ${green('analyze <learner>')}           Performance analysis`);
  console.log(`  ${green('predict <learner> <course>')}  Completion prediction`);
  console.log(`  ${green('review <card> <quality>')}     Apply a flashcard review (quality 0-5)`);
  console.log(`  ${green('queue <learner>')}             Flashcards due for review`);
  console.log(`  ${green('plan <sub-command>')}          generate | show | adapt | override | session`);
  console.log(`  ${green('help')}                        Show this help message`);
  printBlankLine();
  console.log(bold('Examples:'));
  console.log('  npm run cli analyze learner-demo --course course-algebra --window 14');
  console.log('  npm run cli predict learner-demo course-algebra --by 2024-06-01 --hours 6');
  console.log('  npm run cli plan generate learner-demo course-algebra --type monthly');
  console.log('  npm run cli plan --help');
  printBlankLine();
  console.log(bold('Environment Variables:'));
  console.log(`  ${green('DATABASE_PATH')}  Path to SQLite database (optional)`);
  printBlankLine();
}

async function run(): Promise<number> {
  const runtime = createRuntime();
  try {
    return await main(process.argv.slice(2), runtime.engine);
  } finally {
    runtime.close();
  }
}

// Only run when executed directly, not when imported by tests
if (process.argv[1] === fileURLToPath(import.meta.url)) {
  run().then(
    (exitCode) => {
      process.exitCode = exitCode;
    },
    (error: unknown) => {
      console.error(red('\nFatal error:'));
      console.error(dim(error instanceof Error ? error.message : String(error)));
      if (process.env.DEBUG && error instanceof Error) {
        console.error(dim(error.stack ?? ''));
      }
      process.exitCode = 1;
    }
  );
}
