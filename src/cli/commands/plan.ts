/**
 * Plan Command
 *
 * Commander sub-commands for study plans:
 *
 * - `plan generate <learnerId> <courseId>`: generate and store a new plan
 * - `plan show <planId>`: print the effective schedule
 * - `plan adapt <planId>`: re-adapt the plan to current performance
 * - `plan override <planId>`: apply a schedule, difficulty or review override
 * - `plan session <planId> <sessionId> <completed|skipped>`: mark a session
 *
 * Usage:
 *   npm run cli plan generate learner-demo course-algebra --type monthly --daily-hours 1.5
 *   npm run cli plan override plan_1 --session w1_s2 --date 2024-03-09 --reason "Trip on Friday"
 */

import { Command, InvalidArgumentError, Option } from 'commander';
import type { StudyEngine } from '../../core/engine';
import type { OverrideRequest, PlanType, StudyPlan, StudySession } from '../../core/models';
import { printServiceError } from '../utils/errors';
import {
  bold,
  dim,
  formatField,
  formatRecommendation,
  formatSeparator,
  green,
  printBlankLine,
  printHeading,
  red,
  yellow,
} from '../utils/terminal';

const PLAN_TYPES: readonly PlanType[] = ['weekly', 'monthly', 'exam_prep', 'custom'];

/** Sessions `plan show` prints without `--all`. */
const SHOWN_SESSIONS = 10;

interface GenerateOptions {
  type: string;
  targetDate?: Date;
  dailyHours?: number;
  days?: number;
  weekends?: boolean;
}

interface ShowOptions {
  all?: boolean;
}

interface OverrideOptions {
  session?: string;
  date?: string;
  time?: string;
  difficulty?: number;
  reviewEvery?: number;
  reason: string;
}

export function parseNumberOption(value: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || Number.isNaN(parsed)) {
    throw new InvalidArgumentError('Not a number.');
  }
  return parsed;
}

export function parseDateOption(value: string): Date {
  const parsed = new Date(value);
  if (Number.isNaN(parsed.getTime())) {
    throw new InvalidArgumentError('Not a date (expected YYYY-MM-DD).');
  }
  return parsed;
}

/**
 * Builds the override request from the command options. Exactly one kind of
 * override must be given.
 */
export function toOverrideRequest(options: OverrideOptions): OverrideRequest | string {
  const kinds = [
    options.session !== undefined,
    options.difficulty !== undefined,
    options.reviewEvery !== undefined,
  ].filter(Boolean).length;
  if (kinds !== 1) {
    return 'Give exactly one of --session, --difficulty or --review-every';
  }

  if (options.session !== undefined) {
    return {
      type: 'schedule',
      data: { sessionId: options.session, date: options.date, startTime: options.time },
      reason: options.reason,
    };
  }
  if (options.difficulty !== undefined) {
    return { type: 'difficulty', data: { delta: options.difficulty }, reason: options.reason };
  }
  return { type: 'review_frequency', data: { everySessions: options.reviewEvery ?? 0 }, reason: options.reason };
}

function formatStatus(session: StudySession): string {
  switch (session.status) {
    case 'completed':
      return green('done');
    case 'skipped':
      return red('skipped');
    case 'scheduled':
      return dim('scheduled');
  }
}

export function printPlan(plan: StudyPlan, showAll = false): void {
  const { parameters } = plan;

  printHeading(`${plan.title} (${plan.id})`, 72);
  console.log(formatField('Status', `${plan.status}, ${plan.planType}, revision ${plan.revision}`));
  console.log(formatField('Dates', `${plan.startDate} to ${plan.endDate}`));
  console.log(
    formatField(
      'Rhythm',
      `${parameters.dailyHours} h/day, ${parameters.studyDaysPerWeek} days/week, ${parameters.sessionLengthMinutes} min sessions`
    )
  );
  console.log(formatField('Profile', `${parameters.learningProfile} (${parameters.difficultyAdaptation})`));
  console.log(
    formatField(
      'Daily load',
      `avg ${plan.loadSummary.averageDailyLoad}, max ${plan.loadSummary.maxDailyLoad}` +
        (plan.loadSummary.overloadedDays.length > 0
          ? yellow(`, overloaded: ${plan.loadSummary.overloadedDays.join(', ')}`)
          : '')
    )
  );

  const sessions = showAll
    ? plan.schedule
    : plan.schedule.filter((session) => session.status === 'scheduled').slice(0, SHOWN_SESSIONS);

  printBlankLine();
  console.log(bold(showAll ? 'Sessions' : 'Upcoming sessions'));
  for (const session of sessions) {
    console.log(
      `  ${session.date} ${session.startTime}  ${session.id.padEnd(12)} ${String(session.durationMinutes).padStart(3)} min  ` +
        `${session.content.focusTopic.padEnd(20)} load ${String(session.cognitiveLoad).padStart(3)}  ${formatStatus(session)}`
    );
  }
  const hidden = plan.schedule.length - sessions.length;
  if (hidden > 0) {
    console.log(dim(`  ... ${hidden} more (use --all)`));
  }

  if (plan.recommendations.length > 0) {
    printBlankLine();
    console.log(bold('Recommendations'));
    plan.recommendations.forEach((recommendation) => console.log(formatRecommendation(recommendation)));
  }
  console.log(formatSeparator(72));
  printBlankLine();
}

/**
 * Creates the `plan` command. Each action reports its exit code through
 * `report`; commander's own usage errors are thrown (see `exitOverride`).
 */
export function createPlanCommand(engine: StudyEngine, report: (exitCode: number) => void): Command {
  const planCmd = new Command('plan').description('Generate, inspect and adjust study plans').exitOverride();

  planCmd
    .command('generate <learnerId> <courseId>')
    .description('Generate a new plan; the previous active plan for the course is paused')
    .addOption(new Option('-t, --type <type>', 'Plan type').choices(PLAN_TYPES).default('weekly'))
    .option('--target-date <date>', 'Target date (YYYY-MM-DD)', parseDateOption)
    .option('--daily-hours <hours>', 'Preferred study hours per day', parseNumberOption)
    .option('--days <days>', 'Study days per week', parseNumberOption)
    .option('--weekends', 'Allow sessions on weekends')
    .action(async (learnerId: string, courseId: string, options: GenerateOptions) => {
      const planType = PLAN_TYPES.find((type) => type === options.type) ?? 'weekly';
      const result = await engine.generatePlan({
        learnerId,
        courseId,
        planType,
        targetDate: options.targetDate ?? null,
        preferences: {
          dailyHours: options.dailyHours,
          studyDaysPerWeek: options.days,
          includeWeekends: options.weekends,
        },
      });
      if (!result.ok) return report(printServiceError(result.error));

      console.log(green(`Generated plan ${result.value.id}`));
      printPlan(result.value);
      report(0);
    });

  planCmd
    .command('show <planId>')
    .description('Print a plan and its upcoming sessions')
    .option('-a, --all', 'Print every session')
    .action(async (planId: string, options: ShowOptions) => {
      const result = await engine.getPlan(planId);
      if (!result.ok) return report(printServiceError(result.error));
      printPlan(result.value, options.all ?? false);
      report(0);
    });

  planCmd
    .command('adapt <planId>')
    .description("Adapt the plan to the learner's current performance")
    .action(async (planId: string) => {
      const result = await engine.adaptPlan(planId);
      if (!result.ok) return report(printServiceError(result.error));

      const { plan, adaptations } = result.value;
      if (adaptations.length === 0) {
        console.log(dim(`No adaptation needed; plan ${plan.id} stays at revision ${plan.revision}.`));
      } else {
        console.log(green(`Plan ${plan.id} adapted to revision ${plan.revision}:`));
        for (const adaptation of adaptations) {
          console.log(`  - ${bold(adaptation.type)} (${adaptation.sessionsAffected} sessions): ${adaptation.reason}`);
        }
      }
      report(0);
    });

  planCmd
    .command('override <planId>')
    .description('Apply a manual override')
    .option('--session <sessionId>', 'Session to move')
    .option('--date <date>', 'New date for the session (YYYY-MM-DD)')
    .option('--time <time>', 'New start time for the session (HH:MM)')
    .option('--difficulty <delta>', 'Shift difficulty by -2..2', parseNumberOption)
    .option('--review-every <sessions>', 'Insert a review after every N sessions', parseNumberOption)
    .option('--reason <text>', 'Why the override is made', 'Manual override')
    .action(async (planId: string, options: OverrideOptions) => {
      const request = toOverrideRequest(options);
      if (typeof request === 'string') {
        console.log(red(`Error: ${request}`));
        return report(1);
      }

      const result = await engine.applyOverride(planId, request);
      if (!result.ok) return report(printServiceError(result.error));
      if (!result.value.accepted) {
        console.log(yellow(`Override rejected: ${result.value.reason ?? 'unknown reason'}`));
        return report(1);
      }
      console.log(green(`Applied ${request.type} override to plan ${planId}.`));
      report(0);
    });

  planCmd
    .command('session <planId> <sessionId> <status>')
    .description('Mark a session completed or skipped')
    .action(async (planId: string, sessionId: string, status: string) => {
      if (status !== 'completed' && status !== 'skipped') {
        console.log(red('Error: status must be "completed" or "skipped"'));
        return report(1);
      }
      const result = await engine.updateSessionStatus(planId, sessionId, status);
      if (!result.ok) return report(printServiceError(result.error));
      console.log(green(`Session ${sessionId} marked ${status}.`));
      report(0);
    });

  return planCmd;
}
