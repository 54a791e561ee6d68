/**
 * Manual plan overrides.
 *
 * Overrides are timestamped, reason-carrying records kept beside the base
 * schedule. The effective schedule is recomputed from scratch as the base
 * schedule with every override applied in order, so an override keeps
 * winning over whatever the next adaptation pass does to the base.
 *
 * - `schedule` moves one session to another date and/or start time
 * - `difficulty` scales open sessions by `1 + 0.15 * delta` and shifts task
 *   difficulty by `delta` steps, from the override's creation day onwards
 * - `review_frequency` replaces automatically injected reviews with one
 *   review after every N study sessions
 */

import type { OverrideRequest, PlanOverride, StudyPlan, StudySession, StudySessionStatus } from '../models';
import { compareSessions, flagOverloadedDays, withLoad } from './cognitive-load';
import { insertReviewSessions, isOpen, scaleSession, shiftDifficulty } from './session-builder';

export const MAX_DIFFICULTY_DELTA = 2;
export const DIFFICULTY_STEP = 0.15;
export const MAX_REVIEW_INTERVAL = 10;

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;
const TIME_OF_DAY = /^([01]\d|2[0-3]):[0-5]\d$/;

/**
 * Why an override cannot be applied to the plan, or null when it can.
 */
export function rejectionReason(plan: StudyPlan, request: OverrideRequest): string | null {
  if (plan.status !== 'active') return `Plan is ${plan.status}`;

  switch (request.type) {
    case 'schedule': {
      const { sessionId, date, startTime } = request.data;
      const session = plan.schedule.find((s) => s.id === sessionId);
      if (!session) return `Unknown session: ${sessionId}`;
      if (session.status !== 'scheduled') return `Session ${sessionId} is already ${session.status}`;
      if (date === undefined && startTime === undefined) return 'A schedule override needs a date or a start time';
      if (date !== undefined && (!ISO_DATE.test(date) || Number.isNaN(Date.parse(date)))) {
        return `Invalid date: ${date}`;
      }
      if (startTime !== undefined && !TIME_OF_DAY.test(startTime)) return `Invalid start time: ${startTime}`;
      return null;
    }
    case 'difficulty': {
      const { delta } = request.data;
      if (!Number.isInteger(delta) || delta === 0 || Math.abs(delta) > MAX_DIFFICULTY_DELTA) {
        return `Difficulty delta must be a non-zero integer between -${MAX_DIFFICULTY_DELTA} and ${MAX_DIFFICULTY_DELTA}`;
      }
      return null;
    }
    case 'review_frequency': {
      const { everySessions } = request.data;
      if (!Number.isInteger(everySessions) || everySessions < 1 || everySessions > MAX_REVIEW_INTERVAL) {
        return `Review frequency must be an integer between 1 and ${MAX_REVIEW_INTERVAL}`;
      }
      return null;
    }
  }
}

/**
 * Base schedule with every override applied in order.
 *
 * Sessions that only exist in the effective schedule (reviews added by a
 * `review_frequency` override) take their status from `previous`, the
 * effective schedule this one replaces. Overridden sessions stay where the
 * overrides put them; days left above `ceiling` have their sessions flagged.
 */
export function effectiveSchedule(
  base: readonly StudySession[],
  overrides: readonly PlanOverride[],
  previous: readonly StudySession[],
  revision: number,
  normalizationHours: number,
  ceiling: number
): StudySession[] {
  let schedule = [...base];
  for (const override of overrides) {
    schedule = applyOverride(schedule, override, revision, normalizationHours);
  }

  const baseIds = new Set(base.map((session) => session.id));
  const previousStatus = new Map(previous.map((session) => [session.id, session.status]));

  const merged = schedule.map((session) => {
    const status = previousStatus.get(session.id);
    return !baseIds.has(session.id) && status !== undefined ? { ...session, status } : session;
  });
  return flagOverloadedDays(merged, ceiling).sort(compareSessions);
}

function applyOverride(
  schedule: StudySession[],
  override: PlanOverride,
  revision: number,
  normalizationHours: number
): StudySession[] {
  const fromDate = override.createdAt.slice(0, 10);

  switch (override.type) {
    case 'schedule': {
      const { sessionId, date, startTime } = override.data;
      return schedule.map((session) =>
        session.id === sessionId
          ? { ...session, date: date ?? session.date, startTime: startTime ?? session.startTime }
          : session
      );
    }
    case 'difficulty': {
      const { delta } = override.data;
      return schedule.map((session) => {
        if (session.sessionType !== 'study' || !isOpen(session, fromDate)) return session;
        const scaled = scaleSession(session, 1 + DIFFICULTY_STEP * delta, {
          revision: session.revision,
          normalizationHours,
        });
        const tasks = scaled.content.tasks.map((task) => ({
          ...task,
          difficulty: shiftDifficulty(task.difficulty, delta),
        }));
        return withLoad({ ...scaled, content: { ...scaled.content, tasks } }, normalizationHours);
      });
    }
    case 'review_frequency': {
      const withoutInjected = schedule.filter(
        (session) => !(session.sessionType === 'review' && session.id.startsWith('review_') && isOpen(session, fromDate))
      );
      return insertReviewSessions(withoutInjected, override.data.everySessions, fromDate, {
        revision,
        normalizationHours,
      }).schedule;
    }
  }
}

/**
 * Plan with one session marked completed or skipped. Returns null when the
 * plan has no such session. A plan whose sessions are all done becomes
 * `completed`.
 */
export function withSessionStatus(
  plan: StudyPlan,
  sessionId: string,
  status: Exclude<StudySessionStatus, 'scheduled'>,
  now: Date
): StudyPlan | null {
  const update = (session: StudySession): StudySession =>
    session.id === sessionId ? { ...session, status } : session;

  if (!plan.schedule.some((session) => session.id === sessionId)) return null;

  const baseSchedule = plan.baseSchedule.map(update);
  const schedule = plan.schedule.map(update);
  const finished = schedule.every((session) => session.status !== 'scheduled');

  return {
    ...plan,
    baseSchedule,
    schedule,
    status: finished && plan.status === 'active' ? 'completed' : plan.status,
    updatedAt: now,
  };
}
