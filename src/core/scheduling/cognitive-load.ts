/**
 * Cognitive load of study sessions.
 *
 * A session's load is the sum over its tasks of
 * `hours * difficultyMultiplier * typeMultiplier`, scaled so that
 * `loadNormalizationHours` of medium, neutral-type work equals 100, and
 * capped at 100. A day's load is the sum of its sessions' loads; days above
 * the ceiling are rebalanced by moving sessions to lighter days of the same
 * week, and whatever cannot move is flagged.
 */

import type { DailyLoad, Difficulty, LoadSummary, StudySession, StudyTask, TaskType } from '../models';
import { round } from '../metrics/statistics';

export const DIFFICULTY_MULTIPLIERS: Record<Difficulty, number> = {
  easy: 0.8,
  medium: 1.0,
  hard: 1.3,
};

export const TASK_TYPE_MULTIPLIERS: Record<TaskType, number> = {
  reading: 0.9,
  practice: 1.1,
  quiz: 1.2,
  project: 1.4,
  review: 1.0,
};

export const DEFAULT_NORMALIZATION_HOURS = 3;
export const DEFAULT_DAILY_LOAD_CEILING = 85;

/**
 * Load of a task list on a 0-100 scale, one decimal.
 */
export function cognitiveLoad(
  tasks: readonly StudyTask[],
  normalizationHours: number = DEFAULT_NORMALIZATION_HOURS
): number {
  const weightedHours = tasks.reduce(
    (total, task) =>
      total + (task.durationMinutes / 60) * DIFFICULTY_MULTIPLIERS[task.difficulty] * TASK_TYPE_MULTIPLIERS[task.type],
    0
  );
  const hours = normalizationHours > 0 ? normalizationHours : DEFAULT_NORMALIZATION_HOURS;
  return round(Math.min(100, (weightedHours / hours) * 100), 1);
}

/** Copy of a session with its load recomputed from its tasks. */
export function withLoad(session: StudySession, normalizationHours?: number): StudySession {
  return { ...session, cognitiveLoad: cognitiveLoad(session.content.tasks, normalizationHours) };
}

function loadsByDate(sessions: readonly StudySession[]): Map<string, number> {
  const loads = new Map<string, number>();
  for (const session of sessions) {
    loads.set(session.date, (loads.get(session.date) ?? 0) + session.cognitiveLoad);
  }
  return loads;
}

export function dailyLoads(sessions: readonly StudySession[]): DailyLoad[] {
  return [...loadsByDate(sessions).entries()]
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([date, load]) => ({ date, load: round(load, 1) }));
}

export function summarizeLoad(sessions: readonly StudySession[], ceiling: number = DEFAULT_DAILY_LOAD_CEILING): LoadSummary {
  const loads = dailyLoads(sessions);
  const values = loads.map((entry) => entry.load);

  return {
    dailyLoads: loads,
    averageDailyLoad: values.length === 0 ? 0 : round(values.reduce((a, b) => a + b, 0) / values.length, 1),
    maxDailyLoad: values.length === 0 ? 0 : Math.max(...values),
    minDailyLoad: values.length === 0 ? 0 : Math.min(...values),
    overloadedDays: loads.filter((entry) => entry.load > ceiling).map((entry) => entry.date),
  };
}

/**
 * Moves sessions off days whose load exceeds `ceiling`.
 *
 * For each overloaded day, the day's latest reschedulable sessions are moved
 * one at a time to the first other day of the same plan week that stays
 * within the ceiling and has no session at the same start time. Sessions on
 * days still above the ceiling afterwards get `needsRebalancing`.
 *
 * Only days on or after `fromDate` are touched.
 */
export function rebalanceLoad(
  sessions: readonly StudySession[],
  ceiling: number = DEFAULT_DAILY_LOAD_CEILING,
  fromDate = ''
): StudySession[] {
  const result = sessions.map((session) => ({ ...session, needsRebalancing: false }));
  const loads = loadsByDate(result);
  const load = (date: string): number => loads.get(date) ?? 0;

  const datesByWeek = new Map<number, string[]>();
  for (const session of result) {
    if (session.date < fromDate) continue;
    const dates = datesByWeek.get(session.week) ?? [];
    if (!dates.includes(session.date)) dates.push(session.date);
    datesByWeek.set(session.week, dates);
  }
  for (const dates of datesByWeek.values()) dates.sort();

  const overloaded = [...loads.keys()].filter((date) => date >= fromDate && load(date) > ceiling).sort();

  for (const date of overloaded) {
    while (load(date) > ceiling) {
      const movable = result
        .filter((s) => s.date === date && s.status === 'scheduled' && s.canReschedule)
        .sort((a, b) => b.startTime.localeCompare(a.startTime));

      let moved = false;
      for (const session of movable) {
        const target = (datesByWeek.get(session.week) ?? []).find(
          (candidate) =>
            candidate !== date &&
            load(candidate) + session.cognitiveLoad <= ceiling &&
            !result.some((other) => other.date === candidate && other.startTime === session.startTime)
        );
        if (target === undefined) continue;

        loads.set(date, load(date) - session.cognitiveLoad);
        loads.set(target, load(target) + session.cognitiveLoad);
        session.date = target;
        moved = true;
        break;
      }
      if (!moved) break;
    }
  }

  for (const session of result) {
    if (session.date >= fromDate && load(session.date) > ceiling) session.needsRebalancing = true;
  }

  return result.sort(compareSessions);
}

/**
 * Recomputes `needsRebalancing` on scheduled sessions from the loads of
 * their days, without moving anything. Finished sessions keep their flag.
 */
export function flagOverloadedDays(
  sessions: readonly StudySession[],
  ceiling: number = DEFAULT_DAILY_LOAD_CEILING
): StudySession[] {
  const loads = loadsByDate(sessions);
  return sessions.map((session) =>
    session.status === 'scheduled'
      ? { ...session, needsRebalancing: (loads.get(session.date) ?? 0) > ceiling }
      : session
  );
}

/** Orders sessions by date, then start time. */
export function compareSessions(a: StudySession, b: StudySession): number {
  return a.date.localeCompare(b.date) || a.startTime.localeCompare(b.startTime);
}
