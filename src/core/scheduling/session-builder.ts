/**
 * Builders and transforms for individual study sessions, shared by plan
 * generation, adaptation and overrides.
 */

import type { Difficulty, StudySession, StudyTask } from '../models';
import { addMinutesToTime } from '../utils/dates';
import { clamp } from '../metrics/statistics';
import { cognitiveLoad, compareSessions } from './cognitive-load';

export const MIN_SESSION_MINUTES = 15;
export const MAX_SESSION_MINUTES = 120;
export const REVIEW_SESSION_MINUTES = 20;
export const CHALLENGE_TASK_MINUTES = 15;

const DIFFICULTY_STEPS: readonly Difficulty[] = ['easy', 'medium', 'hard'];

/** Revision stamp and load scale applied to sessions a transform touches. */
export interface SessionStamp {
  revision: number;
  normalizationHours: number;
}

/**
 * Task difficulty for a topic mastery level: 4+ easy, 2 or below hard.
 * Topics without a mastery record are medium.
 */
export function difficultyForMastery(mastery: number | undefined): Difficulty {
  if (mastery === undefined) return 'medium';
  if (mastery >= 4) return 'easy';
  if (mastery <= 2) return 'hard';
  return 'medium';
}

export function shiftDifficulty(difficulty: Difficulty, steps: number): Difficulty {
  const index = clamp(DIFFICULTY_STEPS.indexOf(difficulty) + Math.trunc(steps), 0, DIFFICULTY_STEPS.length - 1);
  return DIFFICULTY_STEPS[index];
}

/**
 * Reading for two thirds of the session, optional practice for the rest.
 */
export function topicTasks(sessionId: string, topic: string, minutes: number, difficulty: Difficulty): StudyTask[] {
  const readingMinutes = Math.round((minutes * 2) / 3);
  const tasks: StudyTask[] = [
    {
      id: `read_${sessionId}`,
      type: 'reading',
      title: `Read: ${topic}`,
      durationMinutes: readingMinutes,
      difficulty,
      isOptional: false,
    },
  ];
  if (minutes - readingMinutes > 0) {
    tasks.push({
      id: `practice_${sessionId}`,
      type: 'practice',
      title: `Practice exercises for ${topic}`,
      durationMinutes: minutes - readingMinutes,
      difficulty,
      isOptional: true,
    });
  }
  return tasks;
}

export function reviewTasks(sessionId: string, minutes: number): StudyTask[] {
  return [
    {
      id: `review_${sessionId}`,
      type: 'review',
      title: 'Review previous material',
      durationMinutes: minutes,
      difficulty: 'medium',
      isOptional: false,
    },
  ];
}

/**
 * Scales a session's duration (within the session bounds) and its tasks'
 * durations by `factor`.
 */
export function scaleSession(session: StudySession, factor: number, stamp: SessionStamp): StudySession {
  const tasks = session.content.tasks.map((task) => ({
    ...task,
    durationMinutes: Math.max(1, Math.round(task.durationMinutes * factor)),
  }));
  return {
    ...session,
    durationMinutes: clamp(Math.round(session.durationMinutes * factor), MIN_SESSION_MINUTES, MAX_SESSION_MINUTES),
    content: { ...session.content, tasks },
    cognitiveLoad: cognitiveLoad(tasks, stamp.normalizationHours),
    revision: stamp.revision,
  };
}

/** True for sessions adaptation and overrides may still change. */
export function isOpen(session: StudySession, fromDate: string): boolean {
  return session.status === 'scheduled' && session.date >= fromDate;
}

/**
 * A 20-minute review of `session`'s topic, starting when it ends.
 */
export function reviewAfter(session: StudySession, stamp: SessionStamp): StudySession {
  const topic = session.content.focusTopic;
  const tasks: StudyTask[] = [
    {
      id: `task_review_${session.id}`,
      type: 'review',
      title: `Review ${topic}`,
      durationMinutes: REVIEW_SESSION_MINUTES,
      difficulty: 'medium',
      isOptional: false,
    },
  ];

  return {
    id: `review_${session.id}`,
    week: session.week,
    date: session.date,
    startTime: addMinutesToTime(session.startTime, session.durationMinutes),
    durationMinutes: REVIEW_SESSION_MINUTES,
    content: { focusTopic: `Review: ${topic}`, tasks, learningObjectives: [`Consolidate ${topic}`] },
    cognitiveLoad: cognitiveLoad(tasks, stamp.normalizationHours),
    productivityPrediction: session.productivityPrediction,
    sessionType: 'review',
    status: 'scheduled',
    isMandatory: false,
    canReschedule: true,
    needsRebalancing: false,
    revision: stamp.revision,
  };
}

/**
 * Inserts a review session after every `every`-th open study session.
 * Reviews that already exist are not duplicated.
 */
export function insertReviewSessions(
  schedule: readonly StudySession[],
  every: number,
  fromDate: string,
  stamp: SessionStamp
): { schedule: StudySession[]; inserted: number } {
  const interval = Math.max(1, Math.floor(every));
  const existing = new Set(schedule.map((session) => session.id));
  const result: StudySession[] = [];
  let studyCount = 0;
  let inserted = 0;

  for (const session of [...schedule].sort(compareSessions)) {
    result.push(session);
    if (session.sessionType !== 'study' || !isOpen(session, fromDate)) continue;

    studyCount++;
    if (studyCount % interval !== 0) continue;

    const review = reviewAfter(session, stamp);
    if (existing.has(review.id)) continue;
    result.push(review);
    existing.add(review.id);
    inserted++;
  }

  return { schedule: result.sort(compareSessions), inserted };
}
