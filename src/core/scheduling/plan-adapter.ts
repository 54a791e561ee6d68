/**
 * Plan Adapter
 *
 * Compares a plan's last performance mark with a fresh snapshot and revises
 * the open part of the base schedule:
 *
 * | Trigger                                   | Adaptation                                     |
 * |-------------------------------------------|------------------------------------------------|
 * | overall score down more than 15 points    | durations x0.75, hard tasks optional + medium  |
 * | overall score up more than 15 points      | durations x1.25 (max 120), optional hard task  |
 * | completion below 70% (with session data)  | durations and tasks x0.7 (min 15 minutes)      |
 * | velocity below 0.5 (with progress data)   | review session after every third study session |
 *
 * Only scheduled sessions dated today or later change. Each pass that
 * changes something produces a new revision and appends one entry to the
 * adaptation history; the storage layer archives the superseded schedule.
 * A snapshot whose fingerprint equals the last mark changes nothing, so
 * re-running a pass on unchanged history is a no-op.
 *
 * Adaptation types owned by an override are skipped: a difficulty override
 * owns both difficulty adaptations, a review-frequency override owns review
 * injection.
 */

import type { Adaptation, AdaptationEntry, AdaptationType, PerformanceMark, PlanOverride, StudyPlan, StudySession } from '../models';
import type { AnalysisResult } from '../analysis/types';
import type { PerformanceSnapshot } from '../metrics/types';
import { round } from '../metrics/statistics';
import { toIsoDate } from '../utils/dates';
import { rebalanceLoad, summarizeLoad, withLoad } from './cognitive-load';
import { effectiveSchedule } from './overrides';
import { performanceMark } from './performance-mark';
import {
  CHALLENGE_TASK_MINUTES,
  insertReviewSessions,
  isOpen,
  scaleSession,
  type SessionStamp,
} from './session-builder';
import type { AdaptationOutcome, SchedulingConfig } from './types';

export const SCORE_CHANGE_THRESHOLD = 15;
export const LOW_COMPLETION_RATE = 70;
export const LOW_LEARNING_VELOCITY = 0.5;
export const REVIEW_EVERY_SESSIONS = 3;

const OVERRIDE_OWNS: Record<PlanOverride['type'], AdaptationType[]> = {
  schedule: [],
  difficulty: ['reduce_difficulty', 'increase_challenge'],
  review_frequency: ['increase_review_frequency'],
};

type Candidate = Omit<Adaptation, 'sessionsAffected'>;

export function adaptPlan(
  plan: StudyPlan,
  snapshot: PerformanceSnapshot,
  analysis: AnalysisResult,
  now: Date,
  config: SchedulingConfig
): AdaptationOutcome {
  const unchanged: AdaptationOutcome = { plan, adaptations: [], entry: null };
  const mark = performanceMark(snapshot, analysis);
  if (mark.fingerprint === plan.lastMark.fingerprint) return unchanged;

  const owned = new Set(plan.overrides.flatMap((override) => OVERRIDE_OWNS[override.type]));
  const scoreChange = round(mark.overallScore - plan.lastMark.overallScore, 1);
  const candidates = identifyAdaptations(mark, scoreChange).filter((candidate) => !owned.has(candidate.type));
  if (candidates.length === 0) return unchanged;

  const revision = plan.revision + 1;
  const stamp: SessionStamp = { revision, normalizationHours: config.loadNormalizationHours };
  const fromDate = toIsoDate(now);

  let base = plan.baseSchedule;
  const applied: Adaptation[] = [];
  for (const candidate of candidates) {
    const { schedule, affected } = applyAdaptation(base, candidate.type, fromDate, stamp);
    if (affected === 0) continue;
    base = schedule;
    applied.push({ ...candidate, sessionsAffected: affected });
  }
  if (applied.length === 0) return unchanged;

  base = rebalanceLoad(base, config.dailyLoadCeiling, fromDate);
  const schedule = effectiveSchedule(
    base,
    plan.overrides,
    plan.schedule,
    revision,
    config.loadNormalizationHours,
    config.dailyLoadCeiling
  );

  const entry: AdaptationEntry = {
    appliedAt: now.toISOString(),
    revision,
    adaptations: applied,
    trigger: {
      previousScore: plan.lastMark.overallScore,
      currentScore: mark.overallScore,
      scoreChange,
      completionRate: mark.completionRate,
      learningVelocity: mark.learningVelocity,
    },
  };

  return {
    plan: {
      ...plan,
      baseSchedule: base,
      schedule,
      adaptationHistory: [...plan.adaptationHistory, entry],
      lastMark: mark,
      revision,
      loadSummary: summarizeLoad(schedule, config.dailyLoadCeiling),
      endDate: schedule.length > 0 ? schedule[schedule.length - 1].date : plan.endDate,
      updatedAt: now,
    },
    adaptations: applied,
    entry,
  };
}

/**
 * Adaptations called for by the change from the last mark, in the order
 * they are applied.
 */
export function identifyAdaptations(mark: PerformanceMark, scoreChange: number): Candidate[] {
  const candidates: Candidate[] = [];

  if (scoreChange < -SCORE_CHANGE_THRESHOLD) {
    candidates.push({
      type: 'reduce_difficulty',
      reason: `Overall score dropped ${Math.abs(scoreChange)} points`,
      severity: 'high',
    });
  } else if (scoreChange > SCORE_CHANGE_THRESHOLD) {
    candidates.push({
      type: 'increase_challenge',
      reason: `Overall score rose ${scoreChange} points`,
      severity: 'medium',
    });
  }

  if (mark.hasSessionData && mark.completionRate < LOW_COMPLETION_RATE) {
    candidates.push({
      type: 'reduce_session_length',
      reason: `Session completion rate is ${mark.completionRate}%`,
      severity: 'medium',
    });
  }

  if (mark.hasProgressData && mark.learningVelocity < LOW_LEARNING_VELOCITY) {
    candidates.push({
      type: 'increase_review_frequency',
      reason: `Learning velocity is ${mark.learningVelocity} topics per week`,
      severity: 'medium',
    });
  }

  return candidates;
}

function applyAdaptation(
  schedule: readonly StudySession[],
  type: AdaptationType,
  fromDate: string,
  stamp: SessionStamp
): { schedule: StudySession[]; affected: number } {
  if (type === 'increase_review_frequency') {
    const result = insertReviewSessions(schedule, REVIEW_EVERY_SESSIONS, fromDate, stamp);
    return { schedule: result.schedule, affected: result.inserted };
  }

  let affected = 0;
  const transformed = schedule.map((session) => {
    if (session.sessionType !== 'study' || !isOpen(session, fromDate)) return session;
    affected++;
    return transformSession(session, type, stamp);
  });
  return { schedule: transformed, affected };
}

function transformSession(
  session: StudySession,
  type: Exclude<AdaptationType, 'increase_review_frequency'>,
  stamp: SessionStamp
): StudySession {
  switch (type) {
    case 'reduce_difficulty': {
      const scaled = scaleSession(session, 0.75, stamp);
      const tasks = scaled.content.tasks.map((task) =>
        task.difficulty === 'hard' ? { ...task, difficulty: 'medium' as const, isOptional: true } : task
      );
      return withLoad({ ...scaled, content: { ...scaled.content, tasks } }, stamp.normalizationHours);
    }
    case 'increase_challenge': {
      const scaled = scaleSession(session, 1.25, stamp);
      const challengeId = `challenge_${session.id}`;
      if (scaled.content.tasks.some((task) => task.id === challengeId)) return scaled;
      const tasks = [
        ...scaled.content.tasks,
        {
          id: challengeId,
          type: 'practice' as const,
          title: `Challenge problems: ${session.content.focusTopic}`,
          durationMinutes: CHALLENGE_TASK_MINUTES,
          difficulty: 'hard' as const,
          isOptional: true,
        },
      ];
      return withLoad({ ...scaled, content: { ...scaled.content, tasks } }, stamp.normalizationHours);
    }
    case 'reduce_session_length':
      return scaleSession(session, 0.7, stamp);
  }
}
