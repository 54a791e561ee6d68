/**
 * Study Plan Generator
 *
 * Builds a dated, load-balanced study schedule for one learner and course,
 * and hosts the two ways a plan changes afterwards: automatic adaptation
 * (see ./plan-adapter) and manual overrides (see ./overrides).
 *
 * Parameters come from the learner's overall performance score:
 *
 * | Score  | Daily hours | Session length | Sessions/day |
 * |--------|-------------|----------------|--------------|
 * | < 60   | x1.3        | x0.8           | 3            |
 * | 60-85  | x1.0        | x1.0           | 2            |
 * | > 85   | x0.9        | x1.2           | 1            |
 *
 * then preferences (intensity multiplier, short sessions, weekends), then
 * bounds of 0.5-6 hours a day and 15-120 minutes a session. A learner with
 * no history at all gets the middle row.
 *
 * Topics are split evenly over the plan's weeks; within a week the
 * TimeSlotOptimizer places sessions and topics rotate through them. A week
 * without topics becomes review sessions.
 *
 * @example
 * ```typescript
 * const generator = new StudyPlanGenerator({ dailyLoadCeiling: 85 });
 * const plan = generator.generate({ id, learnerId, course, planType: 'monthly', ... });
 * ```
 */

import type {
  LearningProfile,
  OverrideRequest,
  PlanOverride,
  PlanParameters,
  PlanType,
  Recommendation,
  StudyPlan,
  StudySession,
  StudySessionStatus,
} from '../models';
import type { AnalysisResult } from '../analysis/types';
import type { PerformanceSnapshot } from '../metrics/types';
import { clamp, round } from '../metrics/statistics';
import {
  addDays,
  daysBetween,
  formatHour,
  startOfUtcDay,
  toIsoDate,
  weekdayOf,
  type Weekday,
} from '../utils/dates';
import {
  DEFAULT_DAILY_LOAD_CEILING,
  DEFAULT_NORMALIZATION_HOURS,
  cognitiveLoad,
  compareSessions,
  rebalanceLoad,
  summarizeLoad,
} from './cognitive-load';
import { effectiveSchedule, rejectionReason, withSessionStatus } from './overrides';
import { adaptPlan } from './plan-adapter';
import { performanceMark } from './performance-mark';
import {
  MAX_SESSION_MINUTES,
  MIN_SESSION_MINUTES,
  difficultyForMastery,
  reviewTasks,
  topicTasks,
} from './session-builder';
import { TimeSlotOptimizer } from './time-slot-optimizer';
import type { AdaptationOutcome, PlanPreferences, PlanRequest, SchedulingConfig } from './types';

const DEFAULT_CONFIG: SchedulingConfig = {
  dailyLoadCeiling: DEFAULT_DAILY_LOAD_CEILING,
  loadNormalizationHours: DEFAULT_NORMALIZATION_HOURS,
};

export const DEFAULT_DAILY_HOURS = 2;
export const DEFAULT_STUDY_DAYS = 5;
export const MIN_DAILY_HOURS = 0.5;
export const MAX_DAILY_HOURS = 6;

/** Plan length in weeks when no target date is given. */
export const PLAN_TYPE_WEEKS: Record<PlanType, number> = {
  weekly: 1,
  monthly: 4,
  exam_prep: 8,
  custom: 12,
};

const PLAN_TYPE_LABELS: Record<PlanType, string> = {
  weekly: 'Weekly Plan',
  monthly: 'Monthly Plan',
  exam_prep: 'Exam Preparation',
  custom: 'Custom Plan',
};

/** Weekdays in the order study days are picked. */
const STUDY_DAY_ORDER: readonly Weekday[] = [
  'Monday',
  'Tuesday',
  'Wednesday',
  'Thursday',
  'Friday',
  'Saturday',
  'Sunday',
];

interface PerformanceTier {
  hoursMultiplier: number;
  lengthMultiplier: number;
  sessionsPerDay: number;
}

const STRUGGLING: PerformanceTier = { hoursMultiplier: 1.3, lengthMultiplier: 0.8, sessionsPerDay: 3 };
const BASELINE: PerformanceTier = { hoursMultiplier: 1.0, lengthMultiplier: 1.0, sessionsPerDay: 2 };
const ADVANCED: PerformanceTier = { hoursMultiplier: 0.9, lengthMultiplier: 1.2, sessionsPerDay: 1 };

export type OverrideOutcome = { accepted: true; plan: StudyPlan } | { accepted: false; reason: string };

export class StudyPlanGenerator {
  private config: SchedulingConfig;

  constructor(
    config?: Partial<SchedulingConfig>,
    private readonly optimizer: TimeSlotOptimizer = new TimeSlotOptimizer()
  ) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  generate(request: PlanRequest): StudyPlan {
    const { snapshot, analysis, course, now } = request;
    const start = startOfUtcDay(now);
    const startDate = toIsoDate(start);

    // A target date that is not after today is ignored
    const target =
      request.targetDate && startOfUtcDay(request.targetDate).getTime() > start.getTime()
        ? startOfUtcDay(request.targetDate)
        : null;
    const totalWeeks = target
      ? Math.max(1, Math.floor(daysBetween(start, target) / 7))
      : PLAN_TYPE_WEEKS[request.planType];
    const lastDate = target ? toIsoDate(target) : toIsoDate(addDays(start, totalWeeks * 7 - 1));

    const parameters = this.deriveParameters(snapshot, analysis, request.preferences, totalWeeks);
    const studyDays = STUDY_DAY_ORDER.slice(0, parameters.studyDaysPerWeek);
    const topicsByWeek = partitionTopics(course.topics, totalWeeks);
    const mastery = new Map(request.progress.map((entry) => [entry.identifier, entry.masteryLevel]));

    const sessions: StudySession[] = [];
    for (let week = 1; week <= totalWeeks; week++) {
      const weekStart = addDays(start, (week - 1) * 7);
      const dates = Array.from({ length: 7 }, (_, offset) => addDays(weekStart, offset)).filter(
        (date) => studyDays.includes(weekdayOf(date)) && toIsoDate(date) <= lastDate
      );
      if (dates.length === 0) continue;

      const dateOf = new Map(dates.map((date) => [weekdayOf(date), toIsoDate(date)]));
      const slots = this.optimizer.optimalSlots(
        snapshot.sessions,
        parameters.dailyHours * dates.length,
        dates.map(weekdayOf),
        { sessionLengthMinutes: parameters.sessionLengthMinutes, maxSessionsPerDay: parameters.sessionsPerDay }
      );

      const placed = slots
        .map((slot) => ({ slot, date: dateOf.get(slot.day) ?? startDate }))
        .sort((a, b) => a.date.localeCompare(b.date) || a.slot.startTime.localeCompare(b.slot.startTime));

      const topics = topicsByWeek[week - 1];
      placed.forEach(({ slot, date }, index) => {
        const id = `w${week}_s${index + 1}`;
        const topic = topics.length > 0 ? topics[index % topics.length] : null;
        const tasks = topic
          ? topicTasks(id, topic, slot.durationMinutes, difficultyForMastery(mastery.get(topic)))
          : reviewTasks(id, slot.durationMinutes);

        sessions.push({
          id,
          week,
          date,
          startTime: slot.startTime,
          durationMinutes: slot.durationMinutes,
          content: {
            focusTopic: topic ?? 'Review',
            tasks,
            learningObjectives: topic ? [`Master ${topic}`] : ['Consolidate earlier topics'],
          },
          cognitiveLoad: cognitiveLoad(tasks, this.config.loadNormalizationHours),
          productivityPrediction: round(slot.productivityScore / 5),
          sessionType: topic ? 'study' : 'review',
          status: 'scheduled',
          isMandatory: true,
          canReschedule: true,
          needsRebalancing: false,
          revision: 1,
        });
      });
    }

    const schedule = rebalanceLoad(sessions, this.config.dailyLoadCeiling).sort(compareSessions);
    const mark = performanceMark(snapshot, analysis);

    return {
      id: request.id,
      learnerId: request.learnerId,
      courseId: course.id,
      title: `${PLAN_TYPE_LABELS[request.planType]}: ${course.title}`,
      planType: request.planType,
      status: 'active',
      startDate,
      endDate: schedule.length > 0 ? schedule[schedule.length - 1].date : startDate,
      targetDate: target ? toIsoDate(target) : null,
      parameters,
      baseSchedule: schedule,
      schedule,
      overrides: [],
      adaptationHistory: [],
      baseline: mark,
      lastMark: mark,
      recommendations: planRecommendations(parameters, snapshot, hasHistory(analysis)),
      loadSummary: summarizeLoad(schedule, this.config.dailyLoadCeiling),
      revision: 1,
      version: 1,
      createdAt: now,
      updatedAt: now,
    };
  }

  /**
   * Study parameters for a learner. Missing or non-positive preference values
   * fall back to the defaults.
   */
  deriveParameters(
    snapshot: PerformanceSnapshot,
    analysis: AnalysisResult,
    preferences: PlanPreferences,
    totalWeeks: number
  ): PlanParameters {
    const score = analysis.overallScore;
    const tier = !hasHistory(analysis) ? BASELINE : score < 60 ? STRUGGLING : score > 85 ? ADVANCED : BASELINE;

    const hoursMultiplier = tier.hoursMultiplier * positiveOr(preferences.intensityMultiplier, 1);
    let lengthMultiplier = tier.lengthMultiplier;
    let sessionsPerDay = tier.sessionsPerDay;
    if (preferences.preferShortSessions) {
      lengthMultiplier *= 0.8;
      sessionsPerDay = Math.min(4, sessionsPerDay + 1);
    }

    const includeWeekends = preferences.includeWeekends ?? false;
    const baseLength = positiveOr(preferences.sessionLengthMinutes, snapshot.sessions.optimalSessionMinutes);
    const sessionLengthMinutes = Math.floor(
      clamp(baseLength * lengthMultiplier, MIN_SESSION_MINUTES, MAX_SESSION_MINUTES)
    );

    return {
      dailyHours: round(
        clamp(positiveOr(preferences.dailyHours, DEFAULT_DAILY_HOURS) * hoursMultiplier, MIN_DAILY_HOURS, MAX_DAILY_HOURS)
      ),
      studyDaysPerWeek: Math.min(
        includeWeekends ? 7 : 5,
        Math.max(1, Math.floor(positiveOr(preferences.studyDaysPerWeek, DEFAULT_STUDY_DAYS)))
      ),
      sessionLengthMinutes,
      sessionsPerDay,
      totalWeeks,
      includeWeekends,
      performanceScore: score,
      learningProfile: learningProfile(snapshot, hasHistory(analysis)),
      difficultyAdaptation: score < 60 && hasHistory(analysis) ? 'easier' : score > 85 ? 'harder' : 'maintain',
      reviewFrequencyDays: reviewFrequency(snapshot),
      breakFrequencyMinutes: sessionLengthMinutes >= 60 ? 15 : sessionLengthMinutes >= 30 ? 25 : 0,
    };
  }

  adapt(plan: StudyPlan, snapshot: PerformanceSnapshot, analysis: AnalysisResult, now: Date): AdaptationOutcome {
    return adaptPlan(plan, snapshot, analysis, now, this.config);
  }

  /**
   * Records an override and recomputes the effective schedule.
   */
  applyOverride(plan: StudyPlan, request: OverrideRequest, id: string, now: Date): OverrideOutcome {
    const reason = rejectionReason(plan, request);
    if (reason !== null) return { accepted: false, reason };

    const override: PlanOverride = { ...request, id, createdAt: now.toISOString() };
    const overrides = [...plan.overrides, override];
    const schedule = effectiveSchedule(
      plan.baseSchedule,
      overrides,
      plan.schedule,
      plan.revision,
      this.config.loadNormalizationHours,
      this.config.dailyLoadCeiling
    );

    return {
      accepted: true,
      plan: {
        ...plan,
        overrides,
        schedule,
        loadSummary: summarizeLoad(schedule, this.config.dailyLoadCeiling),
        endDate: schedule.length > 0 ? schedule[schedule.length - 1].date : plan.endDate,
        updatedAt: now,
      },
    };
  }

  markSession(
    plan: StudyPlan,
    sessionId: string,
    status: Exclude<StudySessionStatus, 'scheduled'>,
    now: Date
  ): StudyPlan | null {
    return withSessionStatus(plan, sessionId, status, now);
  }
}

// =============================================================================
// Helpers
// =============================================================================

function positiveOr(value: number | undefined, fallback: number): number {
  return value !== undefined && Number.isFinite(value) && value > 0 ? value : fallback;
}

function hasHistory(analysis: AnalysisResult): boolean {
  return Object.values(analysis.availability).some(Boolean);
}

/**
 * Splits topics into `weeks` contiguous groups whose sizes differ by at most
 * one. Earlier weeks take the extra topics; later weeks may be empty.
 */
export function partitionTopics(topics: readonly string[], weeks: number): string[][] {
  const base = Math.floor(topics.length / weeks);
  const extra = topics.length % weeks;
  const groups: string[][] = [];
  let cursor = 0;
  for (let week = 0; week < weeks; week++) {
    const size = base + (week < extra ? 1 : 0);
    groups.push(topics.slice(cursor, cursor + size));
    cursor += size;
  }
  return groups;
}

export function learningProfile(snapshot: PerformanceSnapshot, withHistory = true): LearningProfile {
  if (!withHistory) return 'developing';
  const { avgQuizScore: quiz, completionRate: completion, retentionRate: retention } = snapshot;

  if (quiz >= 85 && completion >= 80 && retention >= 80) return 'high_performer';
  if (quiz >= 70 && completion >= 70 && retention >= 70) return 'steady_learner';
  if (completion < 60) return 'needs_motivation';
  if (retention < 60) return 'needs_repetition';
  return 'developing';
}

/**
 * Days between flashcard reviews: daily below 60% retention, every other day
 * below 80%, else every three days. Two days without review history.
 */
export function reviewFrequency(snapshot: PerformanceSnapshot): number {
  if (snapshot.flashcards.totalReviews === 0) return 2;
  if (snapshot.retentionRate < 60) return 1;
  if (snapshot.retentionRate < 80) return 2;
  return 3;
}

function planRecommendations(
  parameters: PlanParameters,
  snapshot: PerformanceSnapshot,
  withHistory: boolean
): Recommendation[] {
  const recommendations: Recommendation[] = [];

  if (withHistory && parameters.performanceScore < 70) {
    recommendations.push({
      type: 'session_structure',
      priority: 'medium',
      title: 'Shorter, More Frequent Sessions',
      description: 'Recent results suggest shorter sessions with more repetition.',
      actionItems: [
        'Keep to the scheduled session lengths',
        'Focus on review and reinforcement activities',
      ],
    });
  }

  if (parameters.learningProfile === 'high_performer') {
    recommendations.push({
      type: 'advanced_practice',
      priority: 'low',
      title: 'Take On Advanced Practice',
      description: 'You are ahead of the usual pace for this course.',
      actionItems: [
        'Challenge yourself with advanced practice problems',
        'Consider peer tutoring to reinforce learning',
      ],
    });
  } else if (parameters.learningProfile === 'needs_repetition') {
    recommendations.push({
      type: 'spaced_review',
      priority: 'medium',
      title: 'Review More Often',
      description: `Flashcard reviews are planned every ${parameters.reviewFrequencyDays} day(s).`,
      actionItems: ['Add spaced repetition sessions', 'Review cards you missed the same day'],
    });
  }

  const peak = formatHour(snapshot.sessions.peakHour);
  recommendations.push({
    type: 'peak_time',
    priority: 'low',
    title: 'Use Your Peak Hours',
    description: `You are most productive around ${peak}.`,
    actionItems: [`Schedule your most challenging topics around ${peak}`],
  });

  return recommendations;
}

