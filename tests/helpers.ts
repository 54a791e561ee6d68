/**
 * Test Helpers Module
 *
 * Utility functions for creating test data and common assertions. Used by
 * unit tests beside the sources and by the integration and API suites.
 */

import { emptySnapshot } from '../src/core/metrics';
import type { PerformanceSnapshot } from '../src/core/metrics';
import { PerformanceAnalyzer } from '../src/core/analysis';
import { StudyPlanGenerator, type PlanPreferences } from '../src/core/scheduling';
import type { Course, LearningProgress, PlanType, StudyPlan } from '../src/core/models';

// ============================================================================
// Date Utilities
// ============================================================================

/**
 * Fixed reference time for deterministic tests: Monday 2024-03-04, 12:00 UTC.
 */
export const NOW = new Date('2024-03-04T12:00:00.000Z');

/**
 * UTC time `days` days before {@link NOW}, at the given hour.
 */
export function daysAgo(days: number, hour = 12, minute = 0): Date {
  return new Date(Date.UTC(2024, 2, 4 - days, hour, minute));
}

/**
 * UTC time `days` days after {@link NOW}, at the given hour.
 */
export function daysFromNow(days: number, hour = 12): Date {
  return daysAgo(-days, hour);
}

// ============================================================================
// Snapshot Builder
// ============================================================================

/**
 * Headline values for {@link buildSnapshot}. A value that is left out means
 * "no data" for that component.
 */
export interface SnapshotValues {
  quiz?: number;
  quizAttempts?: number;
  consistency?: number;
  completion?: number;
  sessions?: number;
  studyHours?: number;
  retention?: number;
  reviews?: number;
  mastery?: number;
  topics?: number;
  engagement?: number;
  velocity?: number;
  peakHour?: number;
  windowEnd?: Date;
}

/**
 * Builds a snapshot directly from headline values, without going through
 * raw records. Useful for analyzer and planner tests that only care about
 * the signals.
 */
export function buildSnapshot(values: SnapshotValues = {}): PerformanceSnapshot {
  const base = emptySnapshot({
    learnerId: 'learner-1',
    courseId: 'course-1',
    windowDays: 28,
    now: values.windowEnd ?? NOW,
  });

  const quizAttempts = values.quizAttempts ?? (values.quiz !== undefined ? 3 : 0);
  const sessions = values.sessions ?? (values.completion !== undefined || values.engagement !== undefined ? 4 : 0);
  const reviews = values.reviews ?? (values.retention !== undefined ? 10 : 0);
  const topics = values.topics ?? (values.mastery !== undefined ? 4 : 0);

  return {
    ...base,
    avgQuizScore: values.quiz ?? 0,
    completionRate: values.completion ?? 0,
    retentionRate: values.retention ?? 0,
    learningVelocity: values.velocity ?? 0,
    consistencyScore: values.consistency ?? (quizAttempts >= 2 ? 100 : 0),
    quiz: { ...base.quiz, attemptCount: quizAttempts, averageScore: values.quiz ?? 0 },
    sessions: {
      ...base.sessions,
      totalSessions: sessions,
      completionRate: values.completion ?? 0,
      totalStudyHours: values.studyHours ?? 0,
      peakHour: values.peakHour ?? base.sessions.peakHour,
    },
    flashcards: { ...base.flashcards, totalReviews: reviews, retentionRate: values.retention ?? 0 },
    progress: { ...base.progress, topicsTracked: topics, averageMastery: values.mastery ?? 0 },
    engagement: { ...base.engagement, engagementScore: values.engagement ?? 0 },
  };
}

// ============================================================================
// Response Helpers
// ============================================================================

/**
 * Parses a JSON response body with the expected type.
 */
export async function getJsonResponse<T>(response: Response): Promise<T> {
  return response.json() as Promise<T>;
}

/** Envelope of a successful API response. */
export interface SuccessBody<T> {
  success: true;
  data: T;
}

/** Envelope of a failed API response. */
export interface ErrorBody {
  success: false;
  error: { code: string; message: string; details?: unknown };
}

// ============================================================================
// Plan Builders
// ============================================================================

/** Course used by planner tests. */
export const TEST_COURSE: Course = {
  id: 'course-1',
  title: 'Linear Algebra',
  topics: ['vectors', 'matrices'],
  createdAt: daysAgo(60),
};

export interface PlanOptions {
  course?: Course;
  planType?: PlanType;
  targetDate?: Date | null;
  preferences?: PlanPreferences;
  progress?: LearningProgress[];
  now?: Date;
}

/**
 * Generates a plan for the learner described by `snapshot` with the default
 * generator configuration.
 */
export function generatePlan(snapshot: PerformanceSnapshot, options: PlanOptions = {}): StudyPlan {
  const analysis = new PerformanceAnalyzer().analyze([snapshot]);
  return new StudyPlanGenerator().generate({
    id: 'plan-1',
    learnerId: 'learner-1',
    course: options.course ?? TEST_COURSE,
    planType: options.planType ?? 'weekly',
    targetDate: options.targetDate ?? null,
    preferences: options.preferences ?? {},
    snapshot,
    analysis,
    progress: options.progress ?? [],
    now: options.now ?? NOW,
  });
}

/** Topic progress row for `identifier` at the given mastery level. */
export function progressRow(identifier: string, masteryLevel: number): LearningProgress {
  return {
    id: `progress-${identifier}`,
    learnerId: 'learner-1',
    courseId: 'course-1',
    identifier,
    masteryLevel,
    completionPercentage: masteryLevel * 20,
    updatedAt: daysAgo(3),
  };
}
