/**
 * Metrics Aggregator
 *
 * Reduces a learner's raw history (quiz attempts, session logs, flashcard
 * reviews, topic progress) over a time window into a PerformanceSnapshot.
 *
 * Headline signals:
 * - average quiz score
 * - session completion rate (`completed / total`)
 * - flashcard retention rate (reviews graded 3+)
 * - learning velocity (`topics reaching mastery 4+ in window * 7 / windowDays`)
 * - consistency (`100 - 100 * stdev / mean` of quiz scores, floored at 0)
 *
 * A window without history yields a fully populated all-zero snapshot, so
 * callers never special-case new learners.
 *
 * The reduction itself ({@link summarizeActivity}) is a pure function; the
 * class only adds the repository reads around it.
 *
 * @example
 * ```typescript
 * const aggregator = new MetricsAggregator(repository);
 * const snapshot = await aggregator.aggregate('learner-1', 'course-1', 30);
 * console.log(`Completion: ${snapshot.completionRate}%`);
 * ```
 */

import type { Difficulty, ReviewEvent, SessionRecord } from '../models';
import type { ActivityHistorySource } from '../repository';
import {
  MS_PER_DAY,
  WEEKDAYS,
  addDays,
  toIsoDate,
  weekdayOf,
  type Weekday,
} from '../utils/dates';
import {
  classifyTrend,
  consistencyScore,
  mean,
  populationStdDev,
  round,
} from './statistics';
import type {
  ActivityHistory,
  EngagementMetrics,
  FlashcardMetrics,
  HourlyProductivity,
  PerformanceSnapshot,
  ProgressMetrics,
  QuizMetrics,
  SessionLengthBucket,
  SessionMetrics,
} from './types';

/** Window used when a caller passes a non-positive one. */
export const DEFAULT_WINDOW_DAYS = 30;

/** Hour assumed to be best when there is no productivity history. */
export const DEFAULT_PEAK_HOUR = 9;

/** Mastery level at which a topic counts as mastered. */
export const MASTERY_THRESHOLD = 4;

const BUCKET_MINUTES: Record<SessionLengthBucket, number> = {
  short: 25,
  medium: 45,
  long: 90,
};

/** Identifies the learner, course and window a snapshot describes. */
export interface SnapshotScope {
  learnerId: string;
  courseId: string | null;
  windowDays: number;
  /** Window end; the window covers `(now - windowDays, now]` */
  now: Date;
}

// =============================================================================
// Aggregator
// =============================================================================

export class MetricsAggregator {
  constructor(private readonly source: ActivityHistorySource) {}

  /**
   * Snapshot of one learner over the trailing window ending at `now`.
   */
  async aggregate(
    learnerId: string,
    courseId: string | null,
    windowDays: number,
    now: Date = new Date()
  ): Promise<PerformanceSnapshot> {
    const days = normalizeWindow(windowDays);
    const history = await this.fetchHistory(learnerId, courseId, addDays(now, -days));
    return summarizeActivity(history, { learnerId, courseId, windowDays: days, now });
  }

  /**
   * `points` snapshots of the same window length whose windows end one week
   * apart, oldest first. The last one equals `aggregate(...)` for `now`.
   * History is read once for the whole span.
   */
  async aggregateSeries(
    learnerId: string,
    courseId: string | null,
    windowDays: number,
    points: number,
    now: Date = new Date()
  ): Promise<PerformanceSnapshot[]> {
    const days = normalizeWindow(windowDays);
    const count = Math.max(1, Math.floor(points));
    const since = addDays(now, -(days + 7 * (count - 1)));
    const history = await this.fetchHistory(learnerId, courseId, since);

    const series: PerformanceSnapshot[] = [];
    for (let index = 0; index < count; index++) {
      const end = addDays(now, -7 * (count - 1 - index));
      series.push(summarizeActivity(history, { learnerId, courseId, windowDays: days, now: end }));
    }
    return series;
  }

  private async fetchHistory(
    learnerId: string,
    courseId: string | null,
    since: Date
  ): Promise<ActivityHistory> {
    const [quizzes, sessions, reviews, progress] = await Promise.all([
      this.source.fetchQuizAttempts(learnerId, courseId, since),
      this.source.fetchStudySessions(learnerId, courseId, since),
      this.source.fetchFlashcardReviews(learnerId, courseId, since),
      this.source.fetchLearningProgress(learnerId, courseId),
    ]);
    return { quizzes, sessions, reviews, progress };
  }
}

/** Window length in whole days; a non-positive or non-finite value gives the default. */
export function normalizeWindow(windowDays: number): number {
  return Number.isFinite(windowDays) && windowDays > 0 ? Math.floor(windowDays) : DEFAULT_WINDOW_DAYS;
}

// =============================================================================
// Pure reduction
// =============================================================================

/**
 * Reduces history to a snapshot of the window `(now - windowDays, now]`.
 * Records outside the window are ignored, so the same history can produce
 * snapshots for several windows.
 */
export function summarizeActivity(history: ActivityHistory, scope: SnapshotScope): PerformanceSnapshot {
  const windowEnd = scope.now;
  const windowStart = addDays(windowEnd, -scope.windowDays);
  const inWindow = (date: Date): boolean =>
    date.getTime() > windowStart.getTime() && date.getTime() <= windowEnd.getTime();

  const quizzes = history.quizzes
    .filter((quiz) => inWindow(quiz.startedAt))
    .sort((a, b) => a.startedAt.getTime() - b.startedAt.getTime());
  const sessions = history.sessions
    .filter((session) => inWindow(session.scheduledStart))
    .sort((a, b) => a.scheduledStart.getTime() - b.scheduledStart.getTime());
  const reviews = history.reviews
    .filter((review) => inWindow(review.createdAt))
    .sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime());
  // Progress rows are current state; rows touched after the window end are unknown at that point
  const progress = history.progress.filter((entry) => entry.updatedAt.getTime() <= windowEnd.getTime());

  const quiz = quizMetrics(quizzes.map((q) => ({ score: q.score, difficulty: q.difficulty })));
  const sessionMetrics = sessionMetricsOf(sessions, scope.windowDays);
  const flashcards = flashcardMetrics(reviews, scope.windowDays);
  const progressMetrics = progressMetricsOf(progress, inWindow);
  const engagement = engagementMetrics(sessions, sessionMetrics.completionRate, scope.windowDays, windowEnd);

  return {
    learnerId: scope.learnerId,
    courseId: scope.courseId,
    windowDays: scope.windowDays,
    windowStart,
    windowEnd,
    avgQuizScore: quiz.averageScore,
    completionRate: sessionMetrics.completionRate,
    retentionRate: flashcards.retentionRate,
    learningVelocity: round((progressMetrics.masteredInWindow * 7) / scope.windowDays),
    consistencyScore: round(consistencyScore(quiz.scores)),
    quiz,
    sessions: sessionMetrics,
    flashcards,
    progress: progressMetrics,
    engagement,
  };
}

/**
 * The all-zero snapshot for a learner without history.
 */
export function emptySnapshot(scope: SnapshotScope): PerformanceSnapshot {
  return summarizeActivity({ quizzes: [], sessions: [], reviews: [], progress: [] }, scope);
}

// =============================================================================
// Section reducers
// =============================================================================

function quizMetrics(attempts: { score: number; difficulty: Difficulty }[]): QuizMetrics {
  const scores = attempts.map((attempt) => attempt.score);

  const byDifficulty = (difficulty: Difficulty): number | null => {
    const matching = attempts.filter((attempt) => attempt.difficulty === difficulty);
    return matching.length === 0 ? null : round(mean(matching.map((attempt) => attempt.score)));
  };

  return {
    attemptCount: scores.length,
    averageScore: round(mean(scores)),
    bestScore: scores.length === 0 ? 0 : Math.max(...scores),
    worstScore: scores.length === 0 ? 0 : Math.min(...scores),
    recentScores: scores.slice(-5).reverse(),
    scores,
    averageByDifficulty: {
      easy: byDifficulty('easy'),
      medium: byDifficulty('medium'),
      hard: byDifficulty('hard'),
    },
  };
}

/** Start time of a session the learner actually began, else null. */
function startedAt(session: SessionRecord): Date | null {
  if (session.actualStart) return session.actualStart;
  return session.status === 'completed' ? session.scheduledStart : null;
}

function durationMinutes(session: SessionRecord): number {
  const start = session.actualStart ?? session.scheduledStart;
  const end = session.actualStart && session.actualEnd ? session.actualEnd : session.scheduledEnd;
  return Math.max(0, (end.getTime() - start.getTime()) / 60000);
}

function lengthBucket(minutes: number): SessionLengthBucket {
  if (minutes <= 30) return 'short';
  if (minutes <= 60) return 'medium';
  return 'long';
}

function sessionMetricsOf(sessions: SessionRecord[], windowDays: number): SessionMetrics {
  const completed = sessions.filter((session) => session.status === 'completed');
  const rated = sessions.filter(
    (session): session is SessionRecord & { productivityRating: number } => session.productivityRating !== null
  );

  // Mean rating per UTC start hour, best first
  const byHour = new Map<number, number[]>();
  for (const session of rated) {
    const hour = (session.actualStart ?? session.scheduledStart).getUTCHours();
    byHour.set(hour, [...(byHour.get(hour) ?? []), session.productivityRating]);
  }
  const hourlyProductivity: HourlyProductivity[] = [...byHour.entries()]
    .map(([hour, ratings]) => ({ hour, averageRating: round(mean(ratings)), sessionCount: ratings.length }))
    .sort((a, b) => b.averageRating - a.averageRating || b.sessionCount - a.sessionCount || a.hour - b.hour);

  const bucketRatings: Record<SessionLengthBucket, number[]> = { short: [], medium: [], long: [] };
  for (const session of rated) {
    bucketRatings[lengthBucket(durationMinutes(session))].push(session.productivityRating);
  }
  const bucketProductivity: Record<SessionLengthBucket, number | null> = {
    short: bucketRatings.short.length > 0 ? round(mean(bucketRatings.short)) : null,
    medium: bucketRatings.medium.length > 0 ? round(mean(bucketRatings.medium)) : null,
    long: bucketRatings.long.length > 0 ? round(mean(bucketRatings.long)) : null,
  };

  // Medium is checked first so it wins ties and is the default
  let bestLengthBucket: SessionLengthBucket = 'medium';
  let bestBucketRating = bucketProductivity.medium ?? -1;
  for (const bucket of ['short', 'long'] as const) {
    const rating = bucketProductivity[bucket];
    if (rating !== null && rating > bestBucketRating) {
      bestLengthBucket = bucket;
      bestBucketRating = rating;
    }
  }

  const totalMinutes = completed.reduce((total, session) => total + durationMinutes(session), 0);

  return {
    totalSessions: sessions.length,
    completedSessions: completed.length,
    completionRate: sessions.length === 0 ? 0 : round((completed.length / sessions.length) * 100),
    totalStudyHours: round(totalMinutes / 60),
    averageProductivity: round(mean(rated.map((session) => session.productivityRating))),
    sessionsPerWeek: round(sessions.length / (windowDays / 7)),
    hourlyProductivity,
    peakHour: hourlyProductivity[0]?.hour ?? DEFAULT_PEAK_HOUR,
    bucketProductivity,
    bestLengthBucket,
    optimalSessionMinutes: BUCKET_MINUTES[bestLengthBucket],
    productivityTrend: classifyTrend(rated.map((session) => session.productivityRating)),
  };
}

/**
 * Efficiency of one review: fast correct answers score highest.
 * 2-5 seconds scores 100, under 2 seconds 80 (likely guessed), slower answers
 * lose 10 points per second over 5. Failed recalls score 0.
 */
function reviewEfficiency(review: ReviewEvent): number {
  if (review.quality < 3) return 0;
  const seconds = review.responseTimeSeconds;
  if (seconds < 2) return 80;
  if (seconds <= 5) return 100;
  return Math.max(0, 100 - (seconds - 5) * 10);
}

function flashcardMetrics(reviews: ReviewEvent[], windowDays: number): FlashcardMetrics {
  const successful = reviews.filter((review) => review.quality >= 3);

  const byCard = new Map<string, number[]>();
  for (const review of reviews) {
    byCard.set(review.cardId, [...(byCard.get(review.cardId) ?? []), review.quality]);
  }
  const masteredCards = [...byCard.values()].filter(
    (qualities) => qualities.length >= 3 && qualities.slice(-3).every((quality) => quality >= 4)
  ).length;

  return {
    totalReviews: reviews.length,
    retentionRate: reviews.length === 0 ? 0 : round((successful.length / reviews.length) * 100),
    masteredCards,
    reviewEfficiency: round(mean(reviews.map(reviewEfficiency))),
    averageResponseSeconds: round(mean(reviews.map((review) => review.responseTimeSeconds))),
    reviewsPerDay: round(reviews.length / windowDays),
    qualityDistribution: {
      easy: reviews.filter((review) => review.quality >= 4).length,
      medium: reviews.filter((review) => review.quality === 3).length,
      hard: reviews.filter((review) => review.quality === 1 || review.quality === 2).length,
      again: reviews.filter((review) => review.quality === 0).length,
    },
  };
}

function progressMetricsOf(
  progress: ActivityHistory['progress'],
  inWindow: (date: Date) => boolean
): ProgressMetrics {
  const mastered = progress.filter((entry) => entry.masteryLevel >= MASTERY_THRESHOLD);

  return {
    topicsTracked: progress.length,
    topicsStarted: progress.filter((entry) => entry.completionPercentage > 0 || entry.masteryLevel > 1).length,
    averageMastery: round(mean(progress.map((entry) => entry.masteryLevel))),
    masteredTopics: mastered.length,
    masteredInWindow: mastered.filter((entry) => inWindow(entry.updatedAt)).length,
    averageCompletion: round(mean(progress.map((entry) => entry.completionPercentage))),
  };
}

function engagementMetrics(
  sessions: SessionRecord[],
  completionRate: number,
  windowDays: number,
  now: Date
): EngagementMetrics {
  const starts = sessions.map(startedAt).filter((date): date is Date => date !== null);

  const perDay = new Map<string, number>();
  const perHour = new Map<number, number>();
  const perWeekday = new Map<Weekday, number>();
  for (const start of starts) {
    const day = toIsoDate(start);
    perDay.set(day, (perDay.get(day) ?? 0) + 1);
    perHour.set(start.getUTCHours(), (perHour.get(start.getUTCHours()) ?? 0) + 1);
    perWeekday.set(weekdayOf(start), (perWeekday.get(weekdayOf(start)) ?? 0) + 1);
  }

  let studyStreak = 0;
  let cursor = now;
  while (perDay.has(toIsoDate(cursor))) {
    studyStreak++;
    cursor = new Date(cursor.getTime() - MS_PER_DAY);
  }

  const peakHours = [...perHour.entries()]
    .sort((a, b) => b[1] - a[1] || a[0] - b[0])
    .slice(0, 3)
    .map(([hour]) => hour);

  let mostActiveDay: Weekday | 'Unknown' = 'Unknown';
  let mostActiveCount = 0;
  for (const weekday of WEEKDAYS) {
    const count = perWeekday.get(weekday) ?? 0;
    if (count > mostActiveCount) {
      mostActiveDay = weekday;
      mostActiveCount = count;
    }
  }

  const dailyCounts = [...perDay.values()];
  let activityConsistency = 0;
  if (dailyCounts.length >= 7) {
    activityConsistency = round(Math.max(0, 100 - (100 * populationStdDev(dailyCounts)) / mean(dailyCounts)));
  }

  const sessionsPerDay = starts.length / windowDays;
  const engagementScore =
    Math.min(1, sessionsPerDay / 3) * 30 +
    (completionRate / 100) * 40 +
    Math.min(studyStreak / 30, 1) * 30;

  return {
    studyStreak,
    activeDays: perDay.size,
    peakHours,
    mostActiveDay,
    activityConsistency,
    engagementScore: round(engagementScore),
  };
}

