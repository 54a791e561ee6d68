/**
 * Metrics Type Definitions
 *
 * A PerformanceSnapshot is the reduced view of one learner's history over one
 * time window. The five headline signals sit at the top level; the detail
 * sections carry the raw series and breakdowns the analyzer, the time-slot
 * optimizer and the predictor read.
 *
 * Snapshots are derived values. They are recomputed on demand and never
 * persisted.
 */

import type {
  Difficulty,
  LearningProgress,
  QuizAttempt,
  ReviewEvent,
  SessionRecord,
} from '../models';
import type { Weekday } from '../utils/dates';
import type { TrendDirection } from './statistics';

/** Everything the aggregator reads for one learner and window. */
export interface ActivityHistory {
  quizzes: QuizAttempt[];
  sessions: SessionRecord[];
  reviews: ReviewEvent[];
  progress: LearningProgress[];
}

export interface QuizMetrics {
  attemptCount: number;
  averageScore: number;
  bestScore: number;
  worstScore: number;
  /** Up to five scores, newest first */
  recentScores: number[];
  /** All scores in the window, oldest first */
  scores: number[];
  averageByDifficulty: Record<Difficulty, number | null>;
}

/** Session length buckets: short <= 30 min, medium <= 60 min, long > 60 min. */
export type SessionLengthBucket = 'short' | 'medium' | 'long';

export interface HourlyProductivity {
  /** UTC hour of day, 0-23 */
  hour: number;
  averageRating: number;
  sessionCount: number;
}

export interface SessionMetrics {
  totalSessions: number;
  completedSessions: number;
  /** 0-100 */
  completionRate: number;
  totalStudyHours: number;
  /** Mean self-reported rating, 0 when nothing was rated */
  averageProductivity: number;
  sessionsPerWeek: number;
  /** Rated hours, best first */
  hourlyProductivity: HourlyProductivity[];
  /** Best-rated hour, 9 without history */
  peakHour: number;
  bucketProductivity: Record<SessionLengthBucket, number | null>;
  bestLengthBucket: SessionLengthBucket;
  /** Representative length of the best bucket: 25, 45 or 90 minutes */
  optimalSessionMinutes: number;
  productivityTrend: TrendDirection;
}

export interface FlashcardMetrics {
  totalReviews: number;
  /** 0-100 */
  retentionRate: number;
  /** Cards whose last three reviews all scored 4 or better */
  masteredCards: number;
  /** 0-100, rewards fast correct answers */
  reviewEfficiency: number;
  averageResponseSeconds: number;
  reviewsPerDay: number;
  qualityDistribution: {
    easy: number;
    medium: number;
    hard: number;
    again: number;
  };
}

export interface ProgressMetrics {
  topicsTracked: number;
  /** Topics with any completion or mastery above 1 */
  topicsStarted: number;
  /** Mean mastery level, 0 when nothing is tracked */
  averageMastery: number;
  /** Topics currently at mastery 4 or above */
  masteredTopics: number;
  /** Topics at mastery 4 or above last updated inside the window */
  masteredInWindow: number;
  averageCompletion: number;
}

export interface EngagementMetrics {
  /** Consecutive UTC days with a started session, counting back from today */
  studyStreak: number;
  activeDays: number;
  /** Up to three hours with the most started sessions */
  peakHours: number[];
  mostActiveDay: Weekday | 'Unknown';
  /** 0-100, needs at least seven active days */
  activityConsistency: number;
  /** 0-100 */
  engagementScore: number;
}

export interface PerformanceSnapshot {
  learnerId: string;
  courseId: string | null;
  windowDays: number;
  windowStart: Date;
  windowEnd: Date;

  /** Mean quiz score, 0-100 */
  avgQuizScore: number;
  /** Completed sessions / all sessions, 0-100 */
  completionRate: number;
  /** Successful reviews / all reviews, 0-100 */
  retentionRate: number;
  /** Topics reaching mastery per week */
  learningVelocity: number;
  /** Inverse coefficient of variation of quiz scores, 0-100 */
  consistencyScore: number;

  quiz: QuizMetrics;
  sessions: SessionMetrics;
  flashcards: FlashcardMetrics;
  progress: ProgressMetrics;
  engagement: EngagementMetrics;
}
