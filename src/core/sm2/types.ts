/**
 * SM-2 Type Definitions
 *
 * Shapes consumed and produced by the SM-2 scheduler and the review-queue
 * helpers built on top of it.
 */

import type { Difficulty, Flashcard, Priority, ReviewEvent } from '../models';

/**
 * The card fields the priority score reads. Any object carrying them can be
 * prioritized, which keeps the scheduler independent of storage rows.
 */
export type PrioritizableCard = Pick<
  Flashcard,
  'difficulty' | 'starred' | 'totalReviews' | 'successfulReviews' | 'reviewState'
>;

/** The review fields the retention rate reads. */
export type GradedReview = Pick<ReviewEvent, 'quality' | 'createdAt'>;

/**
 * Coarse card mastery derived from review history.
 *
 * - 'new': never reviewed
 * - 'mastered': 8+ repetitions, 90%+ success and ease at least 2.5
 * - 'learning': 3+ repetitions with 70%+ success, or anything in between
 * - 'difficult': under 50% success or ease below 2.0
 */
export type CardMastery = 'new' | 'learning' | 'difficult' | 'mastered';

/** Card fields needed to place a card in the study load. */
export type LoadCard = PrioritizableCard & Pick<Flashcard, 'id'>;

export interface StudyLoad {
  totalCards: number;
  dueToday: number;
  overdue: number;
  dueThisWeek: number;
  difficultyDistribution: Record<Difficulty, number>;
  masteryDistribution: Record<CardMastery, number>;
  estimatedMinutes: {
    today: number;
    thisWeek: number;
    overdue: number;
  };
  /** 0-100; overdue cards weigh double */
  studyPressure: number;
}

export type ReviewRecommendationType =
  | 'overdue_reviews'
  | 'daily_reviews'
  | 'high_workload'
  | 'study_gap'
  | 'optimal_time'
  | 'uneven_load'
  | 'overloaded_days'
  | 'heavy_load';

export interface ReviewRecommendation {
  type: ReviewRecommendationType;
  priority: Priority;
  message: string;
  action: string;
}

export interface ReviewLoadOptions {
  /** Reviews kept on a day that goes over the maximum */
  targetDailyReviews: number;
  /** Days with more due reviews than this are thinned out */
  maxDailyReviews: number;
  /** Days looked ahead, today included */
  horizonDays: number;
}

export interface DailyReviewCount {
  date: string;
  reviews: number;
}

export interface ReviewLoadAnalysis {
  /** Mean reviews over the days that have any */
  averageDailyLoad: number;
  /** Busiest day; today when nothing is due */
  peakDay: string;
  loadVariance: number;
  /** Days more than 50% above the average */
  overloadedDays: string[];
  dailyDistribution: DailyReviewCount[];
}

export interface PlannedReview {
  cardId: string;
  date: string;
  /** Due date, with overdue cards counted today */
  originalDate: string;
  redistributed: boolean;
}

export interface DailyReviewPlan {
  currentLoad: ReviewLoadAnalysis;
  optimizedSchedule: PlannedReview[];
  optimizedLoad: DailyReviewCount[];
  recommendations: ReviewRecommendation[];
}
