/**
 * SM-2 Module - Barrel Export
 *
 * Spaced-repetition scheduling for flashcards:
 * - SM2Scheduler: review-state transitions, retention rate and priorities
 * - ReviewQueue: due-card batches, study load, review recommendations and
 *   daily load balancing
 *
 * @example
 * ```typescript
 * import { SM2Scheduler } from '@/core/sm2';
 *
 * const scheduler = new SM2Scheduler();
 * const next = scheduler.advance(card.reviewState, 5, new Date());
 * ```
 */

export { SM2Scheduler, type SM2SchedulerConfig } from './scheduler';
export { ReviewQueue, DEFAULT_REVIEW_LOAD, analyzeReviewLoad, type ReviewQueueResult } from './review-queue';
export type {
  PrioritizableCard,
  GradedReview,
  CardMastery,
  LoadCard,
  StudyLoad,
  ReviewRecommendationType,
  ReviewRecommendation,
  ReviewLoadOptions,
  DailyReviewCount,
  ReviewLoadAnalysis,
  PlannedReview,
  DailyReviewPlan,
} from './types';
