/**
 * SM-2 Scheduler - Spaced Repetition State Machine
 *
 * Turns a review quality grade (0-5) into the next review interval and due
 * date using the SM-2 family of rules:
 *
 * 1. Quality is clamped to [0, 5].
 * 2. A successful recall (quality >= 3) increments the repetition count. The
 *    first success schedules 1 day, the second 6 days, later ones
 *    `round(previous interval * ease factor)`. The ease factor moves by
 *    `0.1 - (5 - q) * (0.08 + (5 - q) * 0.02)`.
 * 3. A failure resets the repetition count, schedules 1 day and lowers the
 *    ease factor by 0.2.
 * 4. The ease factor is clamped to [1.3, 5.0] after every update.
 *
 * Every method is a pure function of its arguments. `now` is a parameter so
 * review sequences can be replayed exactly.
 */

import type { ReviewState } from '../models';
import { MS_PER_DAY, addDays } from '../utils/dates';
import { clamp } from '../metrics/statistics';
import type { CardMastery, GradedReview, PrioritizableCard } from './types';

/**
 * Configuration options for the SM2Scheduler.
 */
export interface SM2SchedulerConfig {
  /** Ease factor given to a card that has never been reviewed. Default 2.5 */
  initialEaseFactor: number;
  /** Lower ease bound. Default 1.3 */
  minEaseFactor: number;
  /** Upper ease bound. Default 5.0 */
  maxEaseFactor: number;
  /** Lowest quality grade that counts as a successful recall. Default 3 */
  passingQuality: number;
}

const DEFAULT_CONFIG: SM2SchedulerConfig = {
  initialEaseFactor: 2.5,
  minEaseFactor: 1.3,
  maxEaseFactor: 5.0,
  passingQuality: 3,
};

/** Ease factor below which a card counts as struggling. */
const LOW_EASE_THRESHOLD = 2.0;

/**
 * SM2Scheduler computes review intervals and review priorities.
 *
 * @example
 * ```typescript
 * const scheduler = new SM2Scheduler();
 * const state = scheduler.createInitialState(now);
 *
 * const next = scheduler.advance(state, 4, now);
 * // next.intervalDays === 1, next.repetitionCount === 1
 * ```
 */
export class SM2Scheduler {
  private config: SM2SchedulerConfig;

  constructor(config?: Partial<SM2SchedulerConfig>) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  /**
   * State for a card that has never been reviewed. It is due immediately.
   */
  createInitialState(now: Date = new Date()): ReviewState {
    return {
      easeFactor: this.config.initialEaseFactor,
      intervalDays: 1,
      repetitionCount: 0,
      nextDueAt: now,
    };
  }

  /**
   * Applies one review to a state and returns the successor state.
   *
   * @param state - Current memory state (not modified)
   * @param quality - Review grade; out-of-range values are clamped to [0, 5]
   * @param now - Review time, the base of the next due date
   */
  advance(state: ReviewState, quality: number, now: Date = new Date()): ReviewState {
    const q = clamp(Math.round(quality), 0, 5);

    let easeFactor = state.easeFactor;
    let intervalDays: number;
    let repetitionCount: number;

    if (q >= this.config.passingQuality) {
      if (state.repetitionCount === 0) {
        intervalDays = 1;
      } else if (state.repetitionCount === 1) {
        intervalDays = 6;
      } else {
        intervalDays = Math.round(state.intervalDays * state.easeFactor);
      }
      repetitionCount = state.repetitionCount + 1;
      easeFactor += 0.1 - (5 - q) * (0.08 + (5 - q) * 0.02);
    } else {
      repetitionCount = 0;
      intervalDays = 1;
      easeFactor -= 0.2;
    }

    return {
      easeFactor: clamp(easeFactor, this.config.minEaseFactor, this.config.maxEaseFactor),
      intervalDays: Math.max(1, intervalDays),
      repetitionCount,
      nextDueAt: addDays(now, Math.max(1, intervalDays)),
    };
  }

  isSuccessful(quality: number): boolean {
    return quality >= this.config.passingQuality;
  }

  isDue(state: ReviewState, now: Date = new Date()): boolean {
    return state.nextDueAt.getTime() <= now.getTime();
  }

  /**
   * Fraction (0-1) of reviews inside the trailing window that were
   * successful recalls. 0 when the window holds no reviews.
   */
  retentionRate(reviews: readonly GradedReview[], windowDays: number, now: Date = new Date()): number {
    const cutoff = now.getTime() - windowDays * MS_PER_DAY;
    const recent = reviews.filter(
      (review) => review.createdAt.getTime() >= cutoff && review.createdAt.getTime() <= now.getTime()
    );
    if (recent.length === 0) return 0;

    const successful = recent.filter((review) => this.isSuccessful(review.quality));
    return successful.length / recent.length;
  }

  /**
   * Review priority of one card. Higher means review sooner.
   *
   * - 10 per whole day overdue
   * - up to 20 for a low success rate (reviewed cards only)
   * - 5 for hard cards, 2 for medium
   * - 15 for starred cards
   * - `(2.0 - ease) * 10` when the ease factor is below 2.0
   */
  priorityScore(card: PrioritizableCard, now: Date = new Date()): number {
    let score = 0;

    const overdueMs = now.getTime() - card.reviewState.nextDueAt.getTime();
    if (overdueMs > 0) {
      score += Math.floor(overdueMs / MS_PER_DAY) * 10;
    }

    if (card.totalReviews > 0) {
      score += (1 - card.successfulReviews / card.totalReviews) * 20;
    }

    if (card.difficulty === 'hard') {
      score += 5;
    } else if (card.difficulty === 'medium') {
      score += 2;
    }

    if (card.starred) {
      score += 15;
    }

    if (card.reviewState.easeFactor < LOW_EASE_THRESHOLD) {
      score += (LOW_EASE_THRESHOLD - card.reviewState.easeFactor) * 10;
    }

    return score;
  }

  /**
   * Returns a new array ordered by descending priority. Cards with equal
   * scores keep their input order.
   */
  prioritize<T extends PrioritizableCard>(cards: readonly T[], now: Date = new Date()): T[] {
    return cards
      .map((card, index) => ({ card, index, score: this.priorityScore(card, now) }))
      .sort((a, b) => b.score - a.score || a.index - b.index)
      .map((entry) => entry.card);
  }

  /**
   * Coarse mastery bucket of a card, see {@link CardMastery}.
   */
  masteryOf(card: PrioritizableCard): CardMastery {
    if (card.totalReviews === 0) return 'new';

    const successRate = card.successfulReviews / card.totalReviews;
    const { repetitionCount, easeFactor } = card.reviewState;

    if (repetitionCount >= 8 && successRate >= 0.9 && easeFactor >= 2.5) return 'mastered';
    if (repetitionCount >= 3 && successRate >= 0.7) return 'learning';
    if (successRate < 0.5 || easeFactor < LOW_EASE_THRESHOLD) return 'difficult';
    return 'learning';
  }
}
