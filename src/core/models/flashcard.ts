/**
 * Flashcard Domain Types
 *
 * A flashcard is one learnable item scheduled with the SM-2 algorithm. Its
 * scheduling state lives in {@link ReviewState}, which the repository stores
 * as flat columns and maps back into this nested shape.
 */

import type { Difficulty } from './records';

/**
 * SM-2 memory state for one item.
 *
 * Invariants: `easeFactor` in [1.3, 5.0], `intervalDays >= 1`,
 * `repetitionCount >= 0`.
 */
export interface ReviewState {
  /** Multiplier applied to the interval after the second successful recall */
  easeFactor: number;
  /** Days until the next review */
  intervalDays: number;
  /** Consecutive successful recalls since the last failure */
  repetitionCount: number;
  nextDueAt: Date;
}

export interface Flashcard {
  id: string;
  learnerId: string;
  courseId: string;
  front: string;
  back: string;
  difficulty: Difficulty;
  /** Learner-flagged cards are reviewed first */
  starred: boolean;
  reviewState: ReviewState;
  totalReviews: number;
  successfulReviews: number;
  lastReviewedAt: Date | null;
  /**
   * Optimistic-concurrency token. Every successful write increments it; a
   * write carrying a stale version is rejected.
   */
  version: number;
  createdAt: Date;
  updatedAt: Date;
}
