/**
 * Flashcard Repository Implementation
 *
 * Maps between the flat `sm2_*` columns and the nested ReviewState of the
 * domain model. Review-state writes are conditional on the card's version
 * and store the review event in the same transaction.
 */

import { and, asc, eq, sql } from 'drizzle-orm';
import type { AppDatabase } from '../db';
import { flashcardReviews, flashcards, type FlashcardRow } from '../schema';
import type { Difficulty, Flashcard, ReviewState } from '@/core/models';
import type { NewReviewEvent } from '@/core/repository';
import type { Repository } from './base';

/**
 * Input type for creating a new Flashcard. Review counters start at zero and
 * the version at 1.
 */
export interface CreateFlashcardInput {
  id: string;
  learnerId: string;
  courseId: string;
  front: string;
  back: string;
  difficulty?: Difficulty;
  starred?: boolean;
  /** Initial SM-2 state, usually from `SM2Scheduler.createInitialState()` */
  reviewState: ReviewState;
}

function mapToDomain(row: FlashcardRow): Flashcard {
  return {
    id: row.id,
    learnerId: row.learnerId,
    courseId: row.courseId,
    front: row.front,
    back: row.back,
    difficulty: row.difficulty,
    starred: row.starred,
    // Flat SM-2 columns become the nested ReviewState
    reviewState: {
      easeFactor: row.sm2EaseFactor,
      intervalDays: row.sm2IntervalDays,
      repetitionCount: row.sm2RepetitionCount,
      nextDueAt: row.sm2NextDueAt,
    },
    totalReviews: row.totalReviews,
    successfulReviews: row.successfulReviews,
    lastReviewedAt: row.lastReviewedAt,
    version: row.version,
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
  };
}

/**
 * Repository for flashcards and their review events.
 *
 * @example
 * ```typescript
 * const repo = new FlashcardRepository(db);
 *
 * const card = await repo.findById('card-1');
 * if (card) {
 *   const next = scheduler.advance(card.reviewState, 4);
 *   const saved = await repo.saveReviewState(card.id, next, card.version, review);
 * }
 * ```
 */
export class FlashcardRepository implements Repository<Flashcard, CreateFlashcardInput> {
  constructor(private readonly db: AppDatabase) {}

  async findById(id: string): Promise<Flashcard | null> {
    const result = await this.db.select().from(flashcards).where(eq(flashcards.id, id)).limit(1);
    return result.length === 0 ? null : mapToDomain(result[0]);
  }

  /**
   * A learner's cards, in one course or across all of them, ordered by due
   * date.
   */
  async findByLearner(learnerId: string, courseId: string | null): Promise<Flashcard[]> {
    const scope =
      courseId === null
        ? eq(flashcards.learnerId, learnerId)
        : and(eq(flashcards.learnerId, learnerId), eq(flashcards.courseId, courseId));

    const results = await this.db.select().from(flashcards).where(scope).orderBy(asc(flashcards.sm2NextDueAt));
    return results.map(mapToDomain);
  }

  async create(input: CreateFlashcardInput): Promise<Flashcard> {
    const now = new Date();
    const result = await this.db
      .insert(flashcards)
      .values({
        id: input.id,
        learnerId: input.learnerId,
        courseId: input.courseId,
        front: input.front,
        back: input.back,
        difficulty: input.difficulty ?? 'medium',
        starred: input.starred ?? false,
        sm2EaseFactor: input.reviewState.easeFactor,
        sm2IntervalDays: input.reviewState.intervalDays,
        sm2RepetitionCount: input.reviewState.repetitionCount,
        sm2NextDueAt: input.reviewState.nextDueAt,
        createdAt: now,
        updatedAt: now,
      })
      .returning();
    return mapToDomain(result[0]);
  }

  /**
   * Writes the new review state and inserts the review event atomically,
   * only if the stored version still equals `expectedVersion`.
   *
   * @returns false when the version did not match and nothing was written
   */
  async saveReviewState(
    cardId: string,
    state: ReviewState,
    expectedVersion: number,
    reviewId: string,
    review: NewReviewEvent
  ): Promise<boolean> {
    const successful = review.quality >= 3 ? 1 : 0;

    return this.db.transaction((tx) => {
      const updated = tx
        .update(flashcards)
        .set({
          sm2EaseFactor: state.easeFactor,
          sm2IntervalDays: state.intervalDays,
          sm2RepetitionCount: state.repetitionCount,
          sm2NextDueAt: state.nextDueAt,
          totalReviews: sql`${flashcards.totalReviews} + 1`,
          successfulReviews: sql`${flashcards.successfulReviews} + ${successful}`,
          lastReviewedAt: review.createdAt,
          version: expectedVersion + 1,
          updatedAt: review.createdAt,
        })
        .where(and(eq(flashcards.id, cardId), eq(flashcards.version, expectedVersion)))
        .run();

      if (updated.changes === 0) return false;

      tx.insert(flashcardReviews)
        .values({
          id: reviewId,
          learnerId: review.learnerId,
          courseId: review.courseId,
          cardId,
          quality: review.quality,
          responseTimeSeconds: review.responseTimeSeconds,
          createdAt: review.createdAt,
        })
        .run();
      return true;
    });
  }
}
