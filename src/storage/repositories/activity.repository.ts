/**
 * Activity Repository Implementation
 *
 * Raw history: quiz attempts, study session logs and flashcard reviews.
 * Records are append-only; there is no update or delete.
 *
 * Every fetch takes a `since` bound and returns records oldest first.
 * `courseId: null` means every course of the learner.
 */

import { and, asc, desc, eq, gte, type SQL } from 'drizzle-orm';
import type { AnySQLiteColumn } from 'drizzle-orm/sqlite-core';
import type { AppDatabase } from '../db';
import {
  flashcardReviews,
  quizAttempts,
  studySessionLogs,
  type FlashcardReviewRow,
  type QuizAttemptRow,
  type StudySessionLogRow,
} from '../schema';
import type { ActivityRecord, QuizAttempt, ReviewEvent, SessionRecord } from '@/core/models';
import type { NewActivityRecord } from '@/core/repository';

function quizToDomain(row: QuizAttemptRow): QuizAttempt {
  return {
    kind: 'quiz',
    id: row.id,
    learnerId: row.learnerId,
    courseId: row.courseId,
    score: row.score,
    startedAt: row.startedAt,
    difficulty: row.difficulty,
  };
}

function sessionToDomain(row: StudySessionLogRow): SessionRecord {
  return {
    kind: 'session',
    id: row.id,
    learnerId: row.learnerId,
    courseId: row.courseId,
    scheduledStart: row.scheduledStart,
    scheduledEnd: row.scheduledEnd,
    actualStart: row.actualStart,
    actualEnd: row.actualEnd,
    status: row.status,
    productivityRating: row.productivityRating,
  };
}

function reviewToDomain(row: FlashcardReviewRow): ReviewEvent {
  return {
    kind: 'review',
    id: row.id,
    learnerId: row.learnerId,
    courseId: row.courseId,
    cardId: row.cardId,
    quality: row.quality,
    responseTimeSeconds: row.responseTimeSeconds,
    createdAt: row.createdAt,
  };
}

interface ScopedTable {
  learnerId: AnySQLiteColumn;
  courseId: AnySQLiteColumn;
}

function scope(table: ScopedTable, learnerId: string, courseId: string | null, ...rest: SQL[]): SQL | undefined {
  const conditions = [eq(table.learnerId, learnerId), ...rest];
  if (courseId !== null) conditions.push(eq(table.courseId, courseId));
  return and(...conditions);
}

export class ActivityRepository {
  constructor(private readonly db: AppDatabase) {}

  /**
   * Stores one record under the given id.
   */
  async record(id: string, record: NewActivityRecord): Promise<ActivityRecord> {
    switch (record.kind) {
      case 'quiz': {
        const result = await this.db
          .insert(quizAttempts)
          .values({
            id,
            learnerId: record.learnerId,
            courseId: record.courseId,
            score: record.score,
            startedAt: record.startedAt,
            difficulty: record.difficulty,
          })
          .returning();
        return quizToDomain(result[0]);
      }
      case 'session': {
        const result = await this.db
          .insert(studySessionLogs)
          .values({
            id,
            learnerId: record.learnerId,
            courseId: record.courseId,
            scheduledStart: record.scheduledStart,
            scheduledEnd: record.scheduledEnd,
            actualStart: record.actualStart,
            actualEnd: record.actualEnd,
            status: record.status,
            productivityRating: record.productivityRating,
          })
          .returning();
        return sessionToDomain(result[0]);
      }
      case 'review': {
        const result = await this.db
          .insert(flashcardReviews)
          .values({
            id,
            learnerId: record.learnerId,
            courseId: record.courseId,
            cardId: record.cardId,
            quality: record.quality,
            responseTimeSeconds: record.responseTimeSeconds,
            createdAt: record.createdAt,
          })
          .returning();
        return reviewToDomain(result[0]);
      }
    }
  }

  async findQuizAttempts(learnerId: string, courseId: string | null, since: Date): Promise<QuizAttempt[]> {
    const results = await this.db
      .select()
      .from(quizAttempts)
      .where(scope(quizAttempts, learnerId, courseId, gte(quizAttempts.startedAt, since)))
      .orderBy(asc(quizAttempts.startedAt));
    return results.map(quizToDomain);
  }

  async findStudySessions(learnerId: string, courseId: string | null, since: Date): Promise<SessionRecord[]> {
    const results = await this.db
      .select()
      .from(studySessionLogs)
      .where(scope(studySessionLogs, learnerId, courseId, gte(studySessionLogs.scheduledStart, since)))
      .orderBy(asc(studySessionLogs.scheduledStart));
    return results.map(sessionToDomain);
  }

  async findFlashcardReviews(learnerId: string, courseId: string | null, since: Date): Promise<ReviewEvent[]> {
    const results = await this.db
      .select()
      .from(flashcardReviews)
      .where(scope(flashcardReviews, learnerId, courseId, gte(flashcardReviews.createdAt, since)))
      .orderBy(asc(flashcardReviews.createdAt));
    return results.map(reviewToDomain);
  }

  async findLastReviewAt(learnerId: string): Promise<Date | null> {
    const result = await this.db
      .select({ createdAt: flashcardReviews.createdAt })
      .from(flashcardReviews)
      .where(eq(flashcardReviews.learnerId, learnerId))
      .orderBy(desc(flashcardReviews.createdAt))
      .limit(1);
    return result.length === 0 ? null : result[0].createdAt;
  }
}
