/**
 * Learning Progress Repository Implementation
 *
 * One row per learner, course and topic. Writes are upserts keyed on that
 * triple.
 */

import { and, asc, eq } from 'drizzle-orm';
import type { AppDatabase } from '../db';
import { learningProgress, type LearningProgressRow } from '../schema';
import type { LearningProgress } from '@/core/models';
import type { ProgressUpdate } from '@/core/repository';

function mapToDomain(row: LearningProgressRow): LearningProgress {
  return {
    id: row.id,
    learnerId: row.learnerId,
    courseId: row.courseId,
    identifier: row.identifier,
    masteryLevel: row.masteryLevel,
    completionPercentage: row.completionPercentage,
    updatedAt: row.updatedAt,
  };
}

export class ProgressRepository {
  constructor(private readonly db: AppDatabase) {}

  async findByLearner(learnerId: string, courseId: string | null): Promise<LearningProgress[]> {
    const scope =
      courseId === null
        ? eq(learningProgress.learnerId, learnerId)
        : and(eq(learningProgress.learnerId, learnerId), eq(learningProgress.courseId, courseId));

    const results = await this.db
      .select()
      .from(learningProgress)
      .where(scope)
      .orderBy(asc(learningProgress.courseId), asc(learningProgress.identifier));
    return results.map(mapToDomain);
  }

  /**
   * Inserts the topic row, or replaces mastery and completion of the
   * existing one. An existing row keeps its id.
   */
  async upsert(id: string, update: ProgressUpdate): Promise<LearningProgress> {
    const result = await this.db
      .insert(learningProgress)
      .values({ id, ...update })
      .onConflictDoUpdate({
        target: [learningProgress.learnerId, learningProgress.courseId, learningProgress.identifier],
        set: {
          masteryLevel: update.masteryLevel,
          completionPercentage: update.completionPercentage,
          updatedAt: update.updatedAt,
        },
      })
      .returning();
    return mapToDomain(result[0]);
  }
}
