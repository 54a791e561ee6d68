/**
 * Learner Repository Implementation
 */

import { asc, eq } from 'drizzle-orm';
import type { AppDatabase } from '../db';
import { learners, type LearnerRow } from '../schema';
import type { Learner } from '@/core/models';
import type { Repository } from './base';

export interface CreateLearnerInput {
  id: string;
  name: string;
  createdAt?: Date;
}

function mapToDomain(row: LearnerRow): Learner {
  return {
    id: row.id,
    name: row.name,
    createdAt: row.createdAt,
  };
}

export class LearnerRepository implements Repository<Learner, CreateLearnerInput> {
  constructor(private readonly db: AppDatabase) {}

  async findById(id: string): Promise<Learner | null> {
    const result = await this.db.select().from(learners).where(eq(learners.id, id)).limit(1);
    return result.length === 0 ? null : mapToDomain(result[0]);
  }

  /**
   * All learners, oldest first.
   */
  async findAll(): Promise<Learner[]> {
    const results = await this.db.select().from(learners).orderBy(asc(learners.createdAt));
    return results.map(mapToDomain);
  }

  async create(input: CreateLearnerInput): Promise<Learner> {
    const result = await this.db
      .insert(learners)
      .values({ id: input.id, name: input.name, createdAt: input.createdAt ?? new Date() })
      .returning();
    return mapToDomain(result[0]);
  }
}
