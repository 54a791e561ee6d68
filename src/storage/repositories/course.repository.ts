/**
 * Course Repository Implementation
 *
 * Topics are stored as a JSON array in their course order.
 */

import { asc, eq } from 'drizzle-orm';
import type { AppDatabase } from '../db';
import { courses, type CourseRow } from '../schema';
import type { Course } from '@/core/models';
import type { Repository } from './base';

export interface CreateCourseInput {
  id: string;
  title: string;
  topics: string[];
  createdAt?: Date;
}

function mapToDomain(row: CourseRow): Course {
  return {
    id: row.id,
    title: row.title,
    topics: row.topics,
    createdAt: row.createdAt,
  };
}

export class CourseRepository implements Repository<Course, CreateCourseInput> {
  constructor(private readonly db: AppDatabase) {}

  async findById(id: string): Promise<Course | null> {
    const result = await this.db.select().from(courses).where(eq(courses.id, id)).limit(1);
    return result.length === 0 ? null : mapToDomain(result[0]);
  }

  async findAll(): Promise<Course[]> {
    const results = await this.db.select().from(courses).orderBy(asc(courses.title));
    return results.map(mapToDomain);
  }

  async create(input: CreateCourseInput): Promise<Course> {
    const result = await this.db
      .insert(courses)
      .values({
        id: input.id,
        title: input.title,
        topics: input.topics,
        createdAt: input.createdAt ?? new Date(),
      })
      .returning();
    return mapToDomain(result[0]);
  }
}
