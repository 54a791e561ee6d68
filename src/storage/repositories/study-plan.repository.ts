/**
 * StudyPlan Repository Implementation
 *
 * Plans are stored as one row with JSON columns for the schedules,
 * overrides, adaptation history and performance marks. Writes are
 * conditional on the stored `version`; a save whose revision advanced also
 * archives the superseded base schedule in `study_plan_revisions`.
 */

import { and, asc, desc, eq, ne } from 'drizzle-orm';
import type { AppDatabase } from '../db';
import { studyPlanRevisions, studyPlans, type StudyPlanRow } from '../schema';
import type { PlanStatus, StudyPlan, StudySession } from '@/core/models';
import type { Repository } from './base';

/** A superseded base schedule. */
export interface PlanRevision {
  planId: string;
  revision: number;
  baseSchedule: StudySession[];
  archivedAt: Date;
}

function mapToDomain(row: StudyPlanRow): StudyPlan {
  return {
    id: row.id,
    learnerId: row.learnerId,
    courseId: row.courseId,
    title: row.title,
    planType: row.planType,
    status: row.status,
    startDate: row.startDate,
    endDate: row.endDate,
    targetDate: row.targetDate,
    parameters: row.parameters,
    baseSchedule: row.baseSchedule,
    schedule: row.schedule,
    overrides: row.overrides,
    adaptationHistory: row.adaptationHistory,
    baseline: row.baseline,
    lastMark: row.lastMark,
    recommendations: row.recommendations,
    loadSummary: row.loadSummary,
    revision: row.revision,
    version: row.version,
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
  };
}

/** Columns written by both inserts and conditional updates. */
function toColumns(plan: StudyPlan) {
  return {
    title: plan.title,
    planType: plan.planType,
    status: plan.status,
    startDate: plan.startDate,
    endDate: plan.endDate,
    targetDate: plan.targetDate,
    parameters: plan.parameters,
    baseSchedule: plan.baseSchedule,
    schedule: plan.schedule,
    overrides: plan.overrides,
    adaptationHistory: plan.adaptationHistory,
    baseline: plan.baseline,
    lastMark: plan.lastMark,
    recommendations: plan.recommendations,
    loadSummary: plan.loadSummary,
    revision: plan.revision,
    updatedAt: plan.updatedAt,
  };
}

export class StudyPlanRepository implements Repository<StudyPlan, StudyPlan> {
  constructor(private readonly db: AppDatabase) {}

  async findById(id: string): Promise<StudyPlan | null> {
    const result = await this.db.select().from(studyPlans).where(eq(studyPlans.id, id)).limit(1);
    return result.length === 0 ? null : mapToDomain(result[0]);
  }

  async findActive(learnerId: string, courseId: string): Promise<StudyPlan | null> {
    const result = await this.db
      .select()
      .from(studyPlans)
      .where(
        and(eq(studyPlans.learnerId, learnerId), eq(studyPlans.courseId, courseId), eq(studyPlans.status, 'active'))
      )
      .orderBy(desc(studyPlans.createdAt))
      .limit(1);
    return result.length === 0 ? null : mapToDomain(result[0]);
  }

  /**
   * Status of every plan of the learner, oldest first.
   */
  async listStatuses(learnerId: string): Promise<PlanStatus[]> {
    const results = await this.db
      .select({ status: studyPlans.status })
      .from(studyPlans)
      .where(eq(studyPlans.learnerId, learnerId))
      .orderBy(asc(studyPlans.createdAt));
    return results.map((row) => row.status);
  }

  /**
   * Inserts an active plan and pauses any other active plan the learner has
   * for the same course, in one transaction.
   */
  async create(plan: StudyPlan): Promise<StudyPlan> {
    return this.db.transaction((tx) => {
      const previous = tx
        .select({ id: studyPlans.id, version: studyPlans.version })
        .from(studyPlans)
        .where(
          and(
            eq(studyPlans.learnerId, plan.learnerId),
            eq(studyPlans.courseId, plan.courseId),
            eq(studyPlans.status, 'active'),
            ne(studyPlans.id, plan.id)
          )
        )
        .all();

      for (const row of previous) {
        tx.update(studyPlans)
          .set({ status: 'paused', version: row.version + 1, updatedAt: plan.createdAt })
          .where(eq(studyPlans.id, row.id))
          .run();
      }
      if (previous.length > 0) {
        console.log(`[StudyPlans] Paused ${previous.length} earlier plan(s) for ${plan.learnerId}/${plan.courseId}`);
      }

      const inserted = tx
        .insert(studyPlans)
        .values({
          ...toColumns(plan),
          id: plan.id,
          learnerId: plan.learnerId,
          courseId: plan.courseId,
          version: plan.version,
          createdAt: plan.createdAt,
        })
        .returning()
        .get();
      return mapToDomain(inserted);
    });
  }

  /**
   * Replaces the plan when the stored version equals `expectedVersion`.
   *
   * @returns false when the version did not match and nothing was written
   */
  async save(plan: StudyPlan, expectedVersion: number): Promise<boolean> {
    return this.db.transaction((tx) => {
      const stored = tx
        .select({ revision: studyPlans.revision, baseSchedule: studyPlans.baseSchedule })
        .from(studyPlans)
        .where(and(eq(studyPlans.id, plan.id), eq(studyPlans.version, expectedVersion)))
        .get();
      if (!stored) return false;

      if (plan.revision > stored.revision) {
        tx.insert(studyPlanRevisions)
          .values({
            planId: plan.id,
            revision: stored.revision,
            baseSchedule: stored.baseSchedule,
            archivedAt: plan.updatedAt,
          })
          .run();
      }

      tx.update(studyPlans)
        .set({ ...toColumns(plan), version: expectedVersion + 1 })
        .where(and(eq(studyPlans.id, plan.id), eq(studyPlans.version, expectedVersion)))
        .run();
      return true;
    });
  }

  /**
   * Archived base schedules of a plan, oldest revision first.
   */
  async findRevisions(planId: string): Promise<PlanRevision[]> {
    return this.db
      .select()
      .from(studyPlanRevisions)
      .where(eq(studyPlanRevisions.planId, planId))
      .orderBy(asc(studyPlanRevisions.revision));
  }
}
