/**
 * Database Schema Definitions for the Study Planner
 *
 * Drizzle ORM table definitions for SQLite. The matching DDL lives in
 * `schema.sql`, which `createDatabase()` applies on open.
 *
 * The schema holds:
 * - Learners and courses (course topics as a JSON array)
 * - Raw activity: quiz attempts, study session logs, flashcard reviews
 * - Topic mastery per learner and course
 * - Flashcards with flat SM-2 columns
 * - Study plans, with schedules, overrides and adaptation history as JSON,
 *   and the archive of superseded schedule revisions
 *
 * All timestamps are stored as milliseconds since epoch (integer). Plan
 * schedule dates are ISO calendar strings inside the JSON columns.
 */

import { sqliteTable, text, integer, real, index, uniqueIndex } from 'drizzle-orm/sqlite-core';
import type {
  AdaptationEntry,
  LoadSummary,
  PerformanceMark,
  PlanOverride,
  PlanParameters,
  Recommendation,
  StudySession,
} from '@/core/models';

const DIFFICULTIES = ['easy', 'medium', 'hard'] as const;

/**
 * Learners Table
 */
export const learners = sqliteTable('learners', {
  id: text('id').primaryKey(),
  name: text('name').notNull(),
  createdAt: integer('created_at', { mode: 'timestamp_ms' }).notNull(),
});

/**
 * Courses Table
 *
 * `topics` is the ordered list of topic identifiers that plans partition and
 * predictions count against.
 */
export const courses = sqliteTable('courses', {
  id: text('id').primaryKey(),
  title: text('title').notNull(),
  topics: text('topics', { mode: 'json' }).$type<string[]>().notNull(),
  createdAt: integer('created_at', { mode: 'timestamp_ms' }).notNull(),
});

/**
 * Quiz Attempts Table
 */
export const quizAttempts = sqliteTable(
  'quiz_attempts',
  {
    id: text('id').primaryKey(),
    learnerId: text('learner_id')
      .notNull()
      .references(() => learners.id),
    courseId: text('course_id')
      .notNull()
      .references(() => courses.id),
    // Percentage, 0-100
    score: real('score').notNull(),
    startedAt: integer('started_at', { mode: 'timestamp_ms' }).notNull(),
    difficulty: text('difficulty', { enum: DIFFICULTIES }).notNull().default('medium'),
  },
  (table) => [index('quiz_attempts_learner_started_idx').on(table.learnerId, table.startedAt)]
);

/**
 * Study Session Logs Table
 *
 * Planned versus actual times of sessions the learner reported. Unrelated to
 * the sessions inside a study plan's schedule.
 */
export const studySessionLogs = sqliteTable(
  'study_session_logs',
  {
    id: text('id').primaryKey(),
    learnerId: text('learner_id')
      .notNull()
      .references(() => learners.id),
    courseId: text('course_id')
      .notNull()
      .references(() => courses.id),
    scheduledStart: integer('scheduled_start', { mode: 'timestamp_ms' }).notNull(),
    scheduledEnd: integer('scheduled_end', { mode: 'timestamp_ms' }).notNull(),
    actualStart: integer('actual_start', { mode: 'timestamp_ms' }),
    actualEnd: integer('actual_end', { mode: 'timestamp_ms' }),
    status: text('status', {
      enum: ['scheduled', 'in_progress', 'completed', 'skipped', 'cancelled'],
    }).notNull(),
    // Self-reported, 1-5
    productivityRating: integer('productivity_rating'),
  },
  (table) => [index('study_session_logs_learner_start_idx').on(table.learnerId, table.scheduledStart)]
);

/**
 * Flashcards Table
 *
 * The nested ReviewState of the domain model is flattened into `sm2_*`
 * columns. `version` is the optimistic-concurrency token checked by every
 * review-state write.
 */
export const flashcards = sqliteTable(
  'flashcards',
  {
    id: text('id').primaryKey(),
    learnerId: text('learner_id')
      .notNull()
      .references(() => learners.id),
    courseId: text('course_id')
      .notNull()
      .references(() => courses.id),
    front: text('front').notNull(),
    back: text('back').notNull(),
    difficulty: text('difficulty', { enum: DIFFICULTIES }).notNull().default('medium'),
    starred: integer('starred', { mode: 'boolean' }).notNull().default(false),

    sm2EaseFactor: real('sm2_ease_factor').notNull().default(2.5),
    sm2IntervalDays: integer('sm2_interval_days').notNull().default(1),
    sm2RepetitionCount: integer('sm2_repetition_count').notNull().default(0),
    sm2NextDueAt: integer('sm2_next_due_at', { mode: 'timestamp_ms' }).notNull(),

    totalReviews: integer('total_reviews').notNull().default(0),
    successfulReviews: integer('successful_reviews').notNull().default(0),
    lastReviewedAt: integer('last_reviewed_at', { mode: 'timestamp_ms' }),
    version: integer('version').notNull().default(1),
    createdAt: integer('created_at', { mode: 'timestamp_ms' }).notNull(),
    updatedAt: integer('updated_at', { mode: 'timestamp_ms' }).notNull(),
  },
  (table) => [index('flashcards_learner_due_idx').on(table.learnerId, table.sm2NextDueAt)]
);

/**
 * Flashcard Reviews Table
 */
export const flashcardReviews = sqliteTable(
  'flashcard_reviews',
  {
    id: text('id').primaryKey(),
    learnerId: text('learner_id')
      .notNull()
      .references(() => learners.id),
    courseId: text('course_id')
      .notNull()
      .references(() => courses.id),
    cardId: text('card_id')
      .notNull()
      .references(() => flashcards.id),
    // SM-2 grade, 0-5
    quality: integer('quality').notNull(),
    responseTimeSeconds: real('response_time_seconds').notNull().default(0),
    createdAt: integer('created_at', { mode: 'timestamp_ms' }).notNull(),
  },
  (table) => [index('flashcard_reviews_learner_created_idx').on(table.learnerId, table.createdAt)]
);

/**
 * Learning Progress Table
 *
 * One row per learner, course and topic.
 */
export const learningProgress = sqliteTable(
  'learning_progress',
  {
    id: text('id').primaryKey(),
    learnerId: text('learner_id')
      .notNull()
      .references(() => learners.id),
    courseId: text('course_id')
      .notNull()
      .references(() => courses.id),
    identifier: text('identifier').notNull(),
    // 1 (new) to 5 (mastered)
    masteryLevel: integer('mastery_level').notNull(),
    completionPercentage: real('completion_percentage').notNull().default(0),
    updatedAt: integer('updated_at', { mode: 'timestamp_ms' }).notNull(),
  },
  (table) => [
    uniqueIndex('learning_progress_topic_idx').on(table.learnerId, table.courseId, table.identifier),
  ]
);

/**
 * Study Plans Table
 *
 * Schedules, overrides, history and performance marks are stored as JSON.
 * `revision` counts adaptations; `version` counts every write.
 */
export const studyPlans = sqliteTable(
  'study_plans',
  {
    id: text('id').primaryKey(),
    learnerId: text('learner_id')
      .notNull()
      .references(() => learners.id),
    courseId: text('course_id')
      .notNull()
      .references(() => courses.id),
    title: text('title').notNull(),
    planType: text('plan_type', { enum: ['weekly', 'monthly', 'exam_prep', 'custom'] }).notNull(),
    status: text('status', { enum: ['active', 'paused', 'completed', 'cancelled'] })
      .notNull()
      .default('active'),
    startDate: text('start_date').notNull(),
    endDate: text('end_date').notNull(),
    targetDate: text('target_date'),
    parameters: text('parameters', { mode: 'json' }).$type<PlanParameters>().notNull(),
    baseSchedule: text('base_schedule', { mode: 'json' }).$type<StudySession[]>().notNull(),
    schedule: text('schedule', { mode: 'json' }).$type<StudySession[]>().notNull(),
    overrides: text('overrides', { mode: 'json' }).$type<PlanOverride[]>().notNull(),
    adaptationHistory: text('adaptation_history', { mode: 'json' }).$type<AdaptationEntry[]>().notNull(),
    baseline: text('baseline', { mode: 'json' }).$type<PerformanceMark>().notNull(),
    lastMark: text('last_mark', { mode: 'json' }).$type<PerformanceMark>().notNull(),
    recommendations: text('recommendations', { mode: 'json' }).$type<Recommendation[]>().notNull(),
    loadSummary: text('load_summary', { mode: 'json' }).$type<LoadSummary>().notNull(),
    revision: integer('revision').notNull().default(1),
    version: integer('version').notNull().default(1),
    createdAt: integer('created_at', { mode: 'timestamp_ms' }).notNull(),
    updatedAt: integer('updated_at', { mode: 'timestamp_ms' }).notNull(),
  },
  (table) => [index('study_plans_learner_course_idx').on(table.learnerId, table.courseId, table.status)]
);

/**
 * Study Plan Revisions Table
 *
 * Base schedules superseded by an adaptation, one row per replaced revision.
 */
export const studyPlanRevisions = sqliteTable(
  'study_plan_revisions',
  {
    planId: text('plan_id')
      .notNull()
      .references(() => studyPlans.id),
    revision: integer('revision').notNull(),
    baseSchedule: text('base_schedule', { mode: 'json' }).$type<StudySession[]>().notNull(),
    archivedAt: integer('archived_at', { mode: 'timestamp_ms' }).notNull(),
  },
  (table) => [uniqueIndex('study_plan_revisions_plan_revision_idx').on(table.planId, table.revision)]
);

export type LearnerRow = typeof learners.$inferSelect;
export type CourseRow = typeof courses.$inferSelect;
export type QuizAttemptRow = typeof quizAttempts.$inferSelect;
export type StudySessionLogRow = typeof studySessionLogs.$inferSelect;
export type FlashcardRow = typeof flashcards.$inferSelect;
export type NewFlashcardRow = typeof flashcards.$inferInsert;
export type FlashcardReviewRow = typeof flashcardReviews.$inferSelect;
export type LearningProgressRow = typeof learningProgress.$inferSelect;
export type StudyPlanRow = typeof studyPlans.$inferSelect;
export type NewStudyPlanRow = typeof studyPlans.$inferInsert;
export type StudyPlanRevisionRow = typeof studyPlanRevisions.$inferSelect;
