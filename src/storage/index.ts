/**
 * Storage Module - Barrel Export
 *
 * Database factory, table definitions and repositories.
 *
 * Usage:
 *   import { createDatabase, SqliteStudyRepository } from '@/storage';
 *
 *   const db = createDatabase(config.database.path);
 *   const repository = new SqliteStudyRepository(db);
 */

export { createDatabase, applySchema, SCHEMA_PATH } from './db';
export type { AppDatabase } from './db';

export {
  learners,
  courses,
  quizAttempts,
  studySessionLogs,
  flashcards,
  flashcardReviews,
  learningProgress,
  studyPlans,
  studyPlanRevisions,
} from './schema';

export * from './repositories';
