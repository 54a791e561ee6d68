/**
 * Repository Layer - Barrel Export
 *
 * Entity repositories over the Drizzle database, plus the composed
 * SqliteStudyRepository that implements the core StudyRepository interface.
 *
 * @example
 * ```typescript
 * import { SqliteStudyRepository } from '@/storage/repositories';
 *
 * const repository = new SqliteStudyRepository(db);
 * const plan = await repository.findPlan('plan-1');
 * ```
 */

export type { Repository } from './base';
export { LearnerRepository, type CreateLearnerInput } from './learner.repository';
export { CourseRepository, type CreateCourseInput } from './course.repository';
export { FlashcardRepository, type CreateFlashcardInput } from './flashcard.repository';
export { ActivityRepository } from './activity.repository';
export { ProgressRepository } from './progress.repository';
export { StudyPlanRepository, type PlanRevision } from './study-plan.repository';
export { SqliteStudyRepository } from './sqlite-study.repository';
