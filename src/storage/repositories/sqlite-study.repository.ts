/**
 * SQLite-backed StudyRepository
 *
 * Composes the entity repositories into the single storage interface the
 * StudyEngine consumes. Ids for new records are UUIDs with a short prefix.
 *
 * @example
 * ```typescript
 * const db = createDatabase(config.database.path);
 * const engine = new StudyEngine({ repository: new SqliteStudyRepository(db) });
 * ```
 */

import { randomUUID } from 'node:crypto';
import type { AppDatabase } from '../db';
import type {
  NewActivityRecord,
  NewReviewEvent,
  ProgressUpdate,
  StudyRepository,
} from '@/core/repository';
import type {
  ActivityRecord,
  Course,
  Flashcard,
  Learner,
  LearningProgress,
  PlanStatus,
  QuizAttempt,
  ReviewEvent,
  ReviewState,
  SessionRecord,
  StudyPlan,
} from '@/core/models';
import { LearnerRepository } from './learner.repository';
import { CourseRepository } from './course.repository';
import { FlashcardRepository } from './flashcard.repository';
import { ActivityRepository } from './activity.repository';
import { ProgressRepository } from './progress.repository';
import { StudyPlanRepository } from './study-plan.repository';

const RECORD_PREFIXES: Record<ActivityRecord['kind'], string> = {
  quiz: 'qa',
  session: 'sl',
  review: 'rv',
};

function generateId(prefix: string): string {
  return `${prefix}_${randomUUID()}`;
}

export class SqliteStudyRepository implements StudyRepository {
  readonly learners: LearnerRepository;
  readonly courses: CourseRepository;
  readonly flashcards: FlashcardRepository;
  readonly activity: ActivityRepository;
  readonly progress: ProgressRepository;
  readonly plans: StudyPlanRepository;

  constructor(db: AppDatabase) {
    this.learners = new LearnerRepository(db);
    this.courses = new CourseRepository(db);
    this.flashcards = new FlashcardRepository(db);
    this.activity = new ActivityRepository(db);
    this.progress = new ProgressRepository(db);
    this.plans = new StudyPlanRepository(db);
  }

  findLearner(learnerId: string): Promise<Learner | null> {
    return this.learners.findById(learnerId);
  }

  findCourse(courseId: string): Promise<Course | null> {
    return this.courses.findById(courseId);
  }

  findFlashcard(cardId: string): Promise<Flashcard | null> {
    return this.flashcards.findById(cardId);
  }

  listFlashcards(learnerId: string, courseId: string | null): Promise<Flashcard[]> {
    return this.flashcards.findByLearner(learnerId, courseId);
  }

  findLastReviewAt(learnerId: string): Promise<Date | null> {
    return this.activity.findLastReviewAt(learnerId);
  }

  saveReviewState(
    cardId: string,
    state: ReviewState,
    expectedVersion: number,
    review: NewReviewEvent
  ): Promise<boolean> {
    return this.flashcards.saveReviewState(cardId, state, expectedVersion, generateId(RECORD_PREFIXES.review), review);
  }

  findPlan(planId: string): Promise<StudyPlan | null> {
    return this.plans.findById(planId);
  }

  findActivePlan(learnerId: string, courseId: string): Promise<StudyPlan | null> {
    return this.plans.findActive(learnerId, courseId);
  }

  listPlanStatuses(learnerId: string): Promise<PlanStatus[]> {
    return this.plans.listStatuses(learnerId);
  }

  createPlan(plan: StudyPlan): Promise<StudyPlan> {
    return this.plans.create(plan);
  }

  saveStudyPlan(plan: StudyPlan, expectedVersion: number): Promise<boolean> {
    return this.plans.save(plan, expectedVersion);
  }

  recordActivity(record: NewActivityRecord): Promise<ActivityRecord> {
    return this.activity.record(generateId(RECORD_PREFIXES[record.kind]), record);
  }

  upsertProgress(update: ProgressUpdate): Promise<LearningProgress> {
    return this.progress.upsert(generateId('lp'), update);
  }

  fetchQuizAttempts(learnerId: string, courseId: string | null, since: Date): Promise<QuizAttempt[]> {
    return this.activity.findQuizAttempts(learnerId, courseId, since);
  }

  fetchStudySessions(learnerId: string, courseId: string | null, since: Date): Promise<SessionRecord[]> {
    return this.activity.findStudySessions(learnerId, courseId, since);
  }

  fetchFlashcardReviews(learnerId: string, courseId: string | null, since: Date): Promise<ReviewEvent[]> {
    return this.activity.findFlashcardReviews(learnerId, courseId, since);
  }

  fetchLearningProgress(learnerId: string, courseId: string | null): Promise<LearningProgress[]> {
    return this.progress.findByLearner(learnerId, courseId);
  }
}
