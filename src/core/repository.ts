/**
 * Repository Interfaces Consumed by the Core
 *
 * The core never talks to a database. It reads plain, already-filtered
 * collections through these interfaces and writes through conditional
 * (compare-and-swap) methods. The storage layer provides the SQLite
 * implementation; tests can provide in-memory fakes.
 */

import type {
  ActivityRecord,
  Course,
  Flashcard,
  LearningProgress,
  Learner,
  PlanStatus,
  QuizAttempt,
  ReviewEvent,
  ReviewState,
  SessionRecord,
  StudyPlan,
} from './models';

/**
 * Read access to a learner's raw history.
 *
 * `courseId: null` means all courses. Record fetches return records with a
 * timestamp at or after `since`, oldest first.
 */
export interface ActivityHistorySource {
  fetchQuizAttempts(learnerId: string, courseId: string | null, since: Date): Promise<QuizAttempt[]>;
  fetchStudySessions(learnerId: string, courseId: string | null, since: Date): Promise<SessionRecord[]>;
  fetchFlashcardReviews(learnerId: string, courseId: string | null, since: Date): Promise<ReviewEvent[]>;
  fetchLearningProgress(learnerId: string, courseId: string | null): Promise<LearningProgress[]>;
}

/** A review event before it is assigned an id. */
export type NewReviewEvent = Omit<ReviewEvent, 'id'>;

/** A raw activity record before it is assigned an id. */
export type NewActivityRecord =
  | Omit<QuizAttempt, 'id'>
  | Omit<SessionRecord, 'id'>
  | Omit<ReviewEvent, 'id'>;

/** A progress update before it is assigned an id. */
export type ProgressUpdate = Omit<LearningProgress, 'id'>;

/**
 * Everything the study engine needs from storage.
 */
export interface StudyRepository extends ActivityHistorySource {
  findLearner(learnerId: string): Promise<Learner | null>;
  findCourse(courseId: string): Promise<Course | null>;

  findFlashcard(cardId: string): Promise<Flashcard | null>;
  listFlashcards(learnerId: string, courseId: string | null): Promise<Flashcard[]>;
  /** Time of the learner's most recent flashcard review, if any. */
  findLastReviewAt(learnerId: string): Promise<Date | null>;

  /**
   * Writes a card's new review state and records the review, atomically.
   * Only applies when the stored card version equals `expectedVersion`.
   *
   * @returns false when the version did not match and nothing was written
   */
  saveReviewState(
    cardId: string,
    state: ReviewState,
    expectedVersion: number,
    review: NewReviewEvent
  ): Promise<boolean>;

  findPlan(planId: string): Promise<StudyPlan | null>;
  findActivePlan(learnerId: string, courseId: string): Promise<StudyPlan | null>;
  /** Status of every plan the learner has had, oldest first. */
  listPlanStatuses(learnerId: string): Promise<PlanStatus[]>;
  /**
   * Inserts a new active plan and pauses any other active plan the learner
   * has for the same course.
   */
  createPlan(plan: StudyPlan): Promise<StudyPlan>;
  /**
   * Replaces a plan when the stored version equals `expectedVersion`, storing
   * `plan.version` as `expectedVersion + 1`. When the revision advanced, the
   * superseded base schedule is archived in the same transaction.
   *
   * @returns false when the version did not match and nothing was written
   */
  saveStudyPlan(plan: StudyPlan, expectedVersion: number): Promise<boolean>;

  recordActivity(record: NewActivityRecord): Promise<ActivityRecord>;
  upsertProgress(update: ProgressUpdate): Promise<LearningProgress>;
}
