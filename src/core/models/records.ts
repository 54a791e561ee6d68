/**
 * Raw Activity Record Types
 *
 * Historical records the analytics pipeline consumes. Each record kind is a
 * member of a discriminated union keyed on `kind`, so aggregation code can
 * switch over a mixed feed without guessing at shapes.
 *
 * - QuizAttempt: one scored quiz attempt
 * - SessionRecord: one logged study session (planned vs. actual times)
 * - ReviewEvent: one flashcard review with the SM-2 quality grade
 *
 * LearningProgress is state rather than activity: one row per (learner,
 * course, topic) holding the current mastery level.
 */

/** Difficulty label shared by quizzes, flashcards and study tasks. */
export type Difficulty = 'easy' | 'medium' | 'hard';

export interface QuizAttempt {
  kind: 'quiz';
  id: string;
  learnerId: string;
  courseId: string;
  /** Percentage score, 0-100 */
  score: number;
  startedAt: Date;
  difficulty: Difficulty;
}

/**
 * Lifecycle of a logged study session.
 *
 * Only `completed` counts towards the completion rate; `skipped` and
 * `cancelled` count against it.
 */
export type SessionLogStatus = 'scheduled' | 'in_progress' | 'completed' | 'skipped' | 'cancelled';

export interface SessionRecord {
  kind: 'session';
  id: string;
  learnerId: string;
  courseId: string;
  scheduledStart: Date;
  scheduledEnd: Date;
  /** When the learner actually started, or null if they never did */
  actualStart: Date | null;
  actualEnd: Date | null;
  status: SessionLogStatus;
  /** Self-reported productivity, 1-5, or null when not rated */
  productivityRating: number | null;
}

export interface ReviewEvent {
  kind: 'review';
  id: string;
  learnerId: string;
  courseId: string;
  cardId: string;
  /** SM-2 quality grade, 0-5. 3 and above is a successful recall. */
  quality: number;
  responseTimeSeconds: number;
  createdAt: Date;
}

/** Any raw activity record. */
export type ActivityRecord = QuizAttempt | SessionRecord | ReviewEvent;

/**
 * Current mastery of one topic of a course.
 */
export interface LearningProgress {
  id: string;
  learnerId: string;
  courseId: string;
  /** Topic identifier, matches an entry of Course.topics */
  identifier: string;
  /** Ordinal mastery, 1 (new) to 5 (mastered) */
  masteryLevel: number;
  /** 0-100 */
  completionPercentage: number;
  updatedAt: Date;
}
