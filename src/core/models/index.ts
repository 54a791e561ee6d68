/**
 * Core Domain Models - Barrel Export
 *
 * These types form the contract between the core, storage and API layers and
 * have no runtime dependencies.
 *
 * @example
 * ```typescript
 * import type { StudyPlan, ReviewState, QuizAttempt } from '@/core/models';
 * ```
 */

// Raw activity records and topic progress
export type {
  Difficulty,
  QuizAttempt,
  SessionLogStatus,
  SessionRecord,
  ReviewEvent,
  ActivityRecord,
  LearningProgress,
} from './records';

export type { Learner, Course } from './learner';

// Flashcards with SM-2 scheduling state
export type { ReviewState, Flashcard } from './flashcard';

export type { Priority, Recommendation } from './recommendation';

// Study plans, sessions, overrides and adaptation history
export type {
  PlanType,
  PlanStatus,
  TaskType,
  StudyTask,
  SessionContent,
  StudySessionStatus,
  StudySessionType,
  StudySession,
  LearningProfile,
  DifficultyAdaptation,
  PlanParameters,
  PerformanceMark,
  AdaptationType,
  Adaptation,
  AdaptationEntry,
  OverrideType,
  ScheduleOverrideData,
  DifficultyOverrideData,
  ReviewFrequencyOverrideData,
  PlanOverride,
  OverrideRequest,
  DailyLoad,
  LoadSummary,
  StudyPlan,
} from './study-plan';
