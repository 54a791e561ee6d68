/**
 * Study Engine Type Definitions
 *
 * Inputs and outputs of the StudyEngine facade, plus the dependencies it is
 * constructed with. Every component dependency is optional and defaults to
 * a fresh instance; only the repository is required.
 */

import type { StudyRepository } from '../repository';
import type { MetricsAggregator, PerformanceSnapshot } from '../metrics';
import type { AnalysisResult, ActivityFeedback, PerformanceAnalyzer } from '../analysis';
import type { Adaptation, Flashcard, PlanType, QuizAttempt, ReviewState, SessionRecord, StudyPlan } from '../models';
import type { PlanPreferences, StudyPlanGenerator } from '../scheduling';
import type { CompletionPrediction, ProgressPredictor } from '../prediction';
import type { ReviewQueue, SM2Scheduler } from '../sm2';

export interface StudyEngineConfig {
  /** Trailing window of every snapshot, in days */
  windowDays: number;
  /** Snapshots per analysis series, one week apart */
  trendPoints: number;
  /** How long a snapshot read may take before the cached series is used */
  snapshotTimeoutMs: number;
}

export interface StudyEngineDependencies {
  repository: StudyRepository;
  aggregator?: MetricsAggregator;
  analyzer?: PerformanceAnalyzer;
  generator?: StudyPlanGenerator;
  predictor?: ProgressPredictor;
  scheduler?: SM2Scheduler;
  reviewQueue?: ReviewQueue;
  /** Current time; injectable for deterministic tests */
  clock?: () => Date;
  /** Id factory for plans and overrides */
  generateId?: () => string;
}

/**
 * Where the snapshots behind a result came from: a fresh read, the last
 * series cached for the same learner, course and window after a timed-out
 * read, or the zero-history default when nothing was cached.
 */
export type SnapshotSource = 'fresh' | 'cached' | 'default';

export interface SeriesRead {
  series: PerformanceSnapshot[];
  source: SnapshotSource;
}

/** Activity a caller may report; flashcard reviews go through `reviewItem`. */
export type RecordableActivity = Omit<QuizAttempt, 'id'> | Omit<SessionRecord, 'id'>;

export interface GeneratePlanInput {
  learnerId: string;
  courseId: string;
  planType: PlanType;
  targetDate?: Date | null;
  preferences?: PlanPreferences;
}

export interface PlanAdaptationResult {
  plan: StudyPlan;
  adaptations: Adaptation[];
  feedback: ActivityFeedback[];
  source: SnapshotSource;
}

export interface OverrideResult {
  accepted: boolean;
  /** Why the override was rejected */
  reason: string | null;
  plan: StudyPlan;
}

export interface PerformanceReport {
  learnerId: string;
  courseId: string | null;
  windowDays: number;
  snapshot: PerformanceSnapshot;
  analysis: AnalysisResult;
  source: SnapshotSource;
}

export type PredictionReport = CompletionPrediction & { source: SnapshotSource };

export interface ReviewOutcome {
  card: Flashcard;
  previousState: ReviewState;
  quality: number;
}

export interface RecordedActivity {
  recordId: string;
  feedback: ActivityFeedback;
}
