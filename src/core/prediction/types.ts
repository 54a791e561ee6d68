/**
 * Prediction Type Definitions
 */

import type { Course, LearningProgress, PlanStatus, Recommendation, StudyPlan } from '../models';
import type { PerformanceSnapshot } from '../metrics';
import type { TrendDirection } from '../metrics/statistics';
import type { ProductivityProfile } from '../scheduling';

export interface PredictionConfig {
  /** Upper bound on confidence when the learner has no progress history; below 0.3 */
  noHistoryConfidenceCap: number;
  /** Mastery level a topic must reach to count as done */
  defaultTargetMastery: number;
}

export interface CourseProgress {
  totalTopics: number;
  topicsStarted: number;
  topicsMastered: number;
  topicsRemaining: number;
  /** Mastered topics / total topics, 0-100, one decimal */
  completionPercentage: number;
  averageMastery: number;
}

export interface LearningVelocity {
  topicsPerWeek: number;
  trend: TrendDirection;
  consistencyScore: number;
}

export interface Milestone {
  /** 25, 50, 75 or 100 percent of the remaining topics */
  percentage: number;
  topicsToComplete: number;
  estimatedDate: string;
  weeksFromNow: number;
  confidence: number;
}

export interface CompletionScenario {
  weeks: number;
  probability: number;
}

export interface CompletionScenarios {
  optimistic: CompletionScenario;
  realistic: CompletionScenario;
  pessimistic: CompletionScenario;
}

export interface CompletionPrediction {
  learnerId: string;
  courseId: string;
  targetMasteryLevel: number;
  progress: CourseProgress;
  velocity: LearningVelocity;
  /** `Infinity` when the learner is not progressing */
  weeksRemaining: number;
  estimatedCompletionDate: string | null;
  /** 0-1 */
  completionProbability: number;
  /** 0-1 */
  confidence: number;
  milestones: Milestone[];
  scenarios: CompletionScenarios | null;
  recommendations: Recommendation[];
  /** False when the prediction rests on defaults only */
  hasHistory: boolean;
}

export interface CompletionInput {
  learnerId: string;
  course: Course;
  progress: readonly LearningProgress[];
  /** Snapshot series, oldest first; the newest supplies velocity and consistency */
  series: readonly PerformanceSnapshot[];
  targetMastery?: number;
  now: Date;
}

export type Level = 'low' | 'medium' | 'high' | 'very_high';

export type Feasibility = 'high' | 'medium' | 'low' | 'very_low';

export interface HistoricalPerformance {
  averageQuizScore: number;
  /** Share of quiz attempts scoring 75 or better, 0-1 */
  quizSuccessRate: number;
  /** Completed plans / all plans, 0-1 */
  planCompletionRate: number;
  consistencyScore: number;
  dataQuality: 'excellent' | 'good' | 'fair' | 'poor';
}

export interface PlanDifficulty {
  intensity: Level;
  durationDifficulty: Exclude<Level, 'very_high'>;
  weeklyHours: number;
  durationWeeks: number;
  overall: Level;
}

export interface PlanSuccessEstimate {
  planId: string;
  /** 0.1-0.95 */
  successProbability: number;
  history: HistoricalPerformance;
  difficulty: PlanDifficulty;
  positiveFactors: string[];
  negativeFactors: string[];
  optimizations: Recommendation[];
  confidence: number;
}

export interface PlanSuccessInput {
  plan: StudyPlan;
  quizScores: readonly number[];
  /** Statuses of every plan the learner has had, this one included */
  planStatuses: readonly PlanStatus[];
  consistencyScore: number;
}

export interface RemainingWork {
  totalTopics: number;
  notStartedTopics: number;
  inProgressTopics: number;
  masteredTopics: number;
  estimatedHoursRemaining: number;
}

export interface TimeConstraints {
  targetDate: string;
  daysAvailable: number;
  weeksAvailable: number;
  weeklyHoursAvailable: number;
  totalHoursAvailable: number;
}

export interface RecommendedSchedule {
  /** `prioritized` when the remaining work does not fit the time available */
  scheduleType: 'comprehensive' | 'prioritized';
  /** Hours available / hours needed, at most 1 */
  feasibilityRatio: number;
  recommendedWeeklyHours: number;
  recommendedDailyHours: number;
  /** `HH:00`, best first */
  optimalStudyTimes: string[];
  sessionLengthMinutes: number;
}

export interface ScheduleFeasibility {
  courseId: string;
  remainingWork: RemainingWork;
  constraints: TimeConstraints;
  schedule: RecommendedSchedule;
  overall: Feasibility;
  daily: Feasibility;
  successProbability: number;
  risks: string[];
  recommendations: string[];
}

export interface FeasibilityInput {
  course: Course;
  progress: readonly LearningProgress[];
  profile: ProductivityProfile;
  targetDate: Date;
  weeklyHours: number;
  now: Date;
}
