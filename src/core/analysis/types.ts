/**
 * Performance Analysis Type Definitions
 *
 * Output of the PerformanceAnalyzer: a weighted overall score with its
 * category, per-signal trends, strengths and weaknesses, recommendations, the
 * performance trajectory and the triggers that call for plan adaptation.
 */

import type { Priority, Recommendation } from '../models';
import type { TrendDirection } from '../metrics/statistics';

/**
 * Weights of the overall score components. Expected to sum to 1.
 */
export interface PerformanceWeights {
  quiz: number;
  progress: number;
  flashcards: number;
  sessions: number;
  engagement: number;
}

export type ComponentName = keyof PerformanceWeights;

/** Component scores, each normalised to 0-100. */
export type ComponentScores = Record<ComponentName, number>;

export type PerformanceCategory = 'Excellent' | 'Good' | 'Average' | 'Needs Improvement' | 'Poor';

export interface PerformanceTrends {
  quizScores: TrendDirection;
  studyTime: TrendDirection;
  engagement: TrendDirection;
  retention: TrendDirection;
  completion: TrendDirection;
  overall: TrendDirection;
}

/** The values each trend was classified from, oldest first. */
export type TrendSeries = Record<keyof PerformanceTrends, number[]>;

export type RiskSeverity = 'high' | 'warning';

export interface RiskFactor {
  factor: 'quiz_performance' | 'engagement' | 'study_time';
  severity: RiskSeverity;
  description: string;
}

export type TrajectoryDirection = 'improving' | 'declining' | 'stable';

export type TrajectoryStrength = 'strong' | 'moderate' | 'concerning' | 'stable';

export interface Trajectory {
  direction: TrajectoryDirection;
  strength: TrajectoryStrength;
  /** 0-1, grows with data volume and trend clarity */
  confidence: number;
  risks: RiskFactor[];
  interventions: Recommendation[];
}

export type AdaptationTriggerType =
  | 'low_quiz_scores'
  | 'declining_performance'
  | 'low_completion_rate'
  | 'low_mastery';

export interface AdaptationTrigger {
  type: AdaptationTriggerType;
  severity: Priority;
  reason: string;
  suggestedAction: string;
}

export interface AnalysisResult {
  /** 0-100, one decimal */
  overallScore: number;
  category: PerformanceCategory;
  components: ComponentScores;
  /** Whether the newest snapshot holds any data for each component */
  availability: Record<ComponentName, boolean>;
  consistencyScore: number;
  trends: PerformanceTrends;
  series: TrendSeries;
  strengths: string[];
  weaknesses: string[];
  recommendations: Recommendation[];
  trajectory: Trajectory;
  adaptationTriggers: AdaptationTrigger[];
  /** Number of snapshots analyzed */
  dataPoints: number;
}

export type SessionDurationVerdict = 'too_short' | 'optimal' | 'acceptable' | 'too_long';

export type FeedbackSignal = 'positive' | 'neutral' | 'negative';

/** Immediate feedback on one newly recorded activity record. */
export type ActivityFeedback =
  | { kind: 'quiz'; recordId: string; signal: FeedbackSignal; message: string; score: number; recentAverage: number }
  | {
      kind: 'session';
      recordId: string;
      signal: FeedbackSignal;
      message: string;
      durationMinutes: number;
      verdict: SessionDurationVerdict;
    }
  | { kind: 'review'; recordId: string; signal: FeedbackSignal; message: string; quality: number };
