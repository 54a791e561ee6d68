/**
 * Analysis Module - Barrel Export
 *
 * Performance analysis over snapshot series: overall score and category,
 * trends, strengths and weaknesses, recommendations, trajectory and
 * adaptation triggers, plus feedback on individual activity records.
 *
 * @example
 * ```typescript
 * import { PerformanceAnalyzer } from '@/core/analysis';
 *
 * const analyzer = new PerformanceAnalyzer({ weights: config.analysis.weights });
 * const result = analyzer.analyze(series);
 * console.log(`${result.overallScore} (${result.category})`);
 * ```
 */

export {
  PerformanceAnalyzer,
  categorize,
  type PerformanceAnalyzerConfig,
  type ScoredSnapshot,
} from './performance-analyzer';
export { evaluateActivity, evaluateSessionDuration } from './activity-feedback';
export type {
  PerformanceWeights,
  ComponentName,
  ComponentScores,
  PerformanceCategory,
  PerformanceTrends,
  TrendSeries,
  RiskSeverity,
  RiskFactor,
  TrajectoryDirection,
  TrajectoryStrength,
  Trajectory,
  AdaptationTriggerType,
  AdaptationTrigger,
  AnalysisResult,
  SessionDurationVerdict,
  FeedbackSignal,
  ActivityFeedback,
} from './types';
