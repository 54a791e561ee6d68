/**
 * Prediction Module - Barrel Export
 *
 * Course completion forecasts, study plan success estimates and schedule
 * feasibility checks.
 */

export { ProgressPredictor, TREND_CONFIDENCE, completionProbabilityOf } from './progress-predictor';
export { assessPlanSuccess, historicalPerformance, planDifficulty } from './plan-success';
export { assessFeasibility, remainingWork, timeConstraints, HOURS_PER_TOPIC } from './feasibility';
export type {
  PredictionConfig,
  CompletionInput,
  CompletionPrediction,
  CompletionScenario,
  CompletionScenarios,
  CourseProgress,
  LearningVelocity,
  Milestone,
  PlanSuccessInput,
  PlanSuccessEstimate,
  HistoricalPerformance,
  PlanDifficulty,
  Level,
  Feasibility,
  FeasibilityInput,
  ScheduleFeasibility,
  RemainingWork,
  TimeConstraints,
  RecommendedSchedule,
} from './types';
