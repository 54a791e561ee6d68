/**
 * Metrics Module - Barrel Export
 *
 * Reduces raw learner history into PerformanceSnapshots, plus the shared
 * statistics helpers (mean, deviation, consistency, Pearson trend).
 */

export {
  MetricsAggregator,
  summarizeActivity,
  emptySnapshot,
  normalizeWindow,
  DEFAULT_WINDOW_DAYS,
  DEFAULT_PEAK_HOUR,
  MASTERY_THRESHOLD,
  type SnapshotScope,
} from './metrics-aggregator';
export {
  classifyTrend,
  consistencyScore,
  indexCorrelation,
  mean,
  sampleStdDev,
  populationStdDev,
  clamp,
  round,
  type TrendDirection,
} from './statistics';
export type {
  ActivityHistory,
  QuizMetrics,
  SessionLengthBucket,
  HourlyProductivity,
  SessionMetrics,
  FlashcardMetrics,
  ProgressMetrics,
  EngagementMetrics,
  PerformanceSnapshot,
} from './types';
