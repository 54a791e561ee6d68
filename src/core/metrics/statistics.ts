/**
 * Statistics Helpers
 *
 * Small numeric reductions shared by the aggregator, analyzer and predictor.
 * Every function is total: empty input yields 0 (or `insufficient_data` for
 * trends) instead of NaN.
 */

export type TrendDirection = 'improving' | 'declining' | 'stable' | 'insufficient_data';

/** Minimum number of points before a trend is classified. */
export const MIN_TREND_POINTS = 3;

/** |r| above which a trend counts as improving or declining. */
export const TREND_THRESHOLD = 0.3;

export function sum(values: readonly number[]): number {
  return values.reduce((total, value) => total + value, 0);
}

export function mean(values: readonly number[]): number {
  return values.length === 0 ? 0 : sum(values) / values.length;
}

/** Sample standard deviation (n - 1). 0 for fewer than two values. */
export function sampleStdDev(values: readonly number[]): number {
  if (values.length < 2) return 0;
  const avg = mean(values);
  const squared = values.map((value) => (value - avg) ** 2);
  return Math.sqrt(sum(squared) / (values.length - 1));
}

/** Population standard deviation (n). 0 for an empty series. */
export function populationStdDev(values: readonly number[]): number {
  if (values.length === 0) return 0;
  const avg = mean(values);
  const squared = values.map((value) => (value - avg) ** 2);
  return Math.sqrt(sum(squared) / values.length);
}

export function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

export function round(value: number, decimals = 2): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}

/**
 * Consistency of a series: `100 - 100 * stdev / mean`, floored at 0.
 * Uses the sample standard deviation; fewer than two values or a zero mean
 * give 0.
 */
export function consistencyScore(values: readonly number[]): number {
  if (values.length < 2) return 0;
  const avg = mean(values);
  if (avg === 0) return 0;
  return Math.max(0, 100 - (100 * sampleStdDev(values)) / avg);
}

/**
 * Pearson correlation of `values` against their index (0, 1, 2, ...).
 * Returns null when either side has zero variance.
 */
export function indexCorrelation(values: readonly number[]): number | null {
  const n = values.length;
  if (n < 2) return null;

  const indexMean = (n - 1) / 2;
  const valueMean = mean(values);

  let covariance = 0;
  let indexVariance = 0;
  let valueVariance = 0;
  values.forEach((value, index) => {
    const dx = index - indexMean;
    const dy = value - valueMean;
    covariance += dx * dy;
    indexVariance += dx * dx;
    valueVariance += dy * dy;
  });

  const denominator = Math.sqrt(indexVariance * valueVariance);
  return denominator === 0 ? null : covariance / denominator;
}

/**
 * Classifies an ordered series.
 *
 * - fewer than 3 points: `insufficient_data`
 * - r > 0.3: `improving`
 * - r < -0.3: `declining`
 * - otherwise, including a constant series: `stable`
 */
export function classifyTrend(values: readonly number[]): TrendDirection {
  if (values.length < MIN_TREND_POINTS) return 'insufficient_data';
  const r = indexCorrelation(values);
  if (r === null) return 'stable';
  if (r > TREND_THRESHOLD) return 'improving';
  if (r < -TREND_THRESHOLD) return 'declining';
  return 'stable';
}
