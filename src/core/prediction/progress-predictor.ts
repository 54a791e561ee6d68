/**
 * Progress Predictor
 *
 * Forecasts when a learner will finish a course from the number of topics
 * still below the target mastery level and the learner's current learning
 * velocity (topics mastered per week). Also estimates the chance that a
 * study plan succeeds and whether a target date is reachable with a given
 * weekly time budget; see ./plan-success and ./feasibility.
 *
 * A learner with no progress records gets a prediction built from defaults
 * whose confidence is capped at `noHistoryConfidenceCap`.
 */

import type { Recommendation } from '../models';
import { classifyTrend, clamp, mean, round, type TrendDirection } from '../metrics/statistics';
import { addDays, startOfUtcDay, toIsoDate } from '../utils/dates';
import { assessFeasibility } from './feasibility';
import { assessPlanSuccess } from './plan-success';
import type {
  CompletionInput,
  CompletionPrediction,
  CompletionScenarios,
  CourseProgress,
  FeasibilityInput,
  LearningVelocity,
  Milestone,
  PlanSuccessEstimate,
  PlanSuccessInput,
  PredictionConfig,
  ScheduleFeasibility,
} from './types';

const DEFAULT_CONFIG: PredictionConfig = {
  noHistoryConfidenceCap: 0.25,
  defaultTargetMastery: 4,
};

const WEEKS_PER_YEAR = 52;
const MIN_TIME_FACTOR = 0.3;
const FULL_DATA_TOPICS = 10;
const MILESTONE_FRACTIONS = [0.25, 0.5, 0.75, 1] as const;

export const TREND_CONFIDENCE: Record<TrendDirection, number> = {
  improving: 0.8,
  stable: 0.9,
  declining: 0.6,
  insufficient_data: 0.3,
};

export class ProgressPredictor {
  private config: PredictionConfig;

  constructor(config?: Partial<PredictionConfig>) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  predictCompletion(input: CompletionInput): CompletionPrediction {
    const targetMasteryLevel = clamp(Math.round(input.targetMastery ?? this.config.defaultTargetMastery), 1, 5);
    const progress = courseProgress(input, targetMasteryLevel);
    const velocity = learningVelocity(input);
    const topicsPerWeek = velocity.topicsPerWeek;
    const hasHistory = input.progress.length > 0;

    // Without velocity no date can be projected, finished course or not
    const weeksRemaining = topicsPerWeek > 0 ? progress.topicsRemaining / topicsPerWeek : Infinity;

    const reachable = Number.isFinite(weeksRemaining);
    const completionProbability = reachable ? completionProbabilityOf(weeksRemaining, velocity.consistencyScore) : 0;

    let confidence = round(
      mean([
        Math.min(1, progress.topicsStarted / FULL_DATA_TOPICS),
        velocity.consistencyScore / 100,
        TREND_CONFIDENCE[velocity.trend],
      ])
    );
    if (!hasHistory) confidence = Math.min(confidence, this.config.noHistoryConfidenceCap);

    const progressing = progress.topicsRemaining > 0 && topicsPerWeek > 0;

    return {
      learnerId: input.learnerId,
      courseId: input.course.id,
      targetMasteryLevel,
      progress,
      velocity,
      weeksRemaining: reachable ? round(weeksRemaining, 1) : Infinity,
      estimatedCompletionDate: reachable ? dateAfterWeeks(input.now, weeksRemaining) : null,
      completionProbability,
      confidence,
      milestones: progressing ? milestones(progress.topicsRemaining, topicsPerWeek, input.now) : [],
      scenarios: progressing ? scenarios(progress.topicsRemaining, topicsPerWeek) : null,
      recommendations: completionRecommendations(weeksRemaining, velocity.trend, completionProbability),
      hasHistory,
    };
  }

  assessPlanSuccess(input: PlanSuccessInput): PlanSuccessEstimate {
    return assessPlanSuccess(input);
  }

  assessFeasibility(input: FeasibilityInput): ScheduleFeasibility {
    return assessFeasibility(input);
  }
}

function courseProgress(input: CompletionInput, target: number): CourseProgress {
  const totalTopics = input.course.topics.length;
  const topicsMastered = input.progress.filter((row) => row.masteryLevel >= target).length;

  return {
    totalTopics,
    topicsStarted: input.progress.length,
    topicsMastered,
    topicsRemaining: Math.max(0, totalTopics - topicsMastered),
    completionPercentage: totalTopics > 0 ? round(Math.min(100, (topicsMastered / totalTopics) * 100), 1) : 0,
    averageMastery: round(mean(input.progress.map((row) => row.masteryLevel)), 1),
  };
}

/**
 * Velocity and consistency from the newest snapshot; the velocity trend
 * across the snapshots that carry progress data.
 */
function learningVelocity(input: CompletionInput): LearningVelocity {
  const latest = input.series.length > 0 ? input.series[input.series.length - 1] : null;
  const withProgress = input.series.filter((snapshot) => snapshot.progress.topicsTracked > 0);

  return {
    topicsPerWeek: round(latest?.learningVelocity ?? 0),
    trend: classifyTrend(withProgress.map((snapshot) => snapshot.learningVelocity)),
    consistencyScore: round(latest?.consistencyScore ?? 0, 1),
  };
}

/** Time factor (1 now, 0.3 at a year or more) blended 50/50 with consistency. */
export function completionProbabilityOf(weeks: number, consistency: number): number {
  const timeFactor = Math.max(MIN_TIME_FACTOR, 1 - weeks / WEEKS_PER_YEAR);
  return round((timeFactor + consistency / 100) / 2);
}

function dateAfterWeeks(now: Date, weeks: number): string {
  return toIsoDate(addDays(startOfUtcDay(now), Math.floor(weeks * 7)));
}

function milestones(topicsRemaining: number, velocity: number, now: Date): Milestone[] {
  return MILESTONE_FRACTIONS.map((fraction) => {
    const topicsToComplete = Math.floor(topicsRemaining * fraction);
    const weeks = topicsToComplete / velocity;
    return {
      percentage: fraction * 100,
      topicsToComplete,
      estimatedDate: dateAfterWeeks(now, weeks),
      weeksFromNow: round(weeks, 1),
      confidence: round(Math.max(0.1, 0.9 - weeks / WEEKS_PER_YEAR)),
    };
  });
}

function scenarios(topicsRemaining: number, velocity: number): CompletionScenarios {
  const weeksAt = (factor: number) => round(Math.max(1, topicsRemaining / (velocity * factor)), 1);
  return {
    optimistic: { weeks: weeksAt(1.2), probability: 0.3 },
    realistic: { weeks: weeksAt(1), probability: 0.5 },
    pessimistic: { weeks: weeksAt(0.8), probability: 0.2 },
  };
}

function completionRecommendations(
  weeksRemaining: number,
  trend: TrendDirection,
  probability: number
): Recommendation[] {
  const recommendations: Recommendation[] = [];

  if (weeksRemaining > 26) {
    recommendations.push({
      type: 'increase_intensity',
      priority: 'medium',
      title: 'Increase Study Intensity',
      description: Number.isFinite(weeksRemaining)
        ? `At the current pace the course takes another ${round(weeksRemaining, 1)} weeks`
        : 'No topics reached mastery in the analysis window',
      actionItems: ['Add one study session per week', 'Focus on the topics closest to mastery'],
    });
  }

  if (trend === 'declining') {
    recommendations.push({
      type: 'pace_declining',
      priority: 'high',
      title: 'Learning Pace Is Slowing',
      description: 'Topics are reaching mastery more slowly than in earlier weeks',
      actionItems: ['Review how you study the current topics', 'Use active recall for difficult material'],
    });
  } else if (trend === 'improving') {
    recommendations.push({
      type: 'ahead_of_schedule',
      priority: 'low',
      title: 'Pace Is Improving',
      description: 'You may finish ahead of the current estimate',
      actionItems: ['Keep the current routine'],
    });
  }

  if (probability < 0.7) {
    recommendations.push({
      type: 'adjust_plan',
      priority: 'medium',
      title: 'Adjust Your Study Plan',
      description: `Completion probability is ${Math.round(probability * 100)}%`,
      actionItems: ['Generate a plan with a target date', 'Raise daily study hours gradually'],
    });
  }

  return recommendations;
}
