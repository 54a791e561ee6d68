/**
 * Study plan success estimate.
 *
 * A base probability from the learner's record (quiz success 40%, plan
 * completion 40%, consistency 20%) scaled by how demanding the plan is,
 * then bounded to [0.1, 0.95].
 */

import type { Recommendation, StudyPlan } from '../models';
import { clamp, mean, round } from '../metrics/statistics';
import { daysBetween, fromIsoDate } from '../utils/dates';
import type { HistoricalPerformance, Level, PlanDifficulty, PlanSuccessEstimate, PlanSuccessInput } from './types';

const PASSING_QUIZ_SCORE = 75;

const LEVEL_SCORES: Record<Level, number> = { low: 1, medium: 2, high: 3, very_high: 4 };

const DIFFICULTY_MULTIPLIERS: Record<Level, number> = { low: 1.1, medium: 1, high: 0.8, very_high: 0.6 };

const DATA_QUALITY_CONFIDENCE: Record<HistoricalPerformance['dataQuality'], number> = {
  excellent: 0.9,
  good: 0.8,
  fair: 0.6,
  poor: 0.4,
};

export function historicalPerformance(input: PlanSuccessInput): HistoricalPerformance {
  const { quizScores, planStatuses } = input;
  const passed = quizScores.filter((score) => score >= PASSING_QUIZ_SCORE).length;
  const completedPlans = planStatuses.filter((status) => status === 'completed').length;

  let dataQuality: HistoricalPerformance['dataQuality'] = 'poor';
  if (quizScores.length >= 10 && planStatuses.length >= 3) dataQuality = 'excellent';
  else if (quizScores.length >= 5) dataQuality = 'good';
  else if (quizScores.length > 0 || planStatuses.length > 1) dataQuality = 'fair';

  return {
    averageQuizScore: round(mean(quizScores), 1),
    quizSuccessRate: quizScores.length > 0 ? round(passed / quizScores.length) : 0,
    planCompletionRate: planStatuses.length > 0 ? round(completedPlans / planStatuses.length) : 0,
    consistencyScore: round(input.consistencyScore, 1),
    dataQuality,
  };
}

/**
 * Intensity from weekly hours (over 10/15/20), duration difficulty from the
 * plan's span in weeks (over 12/20), combined by their mean level.
 */
export function planDifficulty(plan: StudyPlan): PlanDifficulty {
  const weeklyHours = round(plan.parameters.dailyHours * plan.parameters.studyDaysPerWeek, 1);
  const durationWeeks = round((daysBetween(fromIsoDate(plan.startDate), fromIsoDate(plan.endDate)) + 1) / 7, 1);

  let intensity: Level = 'low';
  if (weeklyHours > 20) intensity = 'very_high';
  else if (weeklyHours > 15) intensity = 'high';
  else if (weeklyHours > 10) intensity = 'medium';

  let durationDifficulty: PlanDifficulty['durationDifficulty'] = 'low';
  if (durationWeeks > 20) durationDifficulty = 'high';
  else if (durationWeeks > 12) durationDifficulty = 'medium';

  const average = (LEVEL_SCORES[intensity] + LEVEL_SCORES[durationDifficulty]) / 2;
  let overall: Level = 'very_high';
  if (average <= 1.5) overall = 'low';
  else if (average <= 2.5) overall = 'medium';
  else if (average <= 3.5) overall = 'high';

  return { intensity, durationDifficulty, weeklyHours, durationWeeks, overall };
}

export function assessPlanSuccess(input: PlanSuccessInput): PlanSuccessEstimate {
  const history = historicalPerformance(input);
  const difficulty = planDifficulty(input.plan);

  const base =
    history.quizSuccessRate * 0.4 + history.planCompletionRate * 0.4 + (history.consistencyScore / 100) * 0.2;
  const successProbability = round(clamp(base * DIFFICULTY_MULTIPLIERS[difficulty.overall], 0.1, 0.95));

  const positiveFactors: string[] = [];
  const negativeFactors: string[] = [];

  if (history.quizSuccessRate > 0.8) positiveFactors.push('Strong quiz performance history');
  else if (history.quizSuccessRate < 0.6) negativeFactors.push('Weak quiz performance history');

  if (history.planCompletionRate > 0.8) positiveFactors.push('High plan completion rate');
  else if (history.planCompletionRate < 0.6) negativeFactors.push('Low plan completion rate');

  if (history.consistencyScore > 80) positiveFactors.push('Consistent study habits');
  else if (history.consistencyScore < 60) negativeFactors.push('Inconsistent study habits');

  if (difficulty.overall === 'low') positiveFactors.push('Manageable plan difficulty');
  else if (difficulty.overall === 'high' || difficulty.overall === 'very_high') {
    negativeFactors.push('Challenging plan difficulty');
  }

  return {
    planId: input.plan.id,
    successProbability,
    history,
    difficulty,
    positiveFactors,
    negativeFactors,
    optimizations: optimizations(successProbability, negativeFactors),
    confidence: DATA_QUALITY_CONFIDENCE[history.dataQuality],
  };
}

function optimizations(probability: number, negativeFactors: readonly string[]): Recommendation[] {
  const result: Recommendation[] = [];

  if (probability < 0.7) {
    result.push({
      type: 'difficulty_reduction',
      priority: 'high',
      title: 'Reduce Plan Difficulty',
      description: 'The current plan may be too demanding',
      actionItems: ['Reduce daily study hours by 25%', 'Extend the plan duration', 'Focus on fewer topics first'],
    });
  }

  if (negativeFactors.includes('Inconsistent study habits')) {
    result.push({
      type: 'consistency_improvement',
      priority: 'medium',
      title: 'Improve Study Consistency',
      description: 'Quiz results vary widely from one attempt to the next',
      actionItems: ['Set fixed study times', 'Start with shorter sessions'],
    });
  }

  if (negativeFactors.includes('Weak quiz performance history')) {
    result.push({
      type: 'assessment_strategy',
      priority: 'medium',
      title: 'Improve Assessment Performance',
      description: 'Fewer than 60% of quiz attempts scored 75 or more',
      actionItems: ['Practice before each quiz', 'Review mistakes after each attempt'],
    });
  }

  return result;
}
