import { describe, it, expect } from 'vitest';
import type { StudyPlan } from '../models';
import { assessPlanSuccess, planDifficulty } from './plan-success';
import { buildSnapshot, generatePlan } from '../../../tests/helpers';

const weeklyPlan = generatePlan(buildSnapshot());

const demandingPlan: StudyPlan = {
  ...weeklyPlan,
  parameters: { ...weeklyPlan.parameters, dailyHours: 4, studyDaysPerWeek: 6 },
  endDate: '2024-07-28',
};

describe('planDifficulty', () => {
  it('rates a light one-week plan as low', () => {
    expect(planDifficulty(weeklyPlan)).toEqual({
      intensity: 'low',
      durationDifficulty: 'low',
      weeklyHours: 10,
      durationWeeks: 0.7,
      overall: 'low',
    });
  });

  it('rates a long, intensive plan as high', () => {
    expect(planDifficulty(demandingPlan)).toEqual({
      intensity: 'very_high',
      durationDifficulty: 'high',
      weeklyHours: 24,
      durationWeeks: 21,
      overall: 'high',
    });
  });
});

describe('assessPlanSuccess', () => {
  it('combines history and plan difficulty', () => {
    const estimate = assessPlanSuccess({
      plan: weeklyPlan,
      quizScores: [80, 90, 70, 60],
      planStatuses: ['completed', 'active'],
      consistencyScore: 75,
    });

    expect(estimate.successProbability).toBe(0.61);
    expect(estimate.history).toEqual({
      averageQuizScore: 75,
      quizSuccessRate: 0.5,
      planCompletionRate: 0.5,
      consistencyScore: 75,
      dataQuality: 'fair',
    });
    expect(estimate.positiveFactors).toEqual(['Manageable plan difficulty']);
    expect(estimate.negativeFactors).toEqual(['Weak quiz performance history', 'Low plan completion rate']);
    expect(estimate.optimizations.map((o) => o.type)).toEqual(['difficulty_reduction', 'assessment_strategy']);
    expect(estimate.confidence).toBe(0.6);
  });

  it('discounts a demanding plan for a strong learner', () => {
    const estimate = assessPlanSuccess({
      plan: demandingPlan,
      quizScores: [90, 85, 80, 95, 100],
      planStatuses: ['completed', 'completed', 'completed', 'active'],
      consistencyScore: 90,
    });

    expect(estimate.successProbability).toBe(0.7);
    expect(estimate.positiveFactors).toEqual(['Strong quiz performance history', 'Consistent study habits']);
    expect(estimate.negativeFactors).toEqual(['Challenging plan difficulty']);
    expect(estimate.optimizations).toEqual([]);
    expect(estimate.confidence).toBe(0.8);
  });

  it('floors the probability for a learner without history', () => {
    const estimate = assessPlanSuccess({
      plan: weeklyPlan,
      quizScores: [],
      planStatuses: ['active'],
      consistencyScore: 0,
    });

    expect(estimate.successProbability).toBe(0.1);
    expect(estimate.history.dataQuality).toBe('poor');
    expect(estimate.confidence).toBe(0.4);
    expect(estimate.optimizations.map((o) => o.type)).toEqual([
      'difficulty_reduction',
      'consistency_improvement',
      'assessment_strategy',
    ]);
  });
});
