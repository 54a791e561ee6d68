/**
 * Rule tables for the PerformanceAnalyzer.
 *
 * Each rule is a threshold over one component. Rules for a component only
 * fire when the learner has data for it: a learner who never took a quiz has
 * no quiz weakness, just no quiz signal yet.
 */

import type { Recommendation } from '../models';
import type { PerformanceSnapshot } from '../metrics/types';
import type {
  AdaptationTrigger,
  ComponentName,
  ComponentScores,
  PerformanceTrends,
  RiskFactor,
  Trajectory,
  TrajectoryDirection,
  TrajectoryStrength,
} from './types';

type Availability = Record<ComponentName, boolean>;

// =============================================================================
// Strengths and weaknesses
// =============================================================================

interface ThresholdRule {
  component: ComponentName;
  value: (components: ComponentScores, snapshot: PerformanceSnapshot) => number;
  strongAt: number;
  weakBelow: number;
  strength: string;
  weakness: string;
}

const STRENGTH_RULES: ThresholdRule[] = [
  {
    component: 'quiz',
    value: (components) => components.quiz,
    strongAt: 80,
    weakBelow: 60,
    strength: 'Strong quiz performance',
    weakness: 'Needs improvement in quiz performance',
  },
  {
    component: 'sessions',
    value: (components) => components.sessions,
    strongAt: 80,
    weakBelow: 60,
    strength: 'Consistent study habits',
    weakness: 'Inconsistent study completion',
  },
  {
    component: 'flashcards',
    value: (components) => components.flashcards,
    strongAt: 80,
    weakBelow: 60,
    strength: 'Excellent memory retention',
    weakness: 'Memory retention needs work',
  },
  {
    component: 'progress',
    value: (_components, snapshot) => snapshot.progress.averageMastery,
    strongAt: 4,
    weakBelow: 2.5,
    strength: 'Fast learning progression',
    weakness: 'Slow learning progression',
  },
];

export function strengthsAndWeaknesses(
  components: ComponentScores,
  availability: Availability,
  snapshot: PerformanceSnapshot
): { strengths: string[]; weaknesses: string[] } {
  const strengths: string[] = [];
  const weaknesses: string[] = [];

  for (const rule of STRENGTH_RULES) {
    if (!availability[rule.component]) continue;
    const value = rule.value(components, snapshot);
    if (value >= rule.strongAt) {
      strengths.push(rule.strength);
    } else if (value < rule.weakBelow) {
      weaknesses.push(rule.weakness);
    }
  }

  return { strengths, weaknesses };
}

// =============================================================================
// Recommendations
// =============================================================================

export function performanceRecommendations(
  overallScore: number,
  components: ComponentScores,
  availability: Availability,
  snapshot: PerformanceSnapshot
): Recommendation[] {
  const recommendations: Recommendation[] = [];
  const hasAnyData = Object.values(availability).some(Boolean);

  if (hasAnyData && overallScore < 60) {
    recommendations.push({
      type: 'study_strategy',
      priority: 'high',
      title: 'Adjust Study Strategy',
      description: 'Your overall performance suggests trying a different study approach.',
      actionItems: [
        'Shorten study sessions and study more often each day',
        'Add review sessions for difficult topics',
        'Focus on fundamentals before moving on',
      ],
    });
  } else if (hasAnyData && overallScore > 85) {
    recommendations.push({
      type: 'challenge',
      priority: 'medium',
      title: 'Increase Challenge Level',
      description: 'You are performing well. Harder material will keep you progressing.',
      actionItems: [
        'Take on more advanced topics',
        'Increase quiz difficulty',
        'Help other learners with concepts you have mastered',
      ],
    });
  }

  if (availability.quiz && components.quiz < 70) {
    recommendations.push({
      type: 'quiz_improvement',
      priority: 'high',
      title: 'Improve Quiz Performance',
      description: `Your average quiz score is ${components.quiz.toFixed(1)}%.`,
      actionItems: [
        'Review material before taking quizzes',
        'Practice with flashcards on weak topics',
        'Retake quizzes on topics you scored low on',
      ],
    });
  }

  if (snapshot.quiz.attemptCount >= 2 && snapshot.consistencyScore < 70) {
    recommendations.push({
      type: 'consistency',
      priority: 'medium',
      title: 'Improve Consistency',
      description: 'Your quiz scores vary a lot from attempt to attempt.',
      actionItems: [
        'Study at the same time every day',
        'Keep session lengths steady',
        'Review regularly instead of cramming',
      ],
    });
  }

  if (availability.sessions && components.sessions < 70) {
    recommendations.push({
      type: 'session_completion',
      priority: 'high',
      title: 'Improve Session Completion',
      description: `You complete ${components.sessions.toFixed(1)}% of your study sessions.`,
      actionItems: [
        'Schedule shorter sessions',
        'Remove distractions before starting',
        'Set a specific goal for each session',
      ],
    });
  }

  if (availability.flashcards && components.flashcards < 70) {
    recommendations.push({
      type: 'memory_improvement',
      priority: 'medium',
      title: 'Enhance Memory Retention',
      description: `You recall ${components.flashcards.toFixed(1)}% of reviewed cards.`,
      actionItems: [
        'Review flashcards daily',
        'Use active recall instead of rereading',
        'Connect new material to what you already know',
      ],
    });
  }

  return recommendations;
}

// =============================================================================
// Trajectory
// =============================================================================

export function trajectoryOf(trends: PerformanceTrends, dataPoints: number): Trajectory {
  const watched = [trends.quizScores, trends.studyTime, trends.engagement];
  const improving = watched.filter((trend) => trend === 'improving').length;
  const declining = watched.filter((trend) => trend === 'declining').length;

  let direction: TrajectoryDirection = 'stable';
  if (improving > declining) direction = 'improving';
  else if (declining > improving) direction = 'declining';

  let strength: TrajectoryStrength = 'stable';
  if (direction === 'improving') strength = improving >= 2 ? 'strong' : 'moderate';
  else if (direction === 'declining') strength = 'concerning';

  const clearTrends = improving + declining;
  const confidence = (Math.min(dataPoints / 12, 1) + clearTrends / watched.length) / 2;

  const risks: RiskFactor[] = [];
  if (trends.quizScores === 'declining') {
    risks.push({ factor: 'quiz_performance', severity: 'high', description: 'Quiz performance declining' });
  }
  if (trends.engagement === 'declining') {
    risks.push({ factor: 'engagement', severity: 'warning', description: 'Engagement levels dropping' });
  }
  if (trends.studyTime === 'declining') {
    risks.push({ factor: 'study_time', severity: 'warning', description: 'Study time decreasing' });
  }

  return {
    direction,
    strength,
    confidence: Math.round(confidence * 100) / 100,
    risks,
    interventions: interventionsFor(direction, risks),
  };
}

function interventionsFor(direction: TrajectoryDirection, risks: RiskFactor[]): Recommendation[] {
  const interventions: Recommendation[] = [];

  if (direction === 'declining') {
    interventions.push({
      type: 'schedule_review',
      priority: 'high',
      title: 'Schedule Review Session',
      description: 'Performance is trending down. Revisit recent material before moving on.',
      actionItems: ['Review the last two weeks of material', 'Redo quizzes you scored lowest on'],
    });
  }

  if (risks.some((risk) => risk.factor === 'quiz_performance')) {
    interventions.push({
      type: 'adjust_strategy',
      priority: 'high',
      title: 'Adjust Study Strategy',
      description: 'Quiz scores are dropping week over week.',
      actionItems: ['Switch to active recall practice', 'Break topics into smaller pieces'],
    });
  }

  if (risks.some((risk) => risk.factor === 'engagement')) {
    interventions.push({
      type: 're_engage',
      priority: 'medium',
      title: 'Re-engage with Material',
      description: 'You are studying less often than before.',
      actionItems: ['Set a short daily study goal', 'Start with a topic you enjoy'],
    });
  }

  return interventions;
}

// =============================================================================
// Adaptation triggers
// =============================================================================

export function adaptationTriggers(
  components: ComponentScores,
  availability: Availability,
  trends: PerformanceTrends,
  snapshot: PerformanceSnapshot
): AdaptationTrigger[] {
  const triggers: AdaptationTrigger[] = [];

  if (availability.quiz && components.quiz < 50) {
    triggers.push({
      type: 'low_quiz_scores',
      severity: 'high',
      reason: `Average quiz score is ${components.quiz.toFixed(1)}%`,
      suggestedAction: 'Reduce difficulty and add review sessions',
    });
  }

  if (trends.quizScores === 'declining') {
    triggers.push({
      type: 'declining_performance',
      severity: 'high',
      reason: 'Quiz scores are declining',
      suggestedAction: 'Revisit earlier topics before continuing',
    });
  }

  if (availability.sessions && components.sessions < 50) {
    triggers.push({
      type: 'low_completion_rate',
      severity: 'medium',
      reason: `Only ${components.sessions.toFixed(1)}% of sessions are completed`,
      suggestedAction: 'Shorten sessions',
    });
  }

  if (availability.progress && snapshot.progress.averageMastery < 2) {
    triggers.push({
      type: 'low_mastery',
      severity: 'medium',
      reason: `Average mastery is ${snapshot.progress.averageMastery.toFixed(1)} of 5`,
      suggestedAction: 'Add practice tasks for weak topics',
    });
  }

  return triggers;
}
