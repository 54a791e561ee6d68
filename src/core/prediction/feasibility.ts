/**
 * Schedule feasibility for a target completion date.
 *
 * Remaining work is estimated in hours per topic: 3 for a topic not yet
 * started, 1.5 for one in progress and 0.5 to review a mastered one. It is
 * compared with the hours the learner has between today and the target date.
 */

import type { LearningProgress } from '../models';
import { round } from '../metrics/statistics';
import { rankHours } from '../scheduling';
import { daysBetween, formatHour, startOfUtcDay, toIsoDate } from '../utils/dates';
import type {
  Feasibility,
  FeasibilityInput,
  RecommendedSchedule,
  RemainingWork,
  ScheduleFeasibility,
  TimeConstraints,
} from './types';

export const HOURS_PER_TOPIC = {
  notStarted: 3,
  inProgress: 1.5,
  review: 0.5,
} as const;

const MASTERED_LEVEL = 4;

export function remainingWork(totalTopics: number, progress: readonly LearningProgress[]): RemainingWork {
  const masteredTopics = progress.filter((row) => row.masteryLevel >= MASTERED_LEVEL).length;
  const inProgressTopics = progress.length - masteredTopics;
  const notStartedTopics = Math.max(0, totalTopics - progress.length);

  return {
    totalTopics,
    notStartedTopics,
    inProgressTopics,
    masteredTopics,
    estimatedHoursRemaining:
      notStartedTopics * HOURS_PER_TOPIC.notStarted +
      inProgressTopics * HOURS_PER_TOPIC.inProgress +
      masteredTopics * HOURS_PER_TOPIC.review,
  };
}

export function timeConstraints(targetDate: Date, weeklyHours: number, now: Date): TimeConstraints {
  const daysAvailable = Math.max(0, daysBetween(startOfUtcDay(now), startOfUtcDay(targetDate)));
  const weeksAvailable = daysAvailable / 7;

  return {
    targetDate: toIsoDate(targetDate),
    daysAvailable,
    weeksAvailable: round(weeksAvailable, 1),
    weeklyHoursAvailable: weeklyHours,
    totalHoursAvailable: round(weeksAvailable * weeklyHours, 1),
  };
}

function level(value: number, thresholds: readonly [number, number, number], ascending: boolean): Feasibility {
  const [first, second, third] = thresholds;
  if (ascending) {
    if (value >= first) return 'high';
    if (value >= second) return 'medium';
    if (value >= third) return 'low';
    return 'very_low';
  }
  if (value <= first) return 'high';
  if (value <= second) return 'medium';
  if (value <= third) return 'low';
  return 'very_low';
}

export function assessFeasibility(input: FeasibilityInput): ScheduleFeasibility {
  const work = remainingWork(input.course.topics.length, input.progress);
  const constraints = timeConstraints(input.targetDate, Math.max(0, input.weeklyHours), input.now);

  const hoursNeeded = work.estimatedHoursRemaining;
  const weeks = constraints.daysAvailable / 7;
  const hoursAvailable = weeks * constraints.weeklyHoursAvailable;
  const prioritized = hoursNeeded > hoursAvailable;
  const weeklyNeeded = weeks > 0 ? hoursNeeded / weeks : hoursNeeded;

  const schedule: RecommendedSchedule = {
    scheduleType: prioritized ? 'prioritized' : 'comprehensive',
    feasibilityRatio: prioritized ? round(hoursAvailable / hoursNeeded) : 1,
    recommendedWeeklyHours: round(weeklyNeeded, 1),
    recommendedDailyHours: round(weeklyNeeded / 7, 1),
    optimalStudyTimes: rankHours(input.profile).slice(0, 3).map(formatHour),
    sessionLengthMinutes: input.profile.optimalSessionMinutes,
  };

  const overall = level(schedule.feasibilityRatio, [1, 0.8, 0.6], true);
  const daily = level(schedule.recommendedDailyHours, [2, 4, 6], false);
  const strained = daily === 'low' || daily === 'very_low';
  const successProbability = round(Math.min(1, schedule.feasibilityRatio) * 0.8 * (strained ? 0.7 : 1));

  const risks: string[] = [];
  if (schedule.feasibilityRatio < 0.8) risks.push('Insufficient time for comprehensive coverage');
  if (schedule.recommendedDailyHours > 4) risks.push('High daily commitment may lead to burnout');
  if (constraints.weeksAvailable < 4) risks.push('Very short timeframe increases risk of failure');

  const recommendations: string[] = [];
  if (overall === 'low' || overall === 'very_low') {
    recommendations.push('Consider extending your target completion date', 'Focus on high-priority topics first');
  }
  if (strained) {
    recommendations.push('Reduce daily study hours to maintain consistency', 'Consider spreading study over more days');
  }
  if (prioritized) recommendations.push('Prioritize core concepts and skip optional material');

  return {
    courseId: input.course.id,
    remainingWork: work,
    constraints,
    schedule,
    overall,
    daily,
    successProbability,
    risks,
    recommendations,
  };
}
