/**
 * Review Queue Builder
 *
 * Turns a learner's flashcards into a review session: which cards are due,
 * in what order, how many fit in the available time, and how heavy the
 * upcoming workload is.
 */

import { addDays, daysBetween, fromIsoDate, startOfUtcDay, toIsoDate } from '../utils/dates';
import { round } from '../metrics/statistics';
import { SM2Scheduler } from './scheduler';
import type {
  DailyReviewCount,
  DailyReviewPlan,
  LoadCard,
  PlannedReview,
  ReviewLoadAnalysis,
  ReviewLoadOptions,
  ReviewRecommendation,
  StudyLoad,
} from './types';

export const DEFAULT_REVIEW_LOAD: ReviewLoadOptions = {
  targetDailyReviews: 50,
  maxDailyReviews: 100,
  horizonDays: 14,
};

/** Days after an overloaded day searched for room. */
const SPILL_DAYS = 7;

/** Upper bound on cards in one review session. */
const MAX_BATCH_SIZE = 50;

/** Default seconds spent on a card when none is measured. */
const DEFAULT_SECONDS_PER_CARD = 30;

export interface ReviewQueueResult<T extends LoadCard> {
  /** Due cards in review order, truncated to `batchSize` */
  cards: T[];
  batchSize: number;
  totalDue: number;
  load: StudyLoad;
  recommendations: ReviewRecommendation[];
}

export class ReviewQueue {
  constructor(private readonly scheduler: SM2Scheduler = new SM2Scheduler()) {}

  /**
   * Number of cards to review in one sitting: bounded by the due count, by
   * what fits in the available minutes, and by {@link MAX_BATCH_SIZE}.
   */
  optimalBatchSize(
    totalDue: number,
    availableMinutes: number,
    secondsPerCard: number = DEFAULT_SECONDS_PER_CARD
  ): number {
    const perCard = secondsPerCard > 0 ? secondsPerCard : DEFAULT_SECONDS_PER_CARD;
    const byTime = Math.floor((availableMinutes * 60) / perCard);
    return Math.max(1, Math.min(totalDue, byTime, MAX_BATCH_SIZE));
  }

  studyLoad(cards: readonly LoadCard[], now: Date = new Date()): StudyLoad {
    const today = toIsoDate(now);
    const weekEnd = toIsoDate(addDays(now, 7));

    const load: StudyLoad = {
      totalCards: cards.length,
      dueToday: 0,
      overdue: 0,
      dueThisWeek: 0,
      difficultyDistribution: { easy: 0, medium: 0, hard: 0 },
      masteryDistribution: { new: 0, learning: 0, difficult: 0, mastered: 0 },
      estimatedMinutes: { today: 0, thisWeek: 0, overdue: 0 },
      studyPressure: 0,
    };

    for (const card of cards) {
      const dueDate = toIsoDate(card.reviewState.nextDueAt);
      if (dueDate <= today) load.dueToday++;
      if (card.reviewState.nextDueAt.getTime() < now.getTime()) load.overdue++;
      if (dueDate <= weekEnd) load.dueThisWeek++;
      load.difficultyDistribution[card.difficulty]++;
      load.masteryDistribution[this.scheduler.masteryOf(card)]++;
    }

    // 30 seconds per card, 45 for overdue ones
    load.estimatedMinutes = {
      today: load.dueToday * 0.5,
      thisWeek: load.dueThisWeek * 0.5,
      overdue: load.overdue * 0.75,
    };

    if (cards.length > 0) {
      load.studyPressure = round(
        Math.min(100, ((load.overdue * 2 + load.dueToday) / cards.length) * 100),
        1
      );
    }

    return load;
  }

  recommendations(
    load: StudyLoad,
    lastReviewAt: Date | null,
    now: Date = new Date()
  ): ReviewRecommendation[] {
    const recommendations: ReviewRecommendation[] = [];

    if (load.overdue > 0) {
      recommendations.push({
        type: 'overdue_reviews',
        priority: 'high',
        message: `You have ${load.overdue} overdue cards. Review them to maintain your progress.`,
        action: 'review_overdue',
      });
    }

    if (load.dueToday > 0) {
      recommendations.push({
        type: 'daily_reviews',
        priority: 'medium',
        message: `You have ${load.dueToday} cards due for review today.`,
        action: 'start_review_session',
      });
    }

    if (load.studyPressure > 70) {
      recommendations.push({
        type: 'high_workload',
        priority: 'high',
        message:
          'Your review workload is high. Consider more daily review time or fewer new cards.',
        action: 'adjust_settings',
      });
    }

    if (lastReviewAt && daysBetween(lastReviewAt, now) > 2) {
      recommendations.push({
        type: 'study_gap',
        priority: 'medium',
        message: "You haven't reviewed in a while. Regular practice keeps retention up.",
        action: 'resume_studying',
      });
    }

    const hour = now.getUTCHours();
    if (hour >= 9 && hour <= 11) {
      recommendations.push({
        type: 'optimal_time',
        priority: 'low',
        message: 'Morning is a good time for focused review.',
        action: 'start_morning_session',
      });
    }

    return recommendations;
  }

  /**
   * Builds a review session from a learner's cards.
   *
   * @param cards - All cards of the learner (due or not)
   * @param availableMinutes - Time the learner has for this session
   * @param lastReviewAt - Time of the learner's most recent review, if any
   */
  build<T extends LoadCard>(
    cards: readonly T[],
    availableMinutes: number,
    lastReviewAt: Date | null,
    now: Date = new Date()
  ): ReviewQueueResult<T> {
    const due = cards.filter((card) => this.scheduler.isDue(card.reviewState, now));
    const ordered = this.scheduler.prioritize(due, now);
    const batchSize = due.length === 0 ? 0 : this.optimalBatchSize(due.length, availableMinutes);
    const load = this.studyLoad(cards, now);

    return {
      cards: ordered.slice(0, batchSize),
      batchSize,
      totalDue: due.length,
      load,
      recommendations: this.recommendations(load, lastReviewAt, now),
    };
  }

  /**
   * Spreads the reviews due within the horizon so that no day goes over
   * `maxDailyReviews`.
   *
   * On a day above the maximum the `targetDailyReviews` highest-priority
   * cards stay; each other card moves to the first of the next seven days
   * still under the maximum, or failing that to the n-th day after, n being
   * its place among the moved cards. Overdue cards count as due today.
   */
  optimizeDailyLoad<T extends LoadCard>(
    cards: readonly T[],
    now: Date = new Date(),
    options: Partial<ReviewLoadOptions> = {}
  ): DailyReviewPlan {
    const maxDaily = Math.max(1, Math.floor(options.maxDailyReviews ?? DEFAULT_REVIEW_LOAD.maxDailyReviews));
    const target = Math.max(
      0,
      Math.min(Math.floor(options.targetDailyReviews ?? DEFAULT_REVIEW_LOAD.targetDailyReviews), maxDaily)
    );
    const horizonDays = options.horizonDays ?? DEFAULT_REVIEW_LOAD.horizonDays;
    const today = toIsoDate(now);
    const horizonEnd = toIsoDate(addDays(startOfUtcDay(now), horizonDays));

    const byDate = new Map<string, T[]>();
    for (const card of cards) {
      const due = toIsoDate(card.reviewState.nextDueAt);
      const date = due < today ? today : due;
      if (date >= horizonEnd) continue;
      byDate.set(date, [...(byDate.get(date) ?? []), card]);
    }

    const loads = new Map([...byDate.entries()].map(([date, due]): [string, number] => [date, due.length]));
    const currentLoad = analyzeReviewLoad(countsOf(loads), today);
    const load = (date: string): number => loads.get(date) ?? 0;

    const schedule: PlannedReview[] = [];
    for (const date of [...byDate.keys()].sort()) {
      const due = byDate.get(date) ?? [];
      if (due.length <= maxDaily) {
        schedule.push(...due.map((card) => planned(card.id, date, date)));
        continue;
      }

      const ordered = this.scheduler.prioritize(due, now);
      schedule.push(...ordered.slice(0, target).map((card) => planned(card.id, date, date)));
      ordered.slice(target).forEach((card, index) => {
        const moved = spillDate(date, index, load, maxDaily);
        loads.set(date, load(date) - 1);
        loads.set(moved, load(moved) + 1);
        schedule.push(planned(card.id, moved, date));
      });
    }

    schedule.sort((a, b) => a.date.localeCompare(b.date));

    return {
      currentLoad,
      optimizedSchedule: schedule,
      optimizedLoad: countsOf(loads),
      recommendations: loadBalancingRecommendations(currentLoad),
    };
  }
}

function planned(cardId: string, date: string, originalDate: string): PlannedReview {
  return { cardId, date, originalDate, redistributed: date !== originalDate };
}

function countsOf(loads: ReadonlyMap<string, number>): DailyReviewCount[] {
  return [...loads.entries()]
    .filter(([, reviews]) => reviews > 0)
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([date, reviews]) => ({ date, reviews }));
}

function spillDate(date: string, index: number, load: (date: string) => number, maxDaily: number): string {
  const start = fromIsoDate(date);
  for (let offset = 1; offset <= SPILL_DAYS; offset++) {
    const candidate = toIsoDate(addDays(start, offset));
    if (load(candidate) < maxDaily) return candidate;
  }
  return toIsoDate(addDays(start, index + 1));
}

export function analyzeReviewLoad(counts: readonly DailyReviewCount[], today: string): ReviewLoadAnalysis {
  if (counts.length === 0) {
    return { averageDailyLoad: 0, peakDay: today, loadVariance: 0, overloadedDays: [], dailyDistribution: [] };
  }

  const values = counts.map((entry) => entry.reviews);
  const average = values.reduce((a, b) => a + b, 0) / values.length;
  const variance = values.reduce((total, value) => total + (value - average) ** 2, 0) / values.length;
  const peak = counts.reduce((best, entry) => (entry.reviews > best.reviews ? entry : best));

  return {
    averageDailyLoad: round(average, 1),
    peakDay: peak.date,
    loadVariance: round(variance, 1),
    overloadedDays: counts.filter((entry) => entry.reviews > average * 1.5).map((entry) => entry.date),
    dailyDistribution: [...counts],
  };
}

function loadBalancingRecommendations(analysis: ReviewLoadAnalysis): ReviewRecommendation[] {
  const recommendations: ReviewRecommendation[] = [];

  if (analysis.loadVariance > 100) {
    recommendations.push({
      type: 'uneven_load',
      priority: 'medium',
      message: 'Consider spreading reviews more evenly across the week.',
      action: 'spread_reviews',
    });
  }

  if (analysis.overloadedDays.length > 0) {
    recommendations.push({
      type: 'overloaded_days',
      priority: 'high',
      message: `Reschedule reviews from overloaded days: ${analysis.overloadedDays.join(', ')}`,
      action: 'reschedule_reviews',
    });
  }

  if (analysis.averageDailyLoad > 80) {
    recommendations.push({
      type: 'heavy_load',
      priority: 'medium',
      message: 'Your review load is quite high. Consider longer intervals for mastered cards.',
      action: 'extend_intervals',
    });
  }

  return recommendations;
}
