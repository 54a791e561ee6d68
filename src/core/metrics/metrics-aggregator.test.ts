/**
 * MetricsAggregator Unit Tests
 *
 * Uses an in-memory history source to verify:
 * - headline signals (quiz average, completion, retention, velocity, consistency)
 * - detail sections (hourly productivity, session buckets, card mastery, engagement)
 * - the all-zero snapshot for a learner without history
 * - weekly snapshot series
 */

import { describe, it, expect } from 'vitest';
import { MetricsAggregator } from './metrics-aggregator';
import type { ActivityHistorySource } from '../repository';
import type { LearningProgress, QuizAttempt, ReviewEvent, SessionRecord } from '../models';

const now = new Date('2024-03-01T12:00:00Z');

/** UTC time `days` days before 2024-03-01 at the given hour. */
function daysAgo(days: number, hour = 12, minute = 0): Date {
  return new Date(Date.UTC(2024, 2, 1 - days, hour, minute));
}

class InMemoryHistory implements ActivityHistorySource {
  constructor(
    private readonly quizzes: QuizAttempt[] = [],
    private readonly sessions: SessionRecord[] = [],
    private readonly reviews: ReviewEvent[] = [],
    private readonly progress: LearningProgress[] = []
  ) {}

  async fetchQuizAttempts(_learnerId: string, _courseId: string | null, since: Date) {
    return this.quizzes.filter((q) => q.startedAt >= since);
  }

  async fetchStudySessions(_learnerId: string, _courseId: string | null, since: Date) {
    return this.sessions.filter((s) => s.scheduledStart >= since);
  }

  async fetchFlashcardReviews(_learnerId: string, _courseId: string | null, since: Date) {
    return this.reviews.filter((r) => r.createdAt >= since);
  }

  async fetchLearningProgress() {
    return this.progress;
  }
}

function quiz(id: string, score: number, startedAt: Date, difficulty: QuizAttempt['difficulty']): QuizAttempt {
  return { kind: 'quiz', id, learnerId: 'learner-1', courseId: 'course-1', score, startedAt, difficulty };
}

function session(
  id: string,
  start: Date,
  minutes: number,
  status: SessionRecord['status'],
  rating: number | null
): SessionRecord {
  const end = new Date(start.getTime() + minutes * 60000);
  const started = status === 'completed';
  return {
    kind: 'session',
    id,
    learnerId: 'learner-1',
    courseId: 'course-1',
    scheduledStart: start,
    scheduledEnd: end,
    actualStart: started ? start : null,
    actualEnd: started ? end : null,
    status,
    productivityRating: rating,
  };
}

function review(id: string, cardId: string, quality: number, responseTimeSeconds: number, createdAt: Date): ReviewEvent {
  return { kind: 'review', id, learnerId: 'learner-1', courseId: 'course-1', cardId, quality, responseTimeSeconds, createdAt };
}

function topic(identifier: string, masteryLevel: number, completionPercentage: number, updatedAt: Date): LearningProgress {
  return { id: identifier, learnerId: 'learner-1', courseId: 'course-1', identifier, masteryLevel, completionPercentage, updatedAt };
}

function populatedHistory(): InMemoryHistory {
  return new InMemoryHistory(
    [
      quiz('q0', 10, daysAgo(40), 'easy'),
      quiz('q1', 60, daysAgo(20), 'easy'),
      quiz('q2', 70, daysAgo(15), 'medium'),
      quiz('q3', 80, daysAgo(10), 'medium'),
      quiz('q4', 90, daysAgo(5), 'hard'),
    ],
    [
      session('s5', daysAgo(4, 19), 45, 'skipped', null),
      session('s1', daysAgo(3, 9), 45, 'completed', 5),
      session('s2', daysAgo(2, 9), 45, 'completed', 4),
      session('s3', daysAgo(1, 14), 45, 'completed', 3),
      session('s4', daysAgo(0, 8), 20, 'completed', 2),
    ],
    [
      review('r1', 'card-a', 5, 3, daysAgo(6)),
      review('r2', 'card-a', 4, 3, daysAgo(5)),
      review('r3', 'card-a', 4, 3, daysAgo(4)),
      review('r4', 'card-b', 2, 10, daysAgo(3)),
      review('r5', 'card-b', 0, 1, daysAgo(2)),
      review('r6', 'card-c', 3, 7, daysAgo(1)),
    ],
    [
      topic('t1', 5, 100, daysAgo(10)),
      topic('t2', 4, 80, daysAgo(40)),
      topic('t3', 2, 30, daysAgo(5)),
      topic('t4', 1, 0, daysAgo(2)),
    ]
  );
}

describe('MetricsAggregator', () => {
  describe('aggregate', () => {
    it('computes the headline signals over the window', async () => {
      const snapshot = await new MetricsAggregator(populatedHistory()).aggregate('learner-1', 'course-1', 28, now);

      expect(snapshot.avgQuizScore).toBe(75);
      expect(snapshot.completionRate).toBe(80);
      expect(snapshot.retentionRate).toBe(66.67);
      expect(snapshot.learningVelocity).toBe(0.25);
      expect(snapshot.consistencyScore).toBe(82.79);
      expect(snapshot.windowStart.toISOString()).toBe('2024-02-02T12:00:00.000Z');
    });

    it('breaks quiz results down by recency and difficulty', async () => {
      const { quiz: metrics } = await new MetricsAggregator(populatedHistory()).aggregate('learner-1', 'course-1', 28, now);

      expect(metrics.attemptCount).toBe(4);
      expect(metrics.bestScore).toBe(90);
      expect(metrics.worstScore).toBe(60);
      expect(metrics.recentScores).toEqual([90, 80, 70, 60]);
      expect(metrics.averageByDifficulty).toEqual({ easy: 60, medium: 75, hard: 90 });
    });

    it('ranks study hours and picks the best session length', async () => {
      const { sessions } = await new MetricsAggregator(populatedHistory()).aggregate('learner-1', 'course-1', 28, now);

      expect(sessions.totalSessions).toBe(5);
      expect(sessions.completedSessions).toBe(4);
      expect(sessions.totalStudyHours).toBe(2.58);
      expect(sessions.averageProductivity).toBe(3.5);
      expect(sessions.sessionsPerWeek).toBe(1.25);
      expect(sessions.hourlyProductivity.map((h) => h.hour)).toEqual([9, 14, 8]);
      expect(sessions.hourlyProductivity[0]).toEqual({ hour: 9, averageRating: 4.5, sessionCount: 2 });
      expect(sessions.peakHour).toBe(9);
      expect(sessions.bucketProductivity).toEqual({ short: 2, medium: 4, long: null });
      expect(sessions.bestLengthBucket).toBe('medium');
      expect(sessions.optimalSessionMinutes).toBe(45);
      expect(sessions.productivityTrend).toBe('declining');
    });

    it('summarizes flashcard reviews', async () => {
      const { flashcards } = await new MetricsAggregator(populatedHistory()).aggregate('learner-1', 'course-1', 28, now);

      expect(flashcards.totalReviews).toBe(6);
      expect(flashcards.masteredCards).toBe(1);
      expect(flashcards.reviewEfficiency).toBe(63.33);
      expect(flashcards.averageResponseSeconds).toBe(4.5);
      expect(flashcards.reviewsPerDay).toBe(0.21);
      expect(flashcards.qualityDistribution).toEqual({ easy: 3, medium: 1, hard: 1, again: 1 });
    });

    it('summarizes topic progress', async () => {
      const { progress } = await new MetricsAggregator(populatedHistory()).aggregate('learner-1', 'course-1', 28, now);

      expect(progress).toEqual({
        topicsTracked: 4,
        topicsStarted: 3,
        averageMastery: 3,
        masteredTopics: 2,
        masteredInWindow: 1,
        averageCompletion: 52.5,
      });
    });

    it('derives engagement from started sessions', async () => {
      const { engagement } = await new MetricsAggregator(populatedHistory()).aggregate('learner-1', 'course-1', 28, now);

      expect(engagement.studyStreak).toBe(4);
      expect(engagement.activeDays).toBe(4);
      expect(engagement.peakHours).toEqual([9, 8, 14]);
      expect(engagement.mostActiveDay).toBe('Tuesday');
      expect(engagement.activityConsistency).toBe(0);
      expect(engagement.engagementScore).toBe(37.43);
    });

    it('returns a fully populated all-zero snapshot without history', async () => {
      const snapshot = await new MetricsAggregator(new InMemoryHistory()).aggregate('learner-1', null, 30, now);

      expect(snapshot.avgQuizScore).toBe(0);
      expect(snapshot.completionRate).toBe(0);
      expect(snapshot.retentionRate).toBe(0);
      expect(snapshot.learningVelocity).toBe(0);
      expect(snapshot.consistencyScore).toBe(0);
      expect(snapshot.quiz.recentScores).toEqual([]);
      expect(snapshot.sessions.peakHour).toBe(9);
      expect(snapshot.sessions.optimalSessionMinutes).toBe(45);
      expect(snapshot.sessions.productivityTrend).toBe('insufficient_data');
      expect(snapshot.engagement.mostActiveDay).toBe('Unknown');
      expect(snapshot.engagement.engagementScore).toBe(0);
      expect(snapshot.progress.averageMastery).toBe(0);
    });

    it('falls back to a 30-day window for non-positive windows', async () => {
      const snapshot = await new MetricsAggregator(new InMemoryHistory()).aggregate('learner-1', null, -5, now);
      expect(snapshot.windowDays).toBe(30);
    });
  });

  describe('aggregateSeries', () => {
    it('returns weekly snapshots ending with the current window', async () => {
      const aggregator = new MetricsAggregator(populatedHistory());
      const series = await aggregator.aggregateSeries('learner-1', 'course-1', 28, 3, now);
      const current = await aggregator.aggregate('learner-1', 'course-1', 28, now);

      expect(series).toHaveLength(3);
      expect(series[0].windowEnd.toISOString()).toBe('2024-02-16T12:00:00.000Z');
      expect(series[1].windowEnd.toISOString()).toBe('2024-02-23T12:00:00.000Z');
      expect(series[2]).toEqual(current);
      // 10 (day -40), 60 (day -20) and 70 (day -15) fall in the first window
      expect(series[0].quiz.attemptCount).toBe(3);
    });
  });
});
