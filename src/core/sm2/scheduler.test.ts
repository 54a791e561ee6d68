/**
 * SM2Scheduler Unit Tests
 *
 * These tests verify the SM-2 state machine and the helpers around it:
 * - Interval progression for successful recalls (1, 6, then ease-scaled)
 * - Failure reset and ease-factor bounds
 * - Determinism of advance()
 * - Retention rate and review prioritization
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { SM2Scheduler } from './scheduler';
import type { PrioritizableCard } from './types';
import type { ReviewState } from '../models';

const DAY = 24 * 60 * 60 * 1000;

describe('SM2Scheduler', () => {
  let scheduler: SM2Scheduler;
  const now = new Date('2024-01-15T10:00:00Z');

  beforeEach(() => {
    scheduler = new SM2Scheduler();
  });

  describe('createInitialState', () => {
    it('returns a fresh state that is due immediately', () => {
      const state = scheduler.createInitialState(now);

      expect(state.easeFactor).toBe(2.5);
      expect(state.intervalDays).toBe(1);
      expect(state.repetitionCount).toBe(0);
      expect(state.nextDueAt.getTime()).toBe(now.getTime());
      expect(scheduler.isDue(state, now)).toBe(true);
    });
  });

  describe('advance', () => {
    it('schedules one day after the first successful recall', () => {
      const next = scheduler.advance({ easeFactor: 2.5, intervalDays: 1, repetitionCount: 0, nextDueAt: now }, 4, now);

      expect(next.repetitionCount).toBe(1);
      expect(next.intervalDays).toBe(1);
      // quality 4 leaves the ease factor unchanged: 0.1 - 1 * (0.08 + 0.02) = 0
      expect(next.easeFactor).toBeCloseTo(2.5, 10);
      expect(next.nextDueAt.getTime()).toBe(now.getTime() + DAY);
    });

    it('raises the ease factor after a perfect recall', () => {
      const next = scheduler.advance(scheduler.createInitialState(now), 5, now);
      expect(next.easeFactor).toBeCloseTo(2.6, 10);
    });

    it('lowers the ease factor after a barely successful recall', () => {
      // 0.1 - 2 * (0.08 + 2 * 0.02) = -0.14
      const next = scheduler.advance(scheduler.createInitialState(now), 3, now);
      expect(next.easeFactor).toBeCloseTo(2.36, 10);
      expect(next.repetitionCount).toBe(1);
    });

    it('yields intervals 1 then 6 for two successes regardless of ease factor', () => {
      for (const easeFactor of [1.3, 2.5, 4.2]) {
        const fresh: ReviewState = { easeFactor, intervalDays: 1, repetitionCount: 0, nextDueAt: now };
        const first = scheduler.advance(fresh, 3, now);
        const second = scheduler.advance(first, 4, now);

        expect(first.intervalDays).toBe(1);
        expect(second.intervalDays).toBe(6);
      }
    });

    it('scales the interval by the ease factor from the third success on', () => {
      const state: ReviewState = { easeFactor: 2.5, intervalDays: 6, repetitionCount: 2, nextDueAt: now };
      const next = scheduler.advance(state, 5, now);

      expect(next.intervalDays).toBe(15);
      expect(next.repetitionCount).toBe(3);
      expect(next.nextDueAt.getTime()).toBe(now.getTime() + 15 * DAY);
    });

    it('resets repetitions and interval on failure', () => {
      const state: ReviewState = { easeFactor: 2.5, intervalDays: 6, repetitionCount: 2, nextDueAt: now };
      const next = scheduler.advance(state, 1, now);

      expect(next.repetitionCount).toBe(0);
      expect(next.intervalDays).toBe(1);
      expect(next.easeFactor).toBeCloseTo(2.3, 10);
    });

    it('resets on every failing grade', () => {
      const state: ReviewState = { easeFactor: 3.1, intervalDays: 40, repetitionCount: 7, nextDueAt: now };
      for (const quality of [0, 1, 2]) {
        const next = scheduler.advance(state, quality, now);
        expect(next.repetitionCount).toBe(0);
        expect(next.intervalDays).toBe(1);
      }
    });

    it('clamps out-of-range quality values', () => {
      const state = scheduler.createInitialState(now);

      expect(scheduler.advance(state, 9, now)).toEqual(scheduler.advance(state, 5, now));
      expect(scheduler.advance(state, -3, now)).toEqual(scheduler.advance(state, 0, now));
    });

    it('keeps the ease factor within [1.3, 5.0]', () => {
      const floor: ReviewState = { easeFactor: 1.3, intervalDays: 1, repetitionCount: 0, nextDueAt: now };
      const ceiling: ReviewState = { easeFactor: 5.0, intervalDays: 10, repetitionCount: 4, nextDueAt: now };

      expect(scheduler.advance(floor, 0, now).easeFactor).toBe(1.3);
      expect(scheduler.advance(ceiling, 5, now).easeFactor).toBe(5.0);
    });

    it('holds the bounds across a long mixed sequence', () => {
      const qualities = [5, 5, 0, 3, 4, 1, 2, 5, 5, 5, 5, 0, 0, 0, 0, 3, 5, 4, 2, 5, 5, 5, 5, 5, 5];
      let state = scheduler.createInitialState(now);
      let at = now;

      for (const quality of qualities) {
        state = scheduler.advance(state, quality, at);
        at = state.nextDueAt;

        expect(state.easeFactor).toBeGreaterThanOrEqual(1.3);
        expect(state.easeFactor).toBeLessThanOrEqual(5.0);
        expect(state.intervalDays).toBeGreaterThanOrEqual(1);
        expect(state.repetitionCount).toBeGreaterThanOrEqual(0);
      }
    });

    it('is deterministic and does not modify its input', () => {
      const state: ReviewState = { easeFactor: 2.2, intervalDays: 9, repetitionCount: 3, nextDueAt: now };
      const snapshot = { ...state };

      const a = scheduler.advance(state, 4, now);
      const b = scheduler.advance(state, 4, now);

      expect(a).toEqual(b);
      expect(state).toEqual(snapshot);
    });
  });

  describe('retentionRate', () => {
    it('counts successful recalls inside the window', () => {
      const reviews = [
        { quality: 5, createdAt: new Date(now.getTime() - 1 * DAY) },
        { quality: 3, createdAt: new Date(now.getTime() - 2 * DAY) },
        { quality: 1, createdAt: new Date(now.getTime() - 3 * DAY) },
        { quality: 4, createdAt: new Date(now.getTime() - 4 * DAY) },
        // outside a 30-day window
        { quality: 0, createdAt: new Date(now.getTime() - 40 * DAY) },
      ];

      expect(scheduler.retentionRate(reviews, 30, now)).toBe(0.75);
    });

    it('returns 0 without reviews', () => {
      expect(scheduler.retentionRate([], 30, now)).toBe(0);
    });
  });

  describe('prioritize', () => {
    function card(overrides: Partial<PrioritizableCard> & { label: string }) {
      return {
        difficulty: 'medium' as const,
        starred: false,
        totalReviews: 0,
        successfulReviews: 0,
        reviewState: { easeFactor: 2.5, intervalDays: 1, repetitionCount: 0, nextDueAt: new Date(now.getTime() + DAY) },
        ...overrides,
      };
    }

    it('scores overdue days, failures, difficulty, stars and low ease', () => {
      const overdue = card({
        label: 'overdue',
        difficulty: 'easy',
        totalReviews: 4,
        successfulReviews: 2,
        reviewState: { easeFactor: 2.5, intervalDays: 3, repetitionCount: 1, nextDueAt: new Date(now.getTime() - 3 * DAY - 60 * 60 * 1000) },
      });
      const lowEase = card({
        label: 'low-ease',
        reviewState: { easeFactor: 1.5, intervalDays: 1, repetitionCount: 0, nextDueAt: new Date(now.getTime() + DAY) },
      });

      expect(scheduler.priorityScore(overdue, now)).toBe(40);
      expect(scheduler.priorityScore(lowEase, now)).toBeCloseTo(7, 10);
      expect(scheduler.priorityScore(card({ label: 'starred', difficulty: 'hard', starred: true }), now)).toBe(20);
    });

    it('sorts by descending score and keeps ties in input order', () => {
      const cards = [
        card({ label: 'a' }),
        card({ label: 'b', difficulty: 'hard', starred: true }),
        card({
          label: 'c',
          difficulty: 'easy',
          totalReviews: 4,
          successfulReviews: 2,
          reviewState: { easeFactor: 2.5, intervalDays: 3, repetitionCount: 1, nextDueAt: new Date(now.getTime() - 3 * DAY - 60 * 60 * 1000) },
        }),
        card({
          label: 'd',
          reviewState: { easeFactor: 1.5, intervalDays: 1, repetitionCount: 0, nextDueAt: new Date(now.getTime() + DAY) },
        }),
        card({ label: 'e' }),
      ];

      const ordered = scheduler.prioritize(cards, now).map((c) => c.label);

      expect(ordered).toEqual(['c', 'b', 'd', 'a', 'e']);
    });
  });

  describe('masteryOf', () => {
    it('classifies cards by review history', () => {
      const base = { difficulty: 'medium' as const, starred: false };

      expect(scheduler.masteryOf({ ...base, totalReviews: 0, successfulReviews: 0, reviewState: scheduler.createInitialState(now) })).toBe('new');
      expect(
        scheduler.masteryOf({
          ...base,
          totalReviews: 10,
          successfulReviews: 10,
          reviewState: { easeFactor: 2.8, intervalDays: 90, repetitionCount: 9, nextDueAt: now },
        })
      ).toBe('mastered');
      expect(
        scheduler.masteryOf({
          ...base,
          totalReviews: 6,
          successfulReviews: 2,
          reviewState: { easeFactor: 1.7, intervalDays: 1, repetitionCount: 0, nextDueAt: now },
        })
      ).toBe('difficult');
    });
  });
});
