import { describe, it, expect } from 'vitest';
import { TimeSlotOptimizer, rankHours } from './time-slot-optimizer';
import type { ProductivityProfile } from './types';

const noHistory: ProductivityProfile = { hourlyProductivity: [], optimalSessionMinutes: 45 };

describe('TimeSlotOptimizer', () => {
  const optimizer = new TimeSlotOptimizer();

  it('uses 09:00, 14:00 and 19:00 without history', () => {
    expect(rankHours(noHistory)).toEqual([9, 14, 19]);
  });

  it('deals sessions round-robin across days', () => {
    const slots = optimizer.optimalSlots(noHistory, 4, ['Monday', 'Tuesday', 'Wednesday']);

    expect(slots.map((slot) => `${slot.day} ${slot.startTime}`)).toEqual([
      'Monday 09:00',
      'Tuesday 09:00',
      'Wednesday 09:00',
      'Monday 14:00',
      'Tuesday 14:00',
    ]);
    expect(slots.every((slot) => slot.durationMinutes === 45)).toBe(true);
    expect(slots.every((slot) => slot.productivityScore === 3)).toBe(true);
  });

  it('caps sessions per day', () => {
    const slots = optimizer.optimalSlots(noHistory, 10, ['Monday'], { maxSessionsPerDay: 2 });

    expect(slots.map((slot) => slot.startTime)).toEqual(['09:00', '14:00']);
  });

  it('cycles through the ranking and moves to the next free hour', () => {
    const slots = optimizer.optimalSlots(noHistory, 3, ['Friday']);

    expect(slots.map((slot) => slot.startTime)).toEqual(['09:00', '14:00', '19:00', '10:00']);
  });

  it('ranks hours by productivity and skips hours a long session covers', () => {
    const profile: ProductivityProfile = {
      hourlyProductivity: [
        { hour: 15, averageRating: 4, sessionCount: 3 },
        { hour: 14, averageRating: 4.5, sessionCount: 2 },
      ],
      optimalSessionMinutes: 90,
    };

    const slots = optimizer.optimalSlots(profile, 3, ['Monday']);

    expect(slots).toEqual([
      { day: 'Monday', startTime: '14:00', durationMinutes: 90, productivityScore: 4.5 },
      { day: 'Monday', startTime: '16:00', durationMinutes: 90, productivityScore: 3 },
    ]);
  });

  it('lets the caller fix the session length', () => {
    const slots = optimizer.optimalSlots(noHistory, 1, ['Monday'], { sessionLengthMinutes: 30 });

    expect(slots).toHaveLength(2);
    expect(slots[0].durationMinutes).toBe(30);
  });

  it('schedules at least one session', () => {
    expect(optimizer.optimalSlots(noHistory, 0, ['Monday'])).toHaveLength(1);
  });

  it('returns nothing without available days', () => {
    expect(optimizer.optimalSlots(noHistory, 5, [])).toEqual([]);
  });
});
