/**
 * Time Slot Optimizer
 *
 * Places study sessions at the hours a learner has historically been most
 * productive. Hours are ranked by mean self-reported productivity; sessions
 * are spread round-robin over the available days, and the k-th session of a
 * day takes the k-th best hour (cycling when there are more sessions than
 * ranked hours). An hour already taken that day moves to the next free one.
 *
 * Without productivity history the ranking is 09:00, 14:00, 19:00 and the
 * session length is 45 minutes.
 */

import type { Weekday } from '../utils/dates';
import { formatHour } from '../utils/dates';
import type { ProductivityProfile, SlotOptions, TimeSlot } from './types';

/** Hour ranking used when the learner has rated no sessions. */
export const DEFAULT_HOUR_RANKING: readonly number[] = [9, 14, 19];

export const DEFAULT_SESSION_MINUTES = 45;

/** Productivity assumed for an hour without ratings. */
export const NEUTRAL_PRODUCTIVITY = 3;

export class TimeSlotOptimizer {
  /**
   * Slots covering `hoursNeeded` of study over `daysAvailable`.
   *
   * @param daysAvailable - Days in the order sessions should be dealt to them
   */
  optimalSlots(
    profile: ProductivityProfile,
    hoursNeeded: number,
    daysAvailable: readonly Weekday[],
    options: SlotOptions = {}
  ): TimeSlot[] {
    if (daysAvailable.length === 0) return [];

    const sessionMinutes =
      options.sessionLengthMinutes !== undefined && options.sessionLengthMinutes > 0
        ? options.sessionLengthMinutes
        : profile.optimalSessionMinutes > 0
          ? profile.optimalSessionMinutes
          : DEFAULT_SESSION_MINUTES;

    const ranking = rankHours(profile);
    const ratings = new Map(profile.hourlyProductivity.map((entry) => [entry.hour, entry.averageRating]));

    let sessionsNeeded = Math.max(1, Math.floor((Math.max(0, hoursNeeded) * 60) / sessionMinutes));
    if (options.maxSessionsPerDay !== undefined && options.maxSessionsPerDay > 0) {
      sessionsNeeded = Math.min(sessionsNeeded, daysAvailable.length * options.maxSessionsPerDay);
    }

    // Hours each day already has a session in
    const occupied = new Map<Weekday, Set<number>>();
    const hoursPerSession = Math.max(1, Math.ceil(sessionMinutes / 60));
    const slots: TimeSlot[] = [];

    for (let index = 0; index < sessionsNeeded; index++) {
      const day = daysAvailable[index % daysAvailable.length];
      const sessionOfDay = Math.floor(index / daysAvailable.length);
      const taken = occupied.get(day) ?? new Set<number>();

      const hour = firstFreeHour(ranking[sessionOfDay % ranking.length], hoursPerSession, taken);
      if (hour === null) continue;

      for (let offset = 0; offset < hoursPerSession; offset++) taken.add(hour + offset);
      occupied.set(day, taken);

      slots.push({
        day,
        startTime: formatHour(hour),
        durationMinutes: sessionMinutes,
        productivityScore: ratings.get(hour) ?? NEUTRAL_PRODUCTIVITY,
      });
    }

    return slots;
  }
}

/**
 * Rated hours best first, or the default ranking without ratings.
 */
export function rankHours(profile: ProductivityProfile): number[] {
  if (profile.hourlyProductivity.length === 0) return [...DEFAULT_HOUR_RANKING];
  return [...profile.hourlyProductivity]
    .sort((a, b) => b.averageRating - a.averageRating || b.sessionCount - a.sessionCount || a.hour - b.hour)
    .map((entry) => entry.hour);
}

/**
 * First hour at or after `preferred` whose span is free and ends by midnight,
 * wrapping around to the early morning. Null when the day is full.
 */
function firstFreeHour(preferred: number, span: number, taken: ReadonlySet<number>): number | null {
  for (let step = 0; step < 24; step++) {
    const hour = (preferred + step) % 24;
    if (hour + span > 24) continue;
    let free = true;
    for (let offset = 0; offset < span; offset++) {
      if (taken.has(hour + offset)) free = false;
    }
    if (free) return hour;
  }
  return null;
}
