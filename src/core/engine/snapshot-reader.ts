/**
 * Snapshot reads with a timeout and a per-engine cache.
 *
 * A read that does not settle within the timeout is answered from the last
 * series cached for the same learner, course, window and length, or from a
 * zero-history default. A late read still refreshes the cache when it
 * completes. Read failures propagate unchanged.
 */

import { emptySnapshot, normalizeWindow, type MetricsAggregator, type PerformanceSnapshot } from '../metrics';
import type { SeriesRead } from './types';

type TimedOutcome<T> = { timedOut: false; value: T } | { timedOut: true };

/**
 * Races `promise` against a timer. The timer is cleared once either side
 * settles; a rejection of `promise` before the deadline is rethrown.
 */
export function withTimeout<T>(promise: Promise<T>, ms: number): Promise<TimedOutcome<T>> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const deadline = new Promise<TimedOutcome<T>>((resolve) => {
    timer = setTimeout(() => resolve({ timedOut: true }), ms);
  });
  const settled = promise.then((value): TimedOutcome<T> => ({ timedOut: false, value }));

  return Promise.race([settled, deadline]).finally(() => clearTimeout(timer));
}

export interface SeriesRequest {
  learnerId: string;
  courseId: string | null;
  windowDays: number;
  points: number;
  now: Date;
}

export class SnapshotReader {
  private cache = new Map<string, PerformanceSnapshot[]>();

  constructor(
    private readonly aggregator: MetricsAggregator,
    private readonly timeoutMs: number
  ) {}

  async read(request: SeriesRequest): Promise<SeriesRead> {
    const key = cacheKey(request);
    const pending = this.aggregator.aggregateSeries(
      request.learnerId,
      request.courseId,
      request.windowDays,
      request.points,
      request.now
    );

    const outcome = await withTimeout(pending, this.timeoutMs);
    if (!outcome.timedOut) {
      this.cache.set(key, outcome.value);
      return { series: outcome.value, source: 'fresh' };
    }

    void pending.then(
      (series) => this.cache.set(key, series),
      (error: unknown) => console.error(`[StudyEngine] Snapshot read for ${key} failed after timeout:`, error)
    );

    const cached = this.cache.get(key);
    if (cached) {
      console.warn(`[StudyEngine] Snapshot read for ${key} timed out after ${this.timeoutMs}ms, using cached series`);
      return { series: cached, source: 'cached' };
    }

    console.warn(`[StudyEngine] Snapshot read for ${key} timed out after ${this.timeoutMs}ms, using defaults`);
    return {
      series: [
        emptySnapshot({
          learnerId: request.learnerId,
          courseId: request.courseId,
          windowDays: normalizeWindow(request.windowDays),
          now: request.now,
        }),
      ],
      source: 'default',
    };
  }
}

function cacheKey(request: SeriesRequest): string {
  return `${request.learnerId}/${request.courseId ?? '*'}/${request.windowDays}d/${request.points}`;
}
