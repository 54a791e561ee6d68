import { describe, it, expect } from 'vitest';
import {
  classifyTrend,
  consistencyScore,
  indexCorrelation,
  mean,
  populationStdDev,
  sampleStdDev,
} from './statistics';

describe('statistics', () => {
  it('returns zeros for empty input', () => {
    expect(mean([])).toBe(0);
    expect(sampleStdDev([])).toBe(0);
    expect(populationStdDev([])).toBe(0);
    expect(consistencyScore([])).toBe(0);
  });

  it('computes sample and population deviation', () => {
    expect(sampleStdDev([2, 4, 4, 4, 5, 5, 7, 9])).toBeCloseTo(2.138, 3);
    expect(populationStdDev([2, 4, 4, 4, 5, 5, 7, 9])).toBe(2);
  });

  describe('consistencyScore', () => {
    it('is 100 for a constant series', () => {
      expect(consistencyScore([70, 70, 70])).toBe(100);
    });

    it('is 0 for a single value or a zero mean', () => {
      expect(consistencyScore([85])).toBe(0);
      expect(consistencyScore([0, 0, 0])).toBe(0);
    });

    it('is floored at 0 for very noisy series', () => {
      expect(consistencyScore([1, 100, 1, 100, 0])).toBe(0);
    });
  });

  describe('classifyTrend', () => {
    it('classifies strictly increasing series as improving', () => {
      expect(classifyTrend([1, 2, 3])).toBe('improving');
      expect(classifyTrend([40, 41, 45, 60, 61])).toBe('improving');
    });

    it('classifies strictly decreasing series as declining', () => {
      expect(classifyTrend([3, 2, 1])).toBe('declining');
      expect(classifyTrend([90, 70, 69, 20])).toBe('declining');
    });

    it('classifies constant series as stable', () => {
      expect(classifyTrend([5, 5, 5, 5])).toBe('stable');
    });

    it('classifies weakly correlated series as stable', () => {
      // r = 0 against the index
      expect(classifyTrend([1, 3, 1])).toBe('stable');
    });

    it('needs at least three points', () => {
      expect(classifyTrend([])).toBe('insufficient_data');
      expect(classifyTrend([1, 2])).toBe('insufficient_data');
    });
  });

  it('returns null correlation for zero variance', () => {
    expect(indexCorrelation([4, 4, 4])).toBeNull();
    expect(indexCorrelation([1, 2, 3])).toBeCloseTo(1, 10);
  });
});
