import { describe, it, expect } from 'vitest';
import type { Course, LearningProgress } from '../models';
import type { PerformanceSnapshot } from '../metrics';
import { ProgressPredictor, completionProbabilityOf } from './progress-predictor';
import { NOW, TEST_COURSE, buildSnapshot, progressRow } from '../../../tests/helpers';

const predictor = new ProgressPredictor();

const course: Course = {
  ...TEST_COURSE,
  topics: ['t1', 't2', 't3', 't4', 't5', 't6', 't7', 't8', 't9', 't10'],
};

const progress: LearningProgress[] = [
  progressRow('t1', 5),
  progressRow('t2', 4),
  progressRow('t3', 3),
  progressRow('t4', 2),
];

function seriesWithVelocities(...velocities: number[]): PerformanceSnapshot[] {
  return velocities.map((velocity) =>
    buildSnapshot({ velocity, mastery: 3.5, topics: 4, quiz: 80, consistency: 80 })
  );
}

describe('ProgressPredictor', () => {
  describe('predictCompletion', () => {
    it('reports an open-ended forecast when the learner is not progressing', () => {
      const prediction = predictor.predictCompletion({
        learnerId: 'learner-1',
        course: TEST_COURSE,
        progress: [progressRow('vectors', 2)],
        series: [buildSnapshot({ velocity: 0, mastery: 2, topics: 1 })],
        now: NOW,
      });

      expect(prediction.weeksRemaining).toBe(Infinity);
      expect(prediction.completionProbability).toBe(0);
      expect(prediction.estimatedCompletionDate).toBeNull();
      expect(prediction.milestones).toEqual([]);
      expect(prediction.scenarios).toBeNull();
      expect(prediction.confidence).toBe(0.13);
      expect(prediction.recommendations.map((r) => r.type)).toEqual(['increase_intensity', 'adjust_plan']);
      expect(prediction.recommendations[0].description).toBe('No topics reached mastery in the analysis window');
    });

    it('forecasts completion from velocity and remaining topics', () => {
      const prediction = predictor.predictCompletion({
        learnerId: 'learner-1',
        course,
        progress,
        series: seriesWithVelocities(1, 1.5, 2),
        now: NOW,
      });

      expect(prediction.progress).toEqual({
        totalTopics: 10,
        topicsStarted: 4,
        topicsMastered: 2,
        topicsRemaining: 8,
        completionPercentage: 20,
        averageMastery: 3.5,
      });
      expect(prediction.velocity).toEqual({ topicsPerWeek: 2, trend: 'improving', consistencyScore: 80 });
      expect(prediction.weeksRemaining).toBe(4);
      expect(prediction.estimatedCompletionDate).toBe('2024-04-01');
      expect(prediction.completionProbability).toBe(0.86);
      expect(prediction.confidence).toBe(0.67);
      expect(prediction.hasHistory).toBe(true);
      expect(prediction.recommendations.map((r) => r.type)).toEqual(['ahead_of_schedule']);
    });

    it('places milestones at quarters of the remaining work', () => {
      const { milestones } = predictor.predictCompletion({
        learnerId: 'learner-1',
        course,
        progress,
        series: seriesWithVelocities(1, 1.5, 2),
        now: NOW,
      });

      expect(milestones).toEqual([
        { percentage: 25, topicsToComplete: 2, estimatedDate: '2024-03-11', weeksFromNow: 1, confidence: 0.88 },
        { percentage: 50, topicsToComplete: 4, estimatedDate: '2024-03-18', weeksFromNow: 2, confidence: 0.86 },
        { percentage: 75, topicsToComplete: 6, estimatedDate: '2024-03-25', weeksFromNow: 3, confidence: 0.84 },
        { percentage: 100, topicsToComplete: 8, estimatedDate: '2024-04-01', weeksFromNow: 4, confidence: 0.82 },
      ]);
    });

    it('spreads scenarios around the realistic estimate', () => {
      const { scenarios } = predictor.predictCompletion({
        learnerId: 'learner-1',
        course,
        progress,
        series: seriesWithVelocities(1, 1.5, 2),
        now: NOW,
      });

      expect(scenarios).toEqual({
        optimistic: { weeks: 3.3, probability: 0.3 },
        realistic: { weeks: 4, probability: 0.5 },
        pessimistic: { weeks: 5, probability: 0.2 },
      });
    });

    it('counts topics against the requested mastery level', () => {
      const prediction = predictor.predictCompletion({
        learnerId: 'learner-1',
        course,
        progress,
        series: seriesWithVelocities(2),
        targetMastery: 3,
        now: NOW,
      });

      expect(prediction.targetMasteryLevel).toBe(3);
      expect(prediction.progress.topicsMastered).toBe(3);
      expect(prediction.progress.topicsRemaining).toBe(7);
      expect(prediction.weeksRemaining).toBe(3.5);
    });

    it('flags a slowing pace', () => {
      const prediction = predictor.predictCompletion({
        learnerId: 'learner-1',
        course,
        progress,
        series: seriesWithVelocities(2, 1.5, 1),
        now: NOW,
      });

      expect(prediction.velocity.trend).toBe('declining');
      expect(prediction.weeksRemaining).toBe(8);
      expect(prediction.recommendations.map((r) => r.type)).toEqual(['pace_declining']);
    });

    it('caps confidence without progress history', () => {
      const series = [1, 2, 3].map(() => buildSnapshot({ quiz: 80, consistency: 90 }));
      const prediction = predictor.predictCompletion({
        learnerId: 'learner-1',
        course: TEST_COURSE,
        progress: [],
        series,
        now: NOW,
      });

      expect(prediction.hasHistory).toBe(false);
      expect(prediction.confidence).toBe(0.25);
      expect(prediction.weeksRemaining).toBe(Infinity);
    });

    it('handles an empty snapshot series', () => {
      const prediction = predictor.predictCompletion({
        learnerId: 'learner-1',
        course: TEST_COURSE,
        progress: [],
        series: [],
        now: NOW,
      });

      expect(prediction.velocity).toEqual({ topicsPerWeek: 0, trend: 'insufficient_data', consistencyScore: 0 });
      expect(prediction.confidence).toBe(0.1);
      expect(prediction.progress.averageMastery).toBe(0);
    });

    it('reports a finished course with velocity as due today', () => {
      const prediction = predictor.predictCompletion({
        learnerId: 'learner-1',
        course: TEST_COURSE,
        progress: [progressRow('vectors', 5), progressRow('matrices', 4)],
        series: [buildSnapshot({ mastery: 4.5, topics: 2, velocity: 1 })],
        now: NOW,
      });

      expect(prediction.progress.completionPercentage).toBe(100);
      expect(prediction.weeksRemaining).toBe(0);
      expect(prediction.estimatedCompletionDate).toBe('2024-03-04');
      expect(prediction.completionProbability).toBe(0.5);
      expect(prediction.milestones).toEqual([]);
    });

    it('gives no date for a finished course without velocity', () => {
      const prediction = predictor.predictCompletion({
        learnerId: 'learner-1',
        course: TEST_COURSE,
        progress: [progressRow('vectors', 5), progressRow('matrices', 5)],
        series: [],
        now: NOW,
      });

      expect(prediction.progress.topicsRemaining).toBe(0);
      expect(prediction.weeksRemaining).toBe(Infinity);
      expect(prediction.estimatedCompletionDate).toBeNull();
      expect(prediction.completionProbability).toBe(0);
      expect(prediction.milestones).toEqual([]);
    });

    it('uses the configured no-history cap', () => {
      const strict = new ProgressPredictor({ noHistoryConfidenceCap: 0.05 });
      const prediction = strict.predictCompletion({
        learnerId: 'learner-1',
        course: TEST_COURSE,
        progress: [],
        series: [],
        now: NOW,
      });

      expect(prediction.confidence).toBe(0.05);
    });
  });

  describe('completionProbabilityOf', () => {
    it('decays toward 0.3 over a year and blends in consistency', () => {
      expect(completionProbabilityOf(0, 0)).toBe(0.5);
      expect(completionProbabilityOf(52, 100)).toBe(0.65);
      expect(completionProbabilityOf(104, 0)).toBe(0.15);
    });
  });
});
