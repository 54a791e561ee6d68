/**
 * Learner API Endpoint Tests
 *
 * Endpoints tested:
 * - GET /api/learners - List learners
 * - GET /api/learners/:learnerId/analysis - Performance analysis
 * - GET /api/learners/:learnerId/courses/:courseId/prediction - Completion prediction
 * - GET /api/learners/:learnerId/courses/:courseId/feasibility - Schedule feasibility
 * - GET /api/learners/:learnerId/review-queue - Due flashcards
 * - GET /api/learners/:learnerId/review-queue/load - Daily review load
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import {
  createTestContext,
  cleanupTestContext,
  createTestFlashcard,
  seedLearnerAndCourse,
  type TestContext,
} from '../setup';
import { daysFromNow, getJsonResponse, type ErrorBody, type SuccessBody } from '../helpers';
import type { PerformanceReport } from '../../src/core/engine';
import type { ScheduleFeasibility } from '../../src/core/prediction';
import type { DailyReviewPlan } from '../../src/core/sm2';
import type { PredictionResponse } from '../../src/api';

interface LearnerBody {
  id: string;
  name: string;
}

interface QueueBody {
  cards: { id: string }[];
  batchSize: number;
  totalDue: number;
}

describe('Learners API', () => {
  let ctx: TestContext;

  beforeEach(async () => {
    ctx = createTestContext();
    await seedLearnerAndCourse(ctx.repository);
  });

  afterEach(() => {
    cleanupTestContext(ctx);
  });

  describe('GET /api/learners', () => {
    it('should list stored learners', async () => {
      const response = await ctx.app.request('/api/learners');
      const json = await getJsonResponse<SuccessBody<LearnerBody[]>>(response);

      expect(response.status).toBe(200);
      expect(json.data.map((learner) => learner.id)).toEqual(['learner-1']);
      expect(json.data[0].name).toBe('Test Learner');
    });
  });

  // ==========================================================================
  // Analysis
  // ==========================================================================
  describe('GET /api/learners/:learnerId/analysis', () => {
    it('should analyze a learner over the default window', async () => {
      const response = await ctx.app.request('/api/learners/learner-1/analysis?courseId=course-1');
      const json = await getJsonResponse<SuccessBody<PerformanceReport>>(response);

      expect(response.status).toBe(200);
      expect(json.data.learnerId).toBe('learner-1');
      expect(json.data.courseId).toBe('course-1');
      expect(json.data.windowDays).toBe(30);
      expect(json.data.source).toBe('fresh');
    });

    it('should honour the window query parameter', async () => {
      const response = await ctx.app.request('/api/learners/learner-1/analysis?windowDays=14');
      const json = await getJsonResponse<SuccessBody<PerformanceReport>>(response);

      expect(response.status).toBe(200);
      expect(json.data.courseId).toBeNull();
      expect(json.data.windowDays).toBe(14);
    });

    it('should reject a window that is not a positive integer', async () => {
      const response = await ctx.app.request('/api/learners/learner-1/analysis?windowDays=0');
      const json = await getJsonResponse<ErrorBody>(response);

      expect(response.status).toBe(400);
      expect(json.error.code).toBe('VALIDATION_ERROR');
      expect(json.error.message).toBe('Invalid query parameters');
    });

    it('should return 404 for an unknown course', async () => {
      const response = await ctx.app.request('/api/learners/learner-1/analysis?courseId=course-9');
      const json = await getJsonResponse<ErrorBody>(response);

      expect(response.status).toBe(404);
      expect(json.error.message).toBe("course with ID 'course-9' not found");
    });
  });

  // ==========================================================================
  // Prediction
  // ==========================================================================
  describe('GET /api/learners/:learnerId/courses/:courseId/prediction', () => {
    it('should send an open-ended forecast as null weeks', async () => {
      const response = await ctx.app.request('/api/learners/learner-1/courses/course-1/prediction');
      const json = await getJsonResponse<SuccessBody<PredictionResponse>>(response);

      expect(response.status).toBe(200);
      expect(json.data.hasHistory).toBe(false);
      expect(json.data.progress.topicsRemaining).toBe(2);
      expect(json.data.weeksRemaining).toBeNull();
      expect(json.data.estimatedCompletionDate).toBeNull();
    });

    it('should report a course finished within the window as zero weeks', async () => {
      await ctx.engine.recordProgress({
        learnerId: 'learner-1',
        courseId: 'course-1',
        identifier: 'vectors',
        masteryLevel: 5,
        completionPercentage: 100,
      });
      await ctx.engine.recordProgress({
        learnerId: 'learner-1',
        courseId: 'course-1',
        identifier: 'matrices',
        masteryLevel: 4,
        completionPercentage: 100,
      });

      const response = await ctx.app.request('/api/learners/learner-1/courses/course-1/prediction');
      const json = await getJsonResponse<SuccessBody<PredictionResponse>>(response);

      expect(json.data.progress.topicsRemaining).toBe(0);
      expect(json.data.weeksRemaining).toBe(0);
    });

    it('should reject a target mastery outside 1-5', async () => {
      const response = await ctx.app.request(
        '/api/learners/learner-1/courses/course-1/prediction?targetMastery=6'
      );

      expect(response.status).toBe(400);
    });
  });

  // ==========================================================================
  // Feasibility
  // ==========================================================================
  describe('GET /api/learners/:learnerId/courses/:courseId/feasibility', () => {
    it('should measure the time until the target date', async () => {
      const response = await ctx.app.request(
        '/api/learners/learner-1/courses/course-1/feasibility?targetDate=2024-04-01&weeklyHours=10'
      );
      const json = await getJsonResponse<SuccessBody<ScheduleFeasibility>>(response);

      expect(response.status).toBe(200);
      expect(json.data.courseId).toBe('course-1');
      expect(json.data.constraints).toEqual({
        targetDate: '2024-04-01',
        daysAvailable: 28,
        weeksAvailable: 4,
        weeklyHoursAvailable: 10,
        totalHoursAvailable: 40,
      });
      expect(json.data.remainingWork.notStartedTopics).toBe(2);
    });

    it('should reject a target date that is not in the future', async () => {
      const response = await ctx.app.request(
        '/api/learners/learner-1/courses/course-1/feasibility?targetDate=2024-03-04&weeklyHours=10'
      );
      const json = await getJsonResponse<ErrorBody>(response);

      expect(response.status).toBe(400);
      expect(json.error).toEqual({ code: 'BAD_REQUEST', message: 'Target date must be after today' });
    });

    it('should reject non-positive weekly hours', async () => {
      const response = await ctx.app.request(
        '/api/learners/learner-1/courses/course-1/feasibility?targetDate=2024-04-01&weeklyHours=0'
      );
      const json = await getJsonResponse<ErrorBody>(response);

      expect(response.status).toBe(400);
      expect(json.error.message).toBe('Weekly hours must be positive');
    });

    it('should require a target date', async () => {
      const response = await ctx.app.request(
        '/api/learners/learner-1/courses/course-1/feasibility?weeklyHours=10'
      );
      const json = await getJsonResponse<ErrorBody>(response);

      expect(response.status).toBe(400);
      expect(json.error.details).toEqual([{ path: 'targetDate', message: 'Required' }]);
    });
  });

  // ==========================================================================
  // Review queue
  // ==========================================================================
  describe('GET /api/learners/:learnerId/review-queue', () => {
    it('should return only due cards', async () => {
      await createTestFlashcard(ctx.repository, { id: 'card-due' });
      await createTestFlashcard(ctx.repository, { id: 'card-later', dueAt: daysFromNow(3) });

      const response = await ctx.app.request('/api/learners/learner-1/review-queue?courseId=course-1');
      const json = await getJsonResponse<SuccessBody<QueueBody>>(response);

      expect(response.status).toBe(200);
      expect(json.data.totalDue).toBe(1);
      expect(json.data.cards.map((card) => card.id)).toEqual(['card-due']);
    });

    it('should return 404 for an unknown learner', async () => {
      const response = await ctx.app.request('/api/learners/ghost/review-queue');

      expect(response.status).toBe(404);
    });
  });

  describe('GET /api/learners/:learnerId/review-queue/load', () => {
    it('should spread a day above the maximum over the next days', async () => {
      await createTestFlashcard(ctx.repository, { id: 'card-a' });
      await createTestFlashcard(ctx.repository, { id: 'card-b' });
      await createTestFlashcard(ctx.repository, { id: 'card-c' });

      const response = await ctx.app.request(
        '/api/learners/learner-1/review-queue/load?courseId=course-1&targetDaily=1&maxDaily=2'
      );
      const json = await getJsonResponse<SuccessBody<DailyReviewPlan>>(response);

      expect(response.status).toBe(200);
      expect(json.data.currentLoad.dailyDistribution).toEqual([{ date: '2024-03-04', reviews: 3 }]);
      expect(json.data.optimizedLoad).toEqual([
        { date: '2024-03-04', reviews: 1 },
        { date: '2024-03-05', reviews: 2 },
      ]);
      expect(json.data.optimizedSchedule.filter((review) => review.redistributed)).toHaveLength(2);
    });

    it('should reject a target above the maximum', async () => {
      const response = await ctx.app.request('/api/learners/learner-1/review-queue/load?targetDaily=5&maxDaily=2');
      const json = await getJsonResponse<ErrorBody>(response);

      expect(response.status).toBe(400);
      expect(json.error.details).toEqual([{ path: 'targetDaily', message: 'targetDaily cannot exceed maxDaily' }]);
    });

    it('should return 404 for an unknown learner', async () => {
      const response = await ctx.app.request('/api/learners/ghost/review-queue/load');

      expect(response.status).toBe(404);
    });
  });
});
