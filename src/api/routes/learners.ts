/**
 * Learner Routes
 *
 * - GET /api/learners                                           list learners
 * - GET /api/learners/:learnerId/analysis                       performance analysis
 * - GET /api/learners/:learnerId/courses/:courseId/prediction   completion prediction
 * - GET /api/learners/:learnerId/courses/:courseId/feasibility  schedule feasibility
 * - GET /api/learners/:learnerId/review-queue                   due flashcards
 * - GET /api/learners/:learnerId/review-queue/load              daily review load balancing
 */

import { Hono } from 'hono';
import type { PredictionReport, StudyEngine } from '@/core/engine';
import type { LearnerRepository } from '@/storage/repositories';
import { validateQuery } from '../middleware/validate';
import {
  analysisQuerySchema,
  feasibilityQuerySchema,
  predictionQuerySchema,
  reviewLoadQuerySchema,
  reviewQueueQuerySchema,
} from '../types';
import { success, unwrap } from '../utils/response';

/** A prediction as sent over the wire; JSON has no Infinity. */
export type PredictionResponse = Omit<PredictionReport, 'weeksRemaining'> & { weeksRemaining: number | null };

export function toPredictionResponse(report: PredictionReport): PredictionResponse {
  return {
    ...report,
    weeksRemaining: Number.isFinite(report.weeksRemaining) ? report.weeksRemaining : null,
  };
}

export function learnersRoutes(engine: StudyEngine, learners: LearnerRepository): Hono {
  const router = new Hono();

  router.get('/', async (c) => {
    return success(c, await learners.findAll());
  });

  router.get('/:learnerId/analysis', validateQuery(analysisQuerySchema), async (c) => {
    const { courseId, windowDays } = c.get('validatedQuery');
    const report = unwrap(await engine.analyzePerformance(c.req.param('learnerId'), courseId ?? null, windowDays));
    return success(c, report);
  });

  router.get('/:learnerId/courses/:courseId/prediction', validateQuery(predictionQuerySchema), async (c) => {
    const { targetMastery } = c.get('validatedQuery');
    const report = unwrap(
      await engine.predictCompletion(c.req.param('learnerId'), c.req.param('courseId'), targetMastery)
    );
    return success(c, toPredictionResponse(report));
  });

  router.get('/:learnerId/courses/:courseId/feasibility', validateQuery(feasibilityQuerySchema), async (c) => {
    const { targetDate, weeklyHours } = c.get('validatedQuery');
    const feasibility = unwrap(
      await engine.assessScheduleFeasibility(c.req.param('learnerId'), c.req.param('courseId'), targetDate, weeklyHours)
    );
    return success(c, feasibility);
  });

  router.get('/:learnerId/review-queue', validateQuery(reviewQueueQuerySchema), async (c) => {
    const { courseId, availableMinutes } = c.get('validatedQuery');
    const queue = unwrap(await engine.getReviewQueue(c.req.param('learnerId'), courseId ?? null, availableMinutes));
    return success(c, queue);
  });

  router.get('/:learnerId/review-queue/load', validateQuery(reviewLoadQuerySchema), async (c) => {
    const { courseId, targetDaily, maxDaily } = c.get('validatedQuery');
    const plan = unwrap(
      await engine.optimizeReviewLoad(c.req.param('learnerId'), courseId ?? null, {
        targetDailyReviews: targetDaily,
        maxDailyReviews: maxDaily,
      })
    );
    return success(c, plan);
  });

  return router;
}
