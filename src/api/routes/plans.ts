/**
 * Study Plan Routes
 *
 * - POST  /api/plans                                generate a plan
 * - GET   /api/plans/:planId                        fetch a plan
 * - GET   /api/plans/:planId/revisions              superseded base schedules
 * - POST  /api/plans/:planId/adapt                  record activity and re-adapt
 * - POST  /api/plans/:planId/overrides              apply a manual override
 * - PATCH /api/plans/:planId/sessions/:sessionId    mark a session completed or skipped
 * - GET   /api/plans/:planId/success                plan success estimate
 */

import { Hono } from 'hono';
import type { RecordableActivity, StudyEngine } from '@/core/engine';
import type { StudyPlanRepository } from '@/storage/repositories';
import { validate } from '../middleware/validate';
import { adaptPlanSchema, generatePlanSchema, overrideSchema, sessionStatusSchema } from '../types';
import { success, unwrap } from '../utils/response';

export function plansRoutes(engine: StudyEngine, plans: StudyPlanRepository): Hono {
  const router = new Hono();

  router.post('/', validate(generatePlanSchema), async (c) => {
    const body = c.get('validatedBody');
    const plan = unwrap(await engine.generatePlan(body));
    return success(c, plan, 201);
  });

  router.get('/:planId', async (c) => {
    const plan = unwrap(await engine.getPlan(c.req.param('planId')));
    return success(c, plan);
  });

  router.get('/:planId/revisions', async (c) => {
    const plan = unwrap(await engine.getPlan(c.req.param('planId')));
    const revisions = await plans.findRevisions(plan.id);
    return success(c, { planId: plan.id, currentRevision: plan.revision, revisions });
  });

  router.post('/:planId/adapt', validate(adaptPlanSchema), async (c) => {
    const { recentActivity } = c.get('validatedBody');
    const plan = unwrap(await engine.getPlan(c.req.param('planId')));

    // Reported activity always belongs to the plan's learner and course
    const records: RecordableActivity[] = recentActivity.map((record) => ({
      ...record,
      learnerId: plan.learnerId,
      courseId: plan.courseId,
    }));

    const result = unwrap(await engine.adaptPlan(plan.id, records));
    return success(c, result);
  });

  router.post('/:planId/overrides', validate(overrideSchema), async (c) => {
    const request = c.get('validatedBody');
    const result = unwrap(await engine.applyOverride(c.req.param('planId'), request));
    return success(c, result, result.accepted ? 201 : 200);
  });

  router.patch('/:planId/sessions/:sessionId', validate(sessionStatusSchema), async (c) => {
    const { status } = c.get('validatedBody');
    const plan = unwrap(await engine.updateSessionStatus(c.req.param('planId'), c.req.param('sessionId'), status));
    return success(c, plan);
  });

  router.get('/:planId/success', async (c) => {
    const estimate = unwrap(await engine.assessPlanSuccess(c.req.param('planId')));
    return success(c, estimate);
  });

  return router;
}
