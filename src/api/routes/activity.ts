/**
 * Activity and Progress Routes
 *
 * - POST /api/activity   record a quiz attempt or study session log
 * - POST /api/progress   record the mastery of one topic
 *
 * Flashcard reviews are recorded through /api/flashcards/:cardId/reviews.
 */

import { Hono } from 'hono';
import type { StudyEngine } from '@/core/engine';
import { validate } from '../middleware/validate';
import { activitySchema, progressSchema } from '../types';
import { success, unwrap } from '../utils/response';

export function activityRoutes(engine: StudyEngine): Hono {
  const router = new Hono();

  router.post('/', validate(activitySchema), async (c) => {
    const recorded = unwrap(await engine.recordActivity(c.get('validatedBody')));
    return success(c, recorded, 201);
  });

  return router;
}

export function progressRoutes(engine: StudyEngine): Hono {
  const router = new Hono();

  router.post('/', validate(progressSchema), async (c) => {
    const progress = unwrap(await engine.recordProgress(c.get('validatedBody')));
    return success(c, progress);
  });

  return router;
}
