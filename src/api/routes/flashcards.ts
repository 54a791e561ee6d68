/**
 * Flashcard Routes
 *
 * - POST /api/flashcards/:cardId/reviews   apply one SM-2 review
 */

import { Hono } from 'hono';
import type { StudyEngine } from '@/core/engine';
import { validate } from '../middleware/validate';
import { reviewSchema } from '../types';
import { success, unwrap } from '../utils/response';

export function flashcardsRoutes(engine: StudyEngine): Hono {
  const router = new Hono();

  router.post('/:cardId/reviews', validate(reviewSchema), async (c) => {
    const { quality, responseTimeSeconds } = c.get('validatedBody');
    const outcome = unwrap(await engine.reviewItem(c.req.param('cardId'), quality, responseTimeSeconds));
    return success(c, outcome, 201);
  });

  return router;
}
