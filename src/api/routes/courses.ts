/**
 * Course Routes
 *
 * - GET /api/courses   list courses with their topics
 */

import { Hono } from 'hono';
import type { CourseRepository } from '@/storage/repositories';
import { success } from '../utils/response';

export function coursesRoutes(courses: CourseRepository): Hono {
  const router = new Hono();

  router.get('/', async (c) => {
    return success(c, await courses.findAll());
  });

  return router;
}
