/**
 * API Routes Aggregator
 *
 * Combines the route modules into the router mounted at /api. The health
 * check is mounted separately at the root.
 *
 * @example
 * ```typescript
 * const app = new Hono();
 * app.route('/health', healthRoutes());
 * app.route('/api', createApiRouter({ engine, repository }));
 * ```
 */

import { Hono } from 'hono';
import type { StudyEngine } from '@/core/engine';
import type { SqliteStudyRepository } from '@/storage/repositories';
import { success } from '../utils/response';
import { APP_VERSION } from './health';
import { plansRoutes } from './plans';
import { learnersRoutes } from './learners';
import { flashcardsRoutes } from './flashcards';
import { activityRoutes, progressRoutes } from './activity';
import { coursesRoutes } from './courses';

export { healthRoutes, APP_VERSION, type HealthCheckData } from './health';
export { toPredictionResponse, type PredictionResponse } from './learners';

export interface ApiDependencies {
  engine: StudyEngine;
  /** Backing store of the engine; listing routes read it directly */
  repository: SqliteStudyRepository;
}

export interface ApiInfo {
  name: string;
  version: string;
  endpoints: {
    path: string;
    description: string;
  }[];
}

const API_INFO: ApiInfo = {
  name: 'Study Planner API',
  version: APP_VERSION,
  endpoints: [
    { path: '/api/plans', description: 'Generate, adapt and override study plans' },
    { path: '/api/learners', description: 'Performance analysis, predictions, review queues and review load' },
    { path: '/api/courses', description: 'Courses and their topics' },
    { path: '/api/flashcards/:cardId/reviews', description: 'Flashcard reviews' },
    { path: '/api/activity', description: 'Quiz attempts and study session logs' },
    { path: '/api/progress', description: 'Topic mastery' },
    { path: '/health', description: 'Health check' },
  ],
};

export function createApiRouter({ engine, repository }: ApiDependencies): Hono {
  const router = new Hono();

  router.get('/', (c) => success(c, API_INFO));

  router.route('/plans', plansRoutes(engine, repository.plans));
  router.route('/learners', learnersRoutes(engine, repository.learners));
  router.route('/courses', coursesRoutes(repository.courses));
  router.route('/flashcards', flashcardsRoutes(engine));
  router.route('/activity', activityRoutes(engine));
  router.route('/progress', progressRoutes(engine));

  return router;
}
