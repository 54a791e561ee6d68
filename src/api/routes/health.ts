/**
 * Health Check Route
 *
 * GET /health answers 200 with the environment and version. Mounted at the
 * root rather than under /api, and skipped by the request logger.
 */

import { Hono } from 'hono';
import { success } from '../utils/response';

export interface HealthCheckData {
  status: 'ok';
  /** ISO 8601 */
  timestamp: string;
  environment: string;
  version: string;
}

export const APP_VERSION = '0.1.0';

export function healthRoutes(clock: () => Date = () => new Date()): Hono {
  const router = new Hono();

  router.get('/', (c) => {
    const healthData: HealthCheckData = {
      status: 'ok',
      timestamp: clock().toISOString(),
      environment: process.env.NODE_ENV ?? 'development',
      version: APP_VERSION,
    };
    return success(c, healthData);
  });

  return router;
}
