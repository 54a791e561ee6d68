/**
 * Study Planner API Server
 *
 * Builds the Hono application and serves it with @hono/node-server.
 *
 * - Automatic port discovery (the next free port when PORT is taken)
 * - CORS for the origins in ALLOWED_ORIGINS
 * - Request logging with response times
 * - Consistent JSON error responses
 *
 * Usage:
 *   npm run server
 *
 * Environment Variables:
 *   PORT            - Preferred port (default: 3000)
 *   DATABASE_PATH   - SQLite file (default: ./data/study-planner.db)
 *   ALLOWED_ORIGINS - Comma-separated list of allowed CORS origins
 */

import { createServer } from 'node:net';
import { fileURLToPath } from 'node:url';
import { Hono } from 'hono';
import { serve } from '@hono/node-server';
import { config, validateConfig } from '../config';
import { createRuntime } from '../runtime';
import { corsMiddleware, errorHandler, loggerMiddleware, ErrorCodes, type LoggerConfig } from './middleware';
import { createApiRouter, healthRoutes, type ApiDependencies } from './routes';
import type { ApiErrorResponse } from './types';

/** Highest port tried by {@link findAvailablePort}. */
const MAX_PORT_OFFSET = 100;

/**
 * Resolves to the first port from `preferredPort` up to `maxPort` that a
 * server can listen on.
 *
 * @throws Error if every port in the range is taken
 */
export async function findAvailablePort(
  preferredPort: number,
  maxPort: number = preferredPort + MAX_PORT_OFFSET
): Promise<number> {
  for (let port = preferredPort; port <= maxPort; port++) {
    const free = await new Promise<boolean>((resolve) => {
      const tester = createServer();
      tester.once('error', () => resolve(false));
      tester.listen(port, () => tester.close(() => resolve(true)));
    });
    if (free) return port;
    console.log(`[Server] Port ${port} is in use, trying ${port + 1}...`);
  }
  throw new Error(`No available port found in range ${preferredPort}-${maxPort}`);
}

export interface AppOptions {
  allowedOrigins?: string[];
  logger?: Partial<LoggerConfig>;
}

/**
 * Creates the Hono application.
 *
 * Errors thrown by any route reach `onError`; every request is then logged
 * and answered with CORS headers.
 */
export function createApp(dependencies: ApiDependencies, options: AppOptions = {}): Hono {
  const app = new Hono();

  app.onError(errorHandler());
  app.use('*', loggerMiddleware(options.logger));
  app.use('*', corsMiddleware({ allowedOrigins: options.allowedOrigins }));

  app.route('/health', healthRoutes());
  app.route('/api', createApiRouter(dependencies));

  app.notFound((c) => {
    const response: ApiErrorResponse = {
      success: false,
      error: {
        code: ErrorCodes.NOT_FOUND,
        message: `Route ${c.req.method} ${c.req.path} not found`,
      },
    };
    return c.json(response, 404);
  });

  return app;
}

export async function startServer(): Promise<void> {
  validateConfig(config);

  const runtime = createRuntime(config);
  const app = createApp(
    { engine: runtime.engine, repository: runtime.repository },
    { allowedOrigins: config.cors.allowedOrigins }
  );

  const port = await findAvailablePort(config.server.port);
  const server = serve({ fetch: app.fetch, port, hostname: config.server.host });

  console.log('');
  console.log(`[Server] Study Planner API on http://localhost:${port}`);
  console.log(`[Server] Environment: ${config.server.nodeEnv}`);
  console.log(`[Server] Database:    ${config.database.path}`);
  console.log('');

  const shutdown = (signal: string) => {
    console.log(`\n[Server] Received ${signal}, shutting down...`);
    server.close(() => {
      runtime.close();
      process.exit(0);
    });
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

// Only start when executed directly, not when imported by tests
if (process.argv[1] === fileURLToPath(import.meta.url)) {
  startServer().catch((error: unknown) => {
    console.error('[Server] Failed to start:', error);
    process.exit(1);
  });
}
