/**
 * CORS Middleware
 *
 * Wraps Hono's `cors()` with the project's defaults. Allowed origins come
 * from `ALLOWED_ORIGINS` (see config.ts); when it is empty, local dashboard
 * origins are allowed.
 *
 * @example
 * ```typescript
 * app.use('*', corsMiddleware({ allowedOrigins: config.cors.allowedOrigins }));
 * ```
 */

import { cors } from 'hono/cors';
import type { MiddlewareHandler } from 'hono';

export interface CorsConfig {
  allowedOrigins: string[];
  allowedMethods: string[];
  allowedHeaders: string[];
  /** Preflight cache duration, seconds */
  maxAge: number;
}

export const DEFAULT_CORS_CONFIG: CorsConfig = {
  allowedOrigins: ['http://localhost:5173', 'http://127.0.0.1:5173', 'http://localhost:4173'],
  allowedMethods: ['GET', 'POST', 'PATCH', 'OPTIONS'],
  allowedHeaders: ['Content-Type', 'X-Request-ID'],
  maxAge: 86400,
};

export function corsMiddleware(config: Partial<CorsConfig> = {}): MiddlewareHandler {
  const allowedOrigins =
    config.allowedOrigins && config.allowedOrigins.length > 0
      ? config.allowedOrigins
      : DEFAULT_CORS_CONFIG.allowedOrigins;
  const finalConfig: CorsConfig = { ...DEFAULT_CORS_CONFIG, ...config, allowedOrigins };

  return cors({
    origin: finalConfig.allowedOrigins,
    allowMethods: finalConfig.allowedMethods,
    allowHeaders: finalConfig.allowedHeaders,
    maxAge: finalConfig.maxAge,
  });
}
