/**
 * Request Logger Middleware
 *
 * One line per request once the response is ready:
 *
 *   [API] POST    /api/plans/plan_1/adapt 200 - 14ms
 *
 * Colors are on outside production. Health checks are not logged.
 */

import type { MiddlewareHandler } from 'hono';

export interface LoggerConfig {
  prefix: string;
  /** Paths whose requests are not logged (prefix match) */
  skipPaths: string[];
  colorize: boolean;
}

export const DEFAULT_LOGGER_CONFIG: LoggerConfig = {
  prefix: '[API]',
  skipPaths: ['/health'],
  colorize: process.env.NODE_ENV !== 'production',
};

const RESET = '\x1b[0m';
const DIM = '\x1b[2m';

const METHOD_COLORS: Record<string, string> = {
  GET: '\x1b[36m',
  POST: '\x1b[32m',
  PATCH: '\x1b[33m',
  PUT: '\x1b[33m',
  DELETE: '\x1b[31m',
};

function statusColor(status: number): string {
  if (status >= 500) return '\x1b[31m';
  if (status >= 400) return '\x1b[33m';
  return '\x1b[32m';
}

function formatDuration(ms: number): string {
  return ms < 1000 ? `${ms}ms` : `${(ms / 1000).toFixed(2)}s`;
}

/**
 * Formats one request line. Exported for tests.
 */
export function formatRequestLine(
  config: LoggerConfig,
  method: string,
  path: string,
  status: number,
  durationMs: number
): string {
  const duration = formatDuration(durationMs);
  if (!config.colorize) {
    return `${config.prefix} ${method} ${path} ${status} - ${duration}`;
  }
  const methodColor = METHOD_COLORS[method] ?? '\x1b[35m';
  return [
    config.prefix,
    `${methodColor}${method.padEnd(7)}${RESET}`,
    path,
    `${statusColor(status)}${status}${RESET}`,
    '-',
    `${DIM}${duration}${RESET}`,
  ].join(' ');
}

export function loggerMiddleware(config: Partial<LoggerConfig> = {}): MiddlewareHandler {
  const finalConfig: LoggerConfig = { ...DEFAULT_LOGGER_CONFIG, ...config };

  return async (c, next) => {
    const path = c.req.path;
    if (finalConfig.skipPaths.some((skip) => path.startsWith(skip))) {
      await next();
      return;
    }

    const startedAt = performance.now();
    await next();
    const duration = Math.round(performance.now() - startedAt);

    console.log(formatRequestLine(finalConfig, c.req.method, path, c.res.status, duration));
  };
}
