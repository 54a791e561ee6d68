/**
 * Middleware Tests
 *
 * The error handler and request validation on a bare Hono app, and the
 * request log line format.
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { Hono } from 'hono';
import { z } from 'zod';
import {
  AppError,
  DEFAULT_LOGGER_CONFIG,
  errorHandler,
  formatRequestLine,
  serviceError,
  validateQuery,
} from '../../src/api';
import { getJsonResponse, type ErrorBody } from '../helpers';

describe('errorHandler', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  function appThrowing(error: unknown): Hono {
    const app = new Hono();
    app.onError(errorHandler());
    app.get('/boom', () => {
      throw error;
    });
    return app;
  }

  it('should answer an AppError with its status and details', async () => {
    const app = appThrowing(new AppError('BAD_REQUEST', 'Nope', 400, { field: 'x' }));

    const response = await app.request('/boom');
    const json = await getJsonResponse<ErrorBody>(response);

    expect(response.status).toBe(400);
    expect(json).toEqual({ success: false, error: { code: 'BAD_REQUEST', message: 'Nope', details: { field: 'x' } } });
  });

  it('should answer an unexpected error with 500 and log it', async () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const app = appThrowing(new Error('disk on fire'));

    const response = await app.request('/boom');
    const json = await getJsonResponse<ErrorBody>(response);

    expect(response.status).toBe(500);
    expect(json.error.code).toBe('INTERNAL_ERROR');
    expect(json.error.message).toBe('disk on fire');
    expect(errorSpy).toHaveBeenCalledTimes(1);
  });

  it('should map a write conflict to 409', async () => {
    const app = appThrowing(serviceError({ kind: 'conflict', resource: 'plan', id: 'plan-1', attempts: 2 }));

    const response = await app.request('/boom');
    const json = await getJsonResponse<ErrorBody>(response);

    expect(response.status).toBe(409);
    expect(json.error).toEqual({
      code: 'CONFLICT',
      message: 'plan plan-1 was modified concurrently; gave up after 2 attempts',
      details: { resource: 'plan', id: 'plan-1', attempts: 2 },
    });
  });
});

describe('validateQuery', () => {
  const app = new Hono();
  app.get('/items', validateQuery(z.object({ limit: z.coerce.number().int().max(50) })), (c) => {
    return c.json({ limit: c.get('validatedQuery').limit });
  });

  it('should pass the coerced query to the handler', async () => {
    const response = await app.request('/items?limit=20');

    expect(await response.json()).toEqual({ limit: 20 });
  });

  it('should list each invalid parameter', async () => {
    const response = await app.request('/items?limit=80');
    const json = await getJsonResponse<ErrorBody>(response);

    expect(response.status).toBe(400);
    expect(json.error.details).toEqual([{ path: 'limit', message: 'Number must be less than or equal to 50' }]);
  });
});

describe('formatRequestLine', () => {
  const plain = { ...DEFAULT_LOGGER_CONFIG, colorize: false };

  it('should print milliseconds below one second', () => {
    expect(formatRequestLine(plain, 'GET', '/api/plans/p1', 200, 14)).toBe('[API] GET /api/plans/p1 200 - 14ms');
  });

  it('should print seconds from one second on', () => {
    expect(formatRequestLine(plain, 'POST', '/api/plans', 201, 1530)).toBe('[API] POST /api/plans 201 - 1.53s');
  });

  it('should pad and color the method when colorized', () => {
    const line = formatRequestLine({ ...plain, colorize: true }, 'GET', '/api', 404, 3);

    expect(line).toBe('[API] \x1b[36mGET    \x1b[0m /api \x1b[33m404\x1b[0m - \x1b[2m3ms\x1b[0m');
  });
});
