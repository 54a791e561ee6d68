/**
 * Response Helpers
 *
 * Build the success envelope and turn engine results into either a success
 * response or a thrown AppError for the error handler.
 *
 * @example
 * ```typescript
 * router.get('/:planId', async (c) => {
 *   const plan = unwrap(await engine.getPlan(c.req.param('planId')));
 *   return success(c, plan);
 * });
 * ```
 */

import type { Context } from 'hono';
import type { ContentfulStatusCode } from 'hono/utils/http-status';
import type { Result } from '@/core/result';
import { serviceError } from '../middleware/error-handler';
import type { ApiResponse } from '../types';

export function success<T>(c: Context, data: T, statusCode: ContentfulStatusCode = 200): Response {
  const response: ApiResponse<T> = { success: true, data };
  return c.json(response, statusCode);
}

/**
 * The value of a successful result. A failed result is thrown as the
 * matching AppError (404, 409 or 400).
 */
export function unwrap<T>(result: Result<T>): T {
  if (!result.ok) {
    throw serviceError(result.error);
  }
  return result.value;
}
