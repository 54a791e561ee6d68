/**
 * Request Validation Middleware
 *
 * Parses the JSON body or the query string with a Zod schema and stores the
 * result on the context. The stored value is typed from the schema, so a
 * handler placed after the middleware reads it without a cast:
 *
 * @example
 * ```typescript
 * router.post('/', validate(generatePlanSchema), async (c) => {
 *   const body = c.get('validatedBody'); // z.infer<typeof generatePlanSchema>
 *   ...
 * });
 * ```
 *
 * Failures answer 400 with a VALIDATION_ERROR listing each invalid field, or
 * INVALID_JSON when the body does not parse.
 */

import type { Context, MiddlewareHandler } from 'hono';
import type { z } from 'zod';
import { ErrorCodes } from './error-handler';
import type { ApiErrorResponse, ValidationErrorDetail } from '../types';

function validationFailure(c: Context, message: string, error: z.ZodError): Response {
  const details: ValidationErrorDetail[] = error.errors.map((issue) => ({
    path: issue.path.join('.'),
    message: issue.message,
  }));
  const response: ApiErrorResponse = {
    success: false,
    error: { code: ErrorCodes.VALIDATION_ERROR, message, details },
  };
  return c.json(response, 400);
}

export function validate<T extends z.ZodTypeAny>(
  schema: T
): MiddlewareHandler<{ Variables: { validatedBody: z.output<T> } }> {
  return async (c, next) => {
    let body: unknown;
    try {
      body = await c.req.json();
    } catch (err) {
      if (!(err instanceof SyntaxError)) throw err;
      const response: ApiErrorResponse = {
        success: false,
        error: { code: ErrorCodes.INVALID_JSON, message: 'Request body must be valid JSON' },
      };
      return c.json(response, 400);
    }

    const result = schema.safeParse(body);
    if (!result.success) {
      return validationFailure(c, 'Invalid request body', result.error);
    }

    c.set('validatedBody', result.data);
    await next();
  };
}

export function validateQuery<T extends z.ZodTypeAny>(
  schema: T
): MiddlewareHandler<{ Variables: { validatedQuery: z.output<T> } }> {
  return async (c, next) => {
    const result = schema.safeParse(c.req.query());
    if (!result.success) {
      return validationFailure(c, 'Invalid query parameters', result.error);
    }

    c.set('validatedQuery', result.data);
    await next();
  };
}
