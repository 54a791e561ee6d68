/**
 * Global Error Handler
 *
 * Turns anything a route throws into the standard error envelope:
 *
 * ```json
 * { "success": false, "error": { "code": "ERROR_CODE", "message": "...", "details": { ... } } }
 * ```
 *
 * Hono routes handler errors to `app.onError`, so the handler is installed
 * there rather than as a `use()` middleware:
 *
 * @example
 * ```typescript
 * const app = new Hono();
 * app.onError(errorHandler());
 *
 * app.get('/plans/:id', async (c) => {
 *   throw new AppError('NOT_FOUND', 'Plan not found', 404);
 * });
 * ```
 */

import type { ErrorHandler } from 'hono';
import type { ContentfulStatusCode } from 'hono/utils/http-status';
import type { ServiceError } from '@/core/result';
import type { ApiErrorResponse } from '../types';

/**
 * Standard error codes used throughout the API.
 */
export const ErrorCodes = {
  // Client errors (4xx)
  BAD_REQUEST: 'BAD_REQUEST',
  NOT_FOUND: 'NOT_FOUND',
  VALIDATION_ERROR: 'VALIDATION_ERROR',
  INVALID_JSON: 'INVALID_JSON',
  CONFLICT: 'CONFLICT',

  // Server errors (5xx)
  INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/**
 * An error with a known HTTP status. Throw it from a route and the error
 * handler answers with its code, message and details.
 *
 * @example
 * ```typescript
 * throw new AppError('VALIDATION_ERROR', 'Invalid request body', 400, details);
 * ```
 */
export class AppError extends Error {
  /** Machine-readable error code */
  public readonly code: ErrorCode;
  public readonly statusCode: ContentfulStatusCode;
  public readonly details?: unknown;

  constructor(code: ErrorCode, message: string, statusCode: ContentfulStatusCode = 500, details?: unknown) {
    super(message);
    this.name = 'AppError';
    this.code = code;
    this.statusCode = statusCode;
    this.details = details;

    Error.captureStackTrace?.(this, AppError);
  }
}

function formatErrorResponse(error: unknown): {
  response: ApiErrorResponse;
  statusCode: ContentfulStatusCode;
} {
  if (error instanceof AppError) {
    return {
      response: {
        success: false,
        error: {
          code: error.code,
          message: error.message,
          ...(error.details !== undefined && { details: error.details }),
        },
      },
      statusCode: error.statusCode,
    };
  }

  // Unexpected errors keep their message outside production
  const isDev = process.env.NODE_ENV !== 'production';
  const message = error instanceof Error ? error.message : String(error);

  return {
    response: {
      success: false,
      error: {
        code: ErrorCodes.INTERNAL_ERROR,
        message: isDev ? message : 'An unexpected error occurred. Please try again.',
        ...(isDev && error instanceof Error && { details: { stack: error.stack } }),
      },
    },
    statusCode: 500,
  };
}

/**
 * Creates the handler for `app.onError`. Server errors are logged with their
 * stack; client errors are answered without logging.
 */
export function errorHandler(): ErrorHandler {
  return (error, c) => {
    const { response, statusCode } = formatErrorResponse(error);
    if (statusCode >= 500) {
      console.error('[Error Handler]', error);
    }
    return c.json(response, statusCode);
  };
}

export function notFoundError(resource: string, id: string): AppError {
  return new AppError(ErrorCodes.NOT_FOUND, `${resource} with ID '${id}' not found`, 404, { resource, id });
}

/**
 * Maps an expected engine failure onto its HTTP error:
 * not_found is 404, conflict is 409 and invalid_request is 400.
 */
export function serviceError(error: ServiceError): AppError {
  switch (error.kind) {
    case 'not_found':
      return notFoundError(error.resource, error.id);
    case 'conflict':
      return new AppError(
        ErrorCodes.CONFLICT,
        `${error.resource} ${error.id} was modified concurrently; gave up after ${error.attempts} attempts`,
        409,
        { resource: error.resource, id: error.id, attempts: error.attempts }
      );
    case 'invalid_request':
      return new AppError(ErrorCodes.BAD_REQUEST, error.message, 400);
  }
}
