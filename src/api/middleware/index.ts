/**
 * API Middleware - Barrel Export
 *
 * Order in createApp: error handler (via `app.onError`), request logger, CORS.
 */

export { corsMiddleware, DEFAULT_CORS_CONFIG, type CorsConfig } from './cors';

export {
  errorHandler,
  AppError,
  ErrorCodes,
  notFoundError,
  serviceError,
  type ErrorCode,
} from './error-handler';

export { loggerMiddleware, formatRequestLine, DEFAULT_LOGGER_CONFIG, type LoggerConfig } from './logger';

export { validate, validateQuery } from './validate';
