/**
 * API Module
 *
 * The Hono application factory plus the pieces it is built from, for tests
 * and embedders.
 */

export { createApp, startServer, findAvailablePort, type AppOptions } from './server';

export {
  corsMiddleware,
  DEFAULT_CORS_CONFIG,
  type CorsConfig,
  errorHandler,
  AppError,
  ErrorCodes,
  notFoundError,
  serviceError,
  type ErrorCode,
  loggerMiddleware,
  formatRequestLine,
  DEFAULT_LOGGER_CONFIG,
  type LoggerConfig,
  validate,
  validateQuery,
} from './middleware';

export {
  createApiRouter,
  healthRoutes,
  toPredictionResponse,
  APP_VERSION,
  type ApiDependencies,
  type ApiInfo,
  type HealthCheckData,
  type PredictionResponse,
} from './routes';

export type { ApiResponse, ApiError, ApiErrorResponse, ApiResult, ValidationErrorDetail } from './types';

export { success, unwrap } from './utils/response';
