/**
 * API Middleware - Barrel Export
 *
 * @example
 * ```typescript
 * import { corsMiddleware, errorHandler, loggerMiddleware } from '@/api/middleware';
 * ```
 */

// CORS middleware for cross-origin request handling
export {
  corsMiddleware,
  getProductionCorsConfig,
  DEFAULT_CORS_CONFIG,
  type CorsConfig,
} from './cors';

// Error handler for consistent error responses
export {
  errorHandler,
  formatErrorResponse,
  statusForCoachingError,
  AppError,
  ErrorCodes,
  type ErrorCode,
  type ApiErrorResponse,
} from './error-handler';

// Request logger
export { loggerMiddleware, formatResponseTime, DEFAULT_LOGGER_CONFIG, type LoggerConfig } from './logger';

// Rate limiter for API protection
export {
  rateLimiter,
  generalRateLimiter,
  llmRateLimiter,
  RATE_LIMITS,
  type RateLimitConfig,
} from './rate-limit';

// Request validation with Zod schemas
export { validate, validateQuery } from './validate';
