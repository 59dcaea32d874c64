/**
 * Hono Application Factory
 *
 * Builds the API application around a CoachingService. Kept apart from the
 * server entry point so tests can drive the app through `app.request()`
 * without opening a port.
 *
 * Middleware is applied in this order:
 * 1. Logger - Logs all requests with timing
 * 2. CORS - Handles cross-origin requests
 * 3. Rate Limiters - General limit on /api, stricter limit on coaching turns
 *
 * Errors thrown by any handler are formatted by the global error handler.
 */

import { Hono } from 'hono';
import type { CoachingService } from '@/core/coaching';
import {
  corsMiddleware,
  errorHandler,
  generalRateLimiter,
  getProductionCorsConfig,
  llmRateLimiter,
  loggerMiddleware,
  type LoggerConfig,
} from './middleware';
import { createApiRouter, healthRoutes } from './routes';

export interface AppDependencies {
  service: CoachingService;
}

export interface AppOptions {
  /** Use ALLOWED_ORIGINS for CORS */
  isProduction?: boolean;
  /** Apply the rate limiters (default true) */
  rateLimit?: boolean;
  logger?: Partial<LoggerConfig>;
}

/**
 * Creates and configures the Hono application.
 */
export function createApp(deps: AppDependencies, options: AppOptions = {}): Hono {
  const app = new Hono();

  app.onError(errorHandler());

  app.use('*', loggerMiddleware(options.logger));

  const corsConfig = options.isProduction ? getProductionCorsConfig() : {};
  app.use('*', corsMiddleware(corsConfig));

  // Health check is mounted at root, not under /api
  app.route('/health', healthRoutes(deps));

  if (options.rateLimit ?? true) {
    app.use('/api/*', generalRateLimiter());
    // Each coaching turn calls the inference backend
    app.use('/api/coach/*', llmRateLimiter());
  }

  app.route('/api', createApiRouter(deps));

  app.notFound((c) => {
    return c.json(
      {
        success: false,
        error: {
          code: 'NOT_FOUND',
          message: `Route ${c.req.method} ${c.req.path} not found`,
        },
      },
      404
    );
  });

  return app;
}
