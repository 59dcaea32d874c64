/**
 * API Module - Barrel Export
 *
 * The HTTP API is a Hono application built around a CoachingService. The
 * server entry point (./server.ts) is not exported here since importing it
 * starts listening.
 *
 * @example
 * ```typescript
 * import { createApp } from '@/api';
 *
 * const app = createApp({ service });
 * const res = await app.request('/api/status');
 * ```
 */

export { createApp, type AppDependencies, type AppOptions } from './app';

export * from './middleware';

export {
  createApiRouter,
  healthRoutes,
  coachRoutes,
  conversationsRoutes,
  APP_VERSION,
  type ApiInfo,
  type ApiRouterDependencies,
  type HealthCheckData,
} from './routes';

export {
  coachTurnSchema,
  historyQuerySchema,
  type ApiResponse,
  type ApiResult,
  type ValidationErrorDetail,
  type CoachTurnInput,
  type HistoryQuery,
} from './types';

export { success, error, badRequest } from './utils/response';
