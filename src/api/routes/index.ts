/**
 * API Routes Aggregator
 *
 * Combines all API route modules into a single router.
 *
 * Route Structure:
 * - /health - Health check endpoint (mounted at root, not under /api)
 * - /api - API root with version info
 * - /api/coach - Coaching turns
 * - /api/conversations - History, proficiency, statistics, reset, snapshots
 * - /api/status - Inference backend status
 *
 * @example
 * ```typescript
 * const app = new Hono();
 * app.route('/health', healthRoutes({ service }));
 * app.route('/api', createApiRouter({ service }));
 * ```
 */

import { Hono } from 'hono';
import type { CoachingService } from '@/core/coaching';
import { success } from '../utils/response';
import { coachRoutes } from './coach';
import { conversationsRoutes } from './conversations';
import { APP_VERSION } from './health';

// Re-export individual route modules for direct access
export { healthRoutes, APP_VERSION, type HealthCheckData, type HealthRouteDependencies } from './health';
export { coachRoutes } from './coach';
export { conversationsRoutes } from './conversations';

export interface ApiRouterDependencies {
  service: CoachingService;
}

/**
 * API information returned by the root endpoint.
 */
export interface ApiInfo {
  name: string;
  version: string;
  endpoints: {
    path: string;
    description: string;
  }[];
}

/**
 * Creates the main API router with all routes mounted.
 */
export function createApiRouter(deps: ApiRouterDependencies): Hono {
  const router = new Hono();

  router.get('/', (c) => {
    const apiInfo: ApiInfo = {
      name: 'Fluency Coach API',
      version: APP_VERSION,
      endpoints: [
        { path: '/api/coach/turns', description: 'Submit an utterance for coaching' },
        { path: '/api/conversations/:id/history', description: 'Conversation history' },
        { path: '/api/conversations/:id/proficiency', description: 'Proficiency estimate' },
        { path: '/api/conversations/:id/stats', description: 'Mistake statistics' },
        { path: '/api/conversations/:id/reset', description: 'Reset a conversation' },
        { path: '/api/conversations/:id/snapshot', description: 'Export or import conversation state' },
        { path: '/api/status', description: 'Inference backend status' },
        { path: '/health', description: 'Health check endpoint' },
      ],
    };

    return success(c, apiInfo);
  });

  router.route('/coach', coachRoutes(deps));
  router.route('/conversations', conversationsRoutes(deps));

  /**
   * GET /status
   *
   * Probes the inference backend. Always 200; reachability is in the body.
   */
  router.get('/status', async (c) => {
    return success(c, await deps.service.status());
  });

  return router;
}
