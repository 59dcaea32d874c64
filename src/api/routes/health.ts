/**
 * Health Check Route
 *
 * Liveness endpoint for monitoring. It never contacts the inference backend
 * (GET /api/status does), so it stays fast while a model is loading.
 *
 * ```bash
 * curl http://localhost:3001/health
 * # {"success":true,"data":{"status":"ok","version":"0.1.0","uptimeSeconds":42,"activeConversations":3}}
 * ```
 */

import { Hono } from 'hono';
import type { CoachingService } from '@/core/coaching';
import { success } from '../utils/response';

export interface HealthCheckData {
  status: 'ok';
  version: string;
  /** Whole seconds since the process started */
  uptimeSeconds: number;
  /** Conversations held in memory right now */
  activeConversations: number;
}

/** Kept in step with package.json */
export const APP_VERSION = '0.1.0';

export interface HealthRouteDependencies {
  service: CoachingService;
}

/**
 * Creates the health router, mounted at /health.
 */
export function healthRoutes({ service }: HealthRouteDependencies): Hono {
  const router = new Hono();

  router.get('/', (c) => {
    const data: HealthCheckData = {
      status: 'ok',
      version: APP_VERSION,
      uptimeSeconds: Math.floor(process.uptime()),
      activeConversations: service.activeConversations(),
    };
    return success(c, data);
  });

  return router;
}
