/**
 * CORS Middleware Configuration for the Fluency Coach API
 *
 * Allows browser clients on the listed origins to call the API. In
 * production the origins come from the ALLOWED_ORIGINS environment variable.
 *
 * @example
 * ```typescript
 * const app = new Hono();
 * app.use('*', corsMiddleware());
 * ```
 */

import { cors } from 'hono/cors';
import type { MiddlewareHandler } from 'hono';

export interface CorsConfig {
  /** Origins allowed to make cross-origin requests */
  allowedOrigins: string[];
  allowedMethods: string[];
  allowedHeaders: string[];
  /** How long preflight results can be cached, in seconds */
  maxAge: number;
}

const DEFAULT_CORS_CONFIG: CorsConfig = {
  allowedOrigins: ['http://localhost:5173', 'http://127.0.0.1:5173', 'http://localhost:4173'],
  allowedMethods: ['GET', 'POST', 'PUT', 'OPTIONS'],
  allowedHeaders: ['Content-Type', 'X-Request-ID'],
  maxAge: 86400,
};

export function corsMiddleware(config: Partial<CorsConfig> = {}): MiddlewareHandler {
  const finalConfig: CorsConfig = {
    ...DEFAULT_CORS_CONFIG,
    ...config,
  };

  return cors({
    origin: finalConfig.allowedOrigins,
    allowMethods: finalConfig.allowedMethods,
    allowHeaders: finalConfig.allowedHeaders,
    maxAge: finalConfig.maxAge,
  });
}

/**
 * Reads allowed origins from ALLOWED_ORIGINS (comma-separated).
 * Falls back to the development defaults with a warning.
 */
export function getProductionCorsConfig(env: Record<string, string | undefined> = process.env): Partial<CorsConfig> {
  const originsEnv = env.ALLOWED_ORIGINS;

  if (!originsEnv) {
    console.warn('[CORS] No ALLOWED_ORIGINS env var set, using development defaults');
    return {};
  }

  return {
    allowedOrigins: originsEnv
      .split(',')
      .map((origin) => origin.trim())
      .filter((origin) => origin.length > 0),
  };
}

export { DEFAULT_CORS_CONFIG };
