/**
 * Rate Limiting Middleware for the Fluency Coach API
 *
 * Fixed-window, in-memory rate limiting per client. Two presets:
 *
 * 1. General endpoints: 1000 requests per minute
 * 2. Coaching turns: 100 requests per minute, since each one runs an
 *    inference call
 *
 * Clients are keyed by the first X-Forwarded-For address, then X-Real-IP.
 * Each limiter keeps its own counters. A blocked request gets a 429 with a
 * Retry-After header.
 *
 * @example
 * ```typescript
 * app.use('/api/*', generalRateLimiter());
 * app.use('/api/coach/*', llmRateLimiter());
 * ```
 */

import type { MiddlewareHandler, Context } from 'hono';

export interface RateLimitConfig {
  /** Window length in milliseconds */
  windowMs: number;
  /** Requests allowed per client per window */
  maxRequests: number;
  keyGenerator?: (c: Context) => string;
  message?: string;
  /** Requests for which this returns true are not counted */
  skip?: (c: Context) => boolean;
}

interface RateLimitEntry {
  count: number;
  windowStart: number;
}

export const RATE_LIMITS = {
  GENERAL: {
    windowMs: 60_000,
    maxRequests: 1000,
  },
  LLM: {
    windowMs: 60_000,
    maxRequests: 100,
  },
} as const;

function defaultKeyGenerator(c: Context): string {
  const forwardedFor = c.req.header('x-forwarded-for');
  if (forwardedFor) {
    return forwardedFor.split(',')[0].trim();
  }

  return c.req.header('x-real-ip') ?? 'unknown-client';
}

export function rateLimiter(config: RateLimitConfig): MiddlewareHandler {
  const {
    windowMs,
    maxRequests,
    keyGenerator = defaultKeyGenerator,
    message = 'Too many requests. Please try again later.',
    skip,
  } = config;

  const store = new Map<string, RateLimitEntry>();

  // Drop expired windows every five minutes; unref so it never holds the process open
  const cleanupInterval = setInterval(() => {
    const now = Date.now();
    for (const [key, entry] of store) {
      if (now - entry.windowStart >= windowMs) store.delete(key);
    }
  }, 5 * 60 * 1000);
  cleanupInterval.unref();

  return async (c, next) => {
    if (skip?.(c)) {
      return next();
    }

    const now = Date.now();
    const clientKey = keyGenerator(c);

    let entry = store.get(clientKey);
    if (!entry || now - entry.windowStart >= windowMs) {
      entry = { count: 0, windowStart: now };
      store.set(clientKey, entry);
    }

    c.header('X-RateLimit-Limit', String(maxRequests));
    c.header('X-RateLimit-Remaining', String(Math.max(0, maxRequests - entry.count - 1)));
    c.header('X-RateLimit-Reset', String(Math.ceil((entry.windowStart + windowMs) / 1000)));

    if (entry.count >= maxRequests) {
      const retryAfter = Math.ceil((entry.windowStart + windowMs - now) / 1000);
      c.header('Retry-After', String(retryAfter));

      return c.json(
        {
          success: false,
          error: {
            code: 'RATE_LIMITED',
            message,
            details: { retryAfter },
          },
        },
        429
      );
    }

    entry.count++;
    return next();
  };
}

export function generalRateLimiter(overrides?: Partial<RateLimitConfig>): MiddlewareHandler {
  return rateLimiter({ ...RATE_LIMITS.GENERAL, ...overrides });
}

/**
 * Rate limiter for endpoints that call the inference backend.
 */
export function llmRateLimiter(overrides?: Partial<RateLimitConfig>): MiddlewareHandler {
  return rateLimiter({ ...RATE_LIMITS.LLM, ...overrides });
}
