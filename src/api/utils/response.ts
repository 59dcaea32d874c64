/**
 * API Response Utilities
 *
 * Helpers that wrap handler results in the standard `{ success, data }`
 * envelope and build error responses in the same shape the global error
 * handler produces.
 *
 * @example
 * ```typescript
 * router.get('/:id/stats', async (c) => {
 *   const stats = await service.summary(c.req.param('id'));
 *   return success(c, stats);
 * });
 * ```
 */

import type { Context } from 'hono';
import type { ContentfulStatusCode } from 'hono/utils/http-status';
import type { ApiResponse, ApiErrorResponse } from '../types';

// ============================================================================
// Success Response Helper
// ============================================================================

/**
 * Creates a successful JSON response.
 *
 * @param statusCode - HTTP status (default 200, use 201 for created resources)
 */
export function success<T>(c: Context, data: T, statusCode: ContentfulStatusCode = 200): Response {
  const response: ApiResponse<T> = {
    success: true,
    data,
  };

  return c.json(response, statusCode);
}

// ============================================================================
// Error Response Helpers
// ============================================================================

/**
 * Creates an error JSON response.
 */
export function error(
  c: Context,
  code: string,
  message: string,
  statusCode: ContentfulStatusCode = 400,
  details?: unknown
): Response {
  const response: ApiErrorResponse = {
    success: false,
    error: {
      code,
      message,
      // Only include details if provided (avoids undefined in JSON)
      ...(details !== undefined && { details }),
    },
  };

  return c.json(response, statusCode);
}

export function badRequest(c: Context, message: string, details?: unknown): Response {
  return error(c, 'BAD_REQUEST', message, 400, details);
}
