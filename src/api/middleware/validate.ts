/**
 * Zod Validation Middleware
 *
 * Validates the JSON body or the query string of a request against a zod
 * schema. Valid input is stored on the context; invalid input is answered
 * with a 400 and field-level details.
 *
 * The stored value is typed through the middleware's Env, so handlers
 * chained after it read it without casting:
 *
 * @example
 * ```typescript
 * const turnSchema = z.object({ utterance: z.string() });
 *
 * router.post('/turns', validate(turnSchema), async (c) => {
 *   const { utterance } = c.get('validatedBody'); // string
 *   return success(c, await service.converse({ utterance }), 201);
 * });
 * ```
 *
 * Error response for invalid input:
 * ```json
 * {
 *   "success": false,
 *   "error": {
 *     "code": "VALIDATION_ERROR",
 *     "message": "Invalid request body",
 *     "details": [{ "path": "utterance", "message": "Required" }]
 *   }
 * }
 * ```
 */

import type { MiddlewareHandler } from 'hono';
import { z } from 'zod';
import type { ValidationErrorDetail } from '../types';
import { ErrorCodes, type ApiErrorResponse } from './error-handler';

function toDetails(error: z.ZodError): ValidationErrorDetail[] {
  return error.errors.map((e) => ({
    path: e.path.join('.'),
    message: e.message,
  }));
}

function validationFailure(message: string, error: z.ZodError): ApiErrorResponse {
  return {
    success: false,
    error: {
      code: ErrorCodes.VALIDATION_ERROR,
      message,
      details: toDetails(error),
    },
  };
}

/**
 * Validates the JSON request body and stores it as `validatedBody`.
 */
export function validate<T extends z.ZodTypeAny>(
  schema: T
): MiddlewareHandler<{ Variables: { validatedBody: z.infer<T> } }> {
  return async (c, next) => {
    let body: unknown;
    try {
      body = await c.req.json();
    } catch {
      const response: ApiErrorResponse = {
        success: false,
        error: {
          code: ErrorCodes.INVALID_JSON,
          message: 'Request body must be valid JSON',
        },
      };
      return c.json(response, 400);
    }

    const result = schema.safeParse(body);
    if (!result.success) {
      return c.json(validationFailure('Invalid request body', result.error), 400);
    }

    c.set('validatedBody', result.data);
    await next();
  };
}

/**
 * Validates the query string and stores it as `validatedQuery`.
 *
 * @example
 * ```typescript
 * const historyQuerySchema = z.object({
 *   limit: z.coerce.number().int().min(1).max(100).optional(),
 * });
 *
 * router.get('/:id/history', validateQuery(historyQuerySchema), (c) => {
 *   const { limit } = c.get('validatedQuery');
 * });
 * ```
 */
export function validateQuery<T extends z.ZodTypeAny>(
  schema: T
): MiddlewareHandler<{ Variables: { validatedQuery: z.infer<T> } }> {
  return async (c, next) => {
    const result = schema.safeParse(c.req.query());
    if (!result.success) {
      return c.json(validationFailure('Invalid query parameters', result.error), 400);
    }

    c.set('validatedQuery', result.data);
    await next();
  };
}
