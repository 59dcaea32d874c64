/**
 * Global Error Handler for the Fluency Coach API
 *
 * Turns every error thrown by a route into the standard JSON error envelope:
 *
 * ```json
 * {
 *   "success": false,
 *   "error": {
 *     "code": "ERROR_CODE",
 *     "message": "Human-readable error message",
 *     "details": { ... }
 *   }
 * }
 * ```
 *
 * Coaching errors keep their own code and map to an HTTP status:
 *
 * | Error                  | Status |
 * |------------------------|--------|
 * | ValidationError        | 400    |
 * | PromptTooLargeError    | 413    |
 * | TurnCancelledError     | 499    |
 * | BackendConnectionError | 502    |
 * | BackendTimeoutError    | 504    |
 * | StorageError           | 500    |
 *
 * @example
 * ```typescript
 * const app = new Hono();
 * app.onError(errorHandler());
 *
 * app.get('/protected', () => {
 *   throw new AppError('UNAUTHORIZED', 'Authentication required', 401);
 * });
 * ```
 */

import type { Context, ErrorHandler } from 'hono';
import {
  BackendConnectionError,
  BackendTimeoutError,
  CoachingError,
  PromptTooLargeError,
  TurnCancelledError,
  ValidationError,
} from '@/core/errors';

/**
 * Standard error codes used throughout the API.
 */
export const ErrorCodes = {
  // Client errors (4xx)
  BAD_REQUEST: 'BAD_REQUEST',
  NOT_FOUND: 'NOT_FOUND',
  VALIDATION_ERROR: 'VALIDATION_ERROR',
  INVALID_JSON: 'INVALID_JSON',
  RATE_LIMITED: 'RATE_LIMITED',

  // Server errors (5xx)
  INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/**
 * Standardized API error response structure.
 */
export interface ApiErrorResponse {
  success: false;
  error: {
    code: ErrorCode | CoachingError['code'] | string;
    message: string;
    details?: unknown;
  };
}

/**
 * Application error for controlled failures in route handlers.
 *
 * @example
 * ```typescript
 * throw new AppError('NOT_FOUND', 'Conversation not found', 404);
 * ```
 */
export class AppError extends Error {
  /** Machine-readable error code */
  public readonly code: ErrorCode | string;
  /** HTTP status code to return */
  public readonly statusCode: number;
  /** Additional error context (optional) */
  public readonly details?: unknown;

  constructor(code: ErrorCode | string, message: string, statusCode: number = 500, details?: unknown) {
    super(message);
    this.name = 'AppError';
    this.code = code;
    this.statusCode = statusCode;
    this.details = details;

    // Maintains proper stack trace for where error was thrown (V8 engines)
    Error.captureStackTrace?.(this, AppError);
  }
}

/**
 * HTTP status for a coaching error.
 */
export function statusForCoachingError(error: CoachingError): number {
  if (error instanceof ValidationError) return 400;
  if (error instanceof PromptTooLargeError) return 413;
  // Non-standard "client closed request"
  if (error instanceof TurnCancelledError) return 499;
  if (error instanceof BackendTimeoutError) return 504;
  if (error instanceof BackendConnectionError) return 502;
  return 500;
}

function coachingErrorDetails(error: CoachingError): Record<string, unknown> {
  const details: Record<string, unknown> = {
    stage: error.stage,
    retryable: error.retryable,
  };
  if (error.conversationId !== undefined) details.conversationId = error.conversationId;
  if (error instanceof PromptTooLargeError) {
    details.budget = error.budget;
    details.minimumSize = error.minimumSize;
  }
  if (error instanceof BackendTimeoutError) details.timeoutMs = error.timeoutMs;
  if (error instanceof BackendConnectionError && error.statusCode !== undefined) {
    details.backendStatus = error.statusCode;
  }
  return details;
}

/**
 * Formats an error into the standard API error response structure.
 */
export function formatErrorResponse(error: unknown): {
  response: ApiErrorResponse;
  statusCode: number;
} {
  if (error instanceof AppError) {
    return {
      response: {
        success: false,
        error: {
          code: error.code,
          message: error.message,
          ...(error.details !== undefined && { details: error.details }),
        },
      },
      statusCode: error.statusCode,
    };
  }

  if (error instanceof CoachingError) {
    return {
      response: {
        success: false,
        error: {
          code: error.code,
          message: error.message,
          details: coachingErrorDetails(error),
        },
      },
      statusCode: statusForCoachingError(error),
    };
  }

  const isDev = process.env.NODE_ENV !== 'production';

  // Unexpected errors
  if (error instanceof Error) {
    return {
      response: {
        success: false,
        error: {
          code: ErrorCodes.INTERNAL_ERROR,
          message: isDev ? error.message : 'An unexpected error occurred. Please try again.',
          ...(isDev && { details: { stack: error.stack } }),
        },
      },
      statusCode: 500,
    };
  }

  return {
    response: {
      success: false,
      error: {
        code: ErrorCodes.INTERNAL_ERROR,
        message: 'An unexpected error occurred',
        ...(isDev && { details: { rawError: String(error) } }),
      },
    },
    statusCode: 500,
  };
}

/**
 * Creates the application-wide error handler, registered with `app.onError`.
 *
 * Expected failures (AppError, coaching errors below 500) are logged as a
 * single line; anything else is logged with its stack.
 */
export function errorHandler(): ErrorHandler {
  return (error: Error, c: Context) => {
    const { response, statusCode } = formatErrorResponse(error);

    if (statusCode >= 500 && !(error instanceof CoachingError)) {
      console.error('[API] Unhandled error:', error);
    } else {
      console.warn(`[API] ${c.req.method} ${c.req.path} failed: ${response.error.code} ${error.message}`);
    }

    // Built directly so that non-standard statuses such as 499 pass through
    return new Response(JSON.stringify(response), {
      status: statusCode,
      headers: { 'Content-Type': 'application/json' },
    });
  };
}
