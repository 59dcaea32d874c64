/**
 * API Response Types
 *
 * Standardized response type definitions for the Fluency Coach API.
 * All API endpoints return responses conforming to these types:
 *
 * 1. ApiResponse<T> - For successful responses with typed data
 * 2. ApiErrorResponse - For error responses with structured error info
 *
 * @example
 * ```typescript
 * // Success response
 * const response: ApiResponse<MistakeSummary> = {
 *   success: true,
 *   data: { totalTurns: 4, correctionsMade: 2, ... }
 * };
 *
 * // Error response
 * const error: ApiErrorResponse = {
 *   success: false,
 *   error: {
 *     code: 'BACKEND_TIMEOUT',
 *     message: 'Inference backend did not respond within 30000ms.',
 *   }
 * };
 * ```
 */

import { z } from 'zod';
import type { ApiErrorResponse } from './middleware/error-handler';

export type { ApiErrorResponse };

// ============================================================================
// Response Types
// ============================================================================

/**
 * Standard success response wrapper for API endpoints.
 *
 * @typeParam T - The type of data being returned
 */
export interface ApiResponse<T> {
  /** Indicates the request was successful */
  success: true;
  /** The response payload with type T */
  data: T;
}

/**
 * Union type for any API response (success or error).
 */
export type ApiResult<T> = ApiResponse<T> | ApiErrorResponse;

/**
 * Structure for individual validation error details.
 */
export interface ValidationErrorDetail {
  /** Dot-notation path to the invalid field (e.g., 'memory.turns.0.sequence') */
  path: string;
  /** Human-readable description of the validation failure */
  message: string;
}

// ============================================================================
// Request Schemas (Zod)
// ============================================================================

/**
 * Schema for submitting a learner utterance.
 *
 * Blank utterances pass this schema and are rejected by the orchestrator,
 * which answers with the same 400 VALIDATION_ERROR.
 */
export const coachTurnSchema = z.object({
  /** Omit to start a new conversation */
  conversationId: z.string().min(1).max(200).optional(),
  utterance: z.string().max(4000),
});

export type CoachTurnInput = z.infer<typeof coachTurnSchema>;

/**
 * Query parameters for the history endpoint.
 */
export const historyQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(500).optional(),
});

export type HistoryQuery = z.infer<typeof historyQuerySchema>;
