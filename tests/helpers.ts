/**
 * Test Helpers Module
 *
 * Request builders, typed response readers and output collectors shared by
 * the API, integration and CLI tests.
 */

import type { Hono } from 'hono';
import { z } from 'zod';

// ============================================================================
// Response Schemas
// ============================================================================

export const errorEnvelopeSchema = z.object({
  success: z.literal(false),
  error: z.object({
    code: z.string(),
    message: z.string(),
    details: z.unknown().optional(),
  }),
});

/** Error envelope for failures raised by the coaching core */
export const coachingErrorSchema = z.object({
  success: z.literal(false),
  error: z.object({
    code: z.string(),
    message: z.string(),
    details: z
      .object({
        stage: z.string(),
        retryable: z.boolean(),
        conversationId: z.string().optional(),
        budget: z.number().optional(),
        minimumSize: z.number().optional(),
        timeoutMs: z.number().optional(),
        backendStatus: z.number().optional(),
      }),
  }),
});

/**
 * Schema for a `{ success: true, data }` envelope around `data`.
 */
export function successEnvelope<T extends z.ZodTypeAny>(data: T) {
  return z.object({ success: z.literal(true), data });
}

export const mistakeJsonSchema = z.object({
  category: z.string(),
  original: z.string(),
  corrected: z.string(),
  explanation: z.string(),
  turnSequence: z.number(),
  source: z.enum(['model', 'classifier']),
  recordedAt: z.string(),
});

export const proficiencyJsonSchema = z.object({
  level: z.enum(['beginner', 'intermediate', 'advanced']),
  errorRates: z.record(z.number()),
  overallErrorRate: z.number(),
  turnsObserved: z.number(),
  mistakeCount: z.number(),
});

export const turnJsonSchema = z.object({
  speaker: z.enum(['user', 'assistant']),
  text: z.string(),
  timestamp: z.string(),
  sequence: z.number(),
});

export const turnResponseSchema = successEnvelope(
  z.object({
    conversationId: z.string(),
    result: z.object({
      correctedText: z.string(),
      explanation: z.string(),
      replyText: z.string(),
      proficiency: proficiencyJsonSchema,
      mistakes: z.array(mistakeJsonSchema),
      parsed: z.boolean(),
    }),
  })
);

// ============================================================================
// Request Helpers
// ============================================================================

/**
 * Parses a response body against a schema; fails the test on a mismatch.
 */
export async function getJsonResponse<T extends z.ZodTypeAny>(
  response: Response,
  schema: T
): Promise<z.infer<T>> {
  return schema.parse(await response.json());
}

export function sendJson(app: Hono, method: 'POST' | 'PUT', path: string, body: unknown): Promise<Response> {
  return Promise.resolve(
    app.request(path, {
      method,
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(body),
    })
  );
}

export function postTurn(app: Hono, body: { conversationId?: string; utterance?: unknown }): Promise<Response> {
  return sendJson(app, 'POST', '/api/coach/turns', body);
}

// ============================================================================
// Output Helpers
// ============================================================================

/**
 * Removes ANSI colour codes so printed lines can be compared as plain text.
 */
export function stripAnsi(text: string): string {
  return text.replace(/\x1b\[[0-9;]*m/g, '');
}

/**
 * A Printer that keeps every line, with colours stripped.
 */
export function collectOutput(): { print: (line?: string) => void; lines: string[] } {
  const lines: string[] = [];
  return {
    print: (line = '') => {
      lines.push(stripAnsi(line));
    },
    lines,
  };
}
