/**
 * Coach API Routes
 *
 * Endpoints:
 * - POST /coach/turns - Submit a learner utterance and receive the coaching result
 *
 * A request without `conversationId` starts a new conversation; the
 * generated id is returned alongside the result and should be sent with
 * every following turn.
 *
 * The request is aborted when the client disconnects, which cancels the turn
 * (TurnCancelledError, reported as 499).
 */

import { Hono } from 'hono';
import type { CoachingService } from '@/core/coaching';
import { validate } from '../middleware/validate';
import { coachTurnSchema } from '../types';
import { success } from '../utils/response';

export interface CoachRouteDependencies {
  service: CoachingService;
}

/**
 * Creates the coach router, mounted at /api/coach.
 *
 * @example
 * ```bash
 * curl -X POST http://localhost:3001/api/coach/turns \
 *   -H 'Content-Type: application/json' \
 *   -d '{"utterance": "I am go market yesterday"}'
 *
 * # 201
 * # {
 * #   "success": true,
 * #   "data": {
 * #     "conversationId": "conv_5f0c...",
 * #     "result": {
 * #       "correctedText": "I went to the market yesterday.",
 * #       "explanation": "...",
 * #       "replyText": "...",
 * #       "proficiency": { "level": "beginner", ... },
 * #       "mistakes": [{ "category": "tense", ... }],
 * #       "parsed": true
 * #     }
 * #   }
 * # }
 * ```
 */
export function coachRoutes({ service }: CoachRouteDependencies): Hono {
  const router = new Hono();

  router.post('/turns', validate(coachTurnSchema), async (c) => {
    const { conversationId, utterance } = c.get('validatedBody');

    const response = await service.converse(
      { conversationId, utterance },
      { signal: c.req.raw.signal }
    );

    return success(c, response, 201);
  });

  return router;
}
