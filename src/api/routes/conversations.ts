/**
 * Conversations API Routes
 *
 * Read and maintenance endpoints for a single conversation:
 * - GET  /conversations/:id/history?limit= - Retained turns, oldest first
 * - GET  /conversations/:id/proficiency    - Current proficiency estimate
 * - GET  /conversations/:id/stats          - Mistake summary statistics
 * - POST /conversations/:id/reset          - Clear memory, ledger and stored state
 * - GET  /conversations/:id/snapshot       - Export the full conversation state
 * - PUT  /conversations/:id/snapshot       - Replace the conversation state
 *
 * Unknown ids are not an error: they report an empty history and the default
 * proficiency, the same as a conversation that was just reset.
 */

import { Hono } from 'hono';
import type { CoachingService } from '@/core/coaching';
import { validateQuery } from '../middleware/validate';
import { historyQuerySchema } from '../types';
import { badRequest, success } from '../utils/response';

export interface ConversationRouteDependencies {
  service: CoachingService;
}

/**
 * Creates the conversations router, mounted at /api/conversations.
 */
export function conversationsRoutes({ service }: ConversationRouteDependencies): Hono {
  const router = new Hono();

  /**
   * GET /:id/history
   *
   * Response: { conversationId, turns: Turn[] }
   */
  router.get('/:id/history', validateQuery(historyQuerySchema), async (c) => {
    const conversationId = c.req.param('id');
    const { limit } = c.get('validatedQuery');

    const turns = await service.history(conversationId, limit);
    return success(c, { conversationId, turns });
  });

  router.get('/:id/proficiency', async (c) => {
    const conversationId = c.req.param('id');
    return success(c, await service.proficiency(conversationId));
  });

  router.get('/:id/stats', async (c) => {
    const conversationId = c.req.param('id');
    return success(c, await service.summary(conversationId));
  });

  router.post('/:id/reset', async (c) => {
    const conversationId = c.req.param('id');
    await service.reset(conversationId);
    return success(c, { conversationId, reset: true });
  });

  router.get('/:id/snapshot', async (c) => {
    const conversationId = c.req.param('id');
    return success(c, await service.exportSnapshot(conversationId));
  });

  /**
   * PUT /:id/snapshot
   *
   * Body: a snapshot as returned by GET /:id/snapshot. Its conversationId
   * must match the path.
   */
  router.put('/:id/snapshot', async (c) => {
    const conversationId = c.req.param('id');

    let body: unknown;
    try {
      body = await c.req.json();
    } catch {
      return badRequest(c, 'Request body must be valid JSON');
    }

    if (
      typeof body !== 'object' ||
      body === null ||
      !('conversationId' in body) ||
      body.conversationId !== conversationId
    ) {
      return badRequest(c, `Snapshot conversationId must be '${conversationId}'`);
    }

    await service.importSnapshot(body);
    return success(c, { conversationId, restored: true });
  });

  return router;
}
