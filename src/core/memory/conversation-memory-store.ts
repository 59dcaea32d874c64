/**
 * Conversation Memory Store
 *
 * Bounded, per-conversation turn history. Each conversation keeps at most
 * `maxRetainedTurns` turns; older turns are evicted first. Sequence numbers
 * are assigned by the store, start at 1 and keep counting across evictions,
 * so a turn's sequence never changes and never repeats.
 *
 * Appending with an explicit sequence is idempotent, which lets a caller
 * replay a turn after a crash without duplicating it.
 */

import { z } from 'zod';
import { ValidationError } from '../errors';
import type { ConversationId, NewTurn, Turn } from '../models';

export interface ConversationMemoryOptions {
  /** Maximum number of turns retained per conversation */
  maxRetainedTurns?: number;
}

export const DEFAULT_MAX_RETAINED_TURNS = 20;

/**
 * Serializable memory state for one conversation.
 */
export interface MemorySnapshot {
  conversationId: ConversationId;
  /** Sequence number the next appended turn will receive */
  nextSequence: number;
  /** Retained turns, oldest first */
  turns: Turn[];
}

const turnSchema = z.object({
  speaker: z.enum(['user', 'assistant']),
  text: z.string(),
  timestamp: z.coerce.date(),
  sequence: z.number().int().positive(),
});

export const memorySnapshotSchema = z
  .object({
    conversationId: z.string().min(1),
    nextSequence: z.number().int().positive(),
    turns: z.array(turnSchema),
  })
  .superRefine((snapshot, ctx) => {
    snapshot.turns.forEach((turn, index) => {
      const expected = snapshot.nextSequence - snapshot.turns.length + index;
      if (turn.sequence !== expected) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `expected sequence ${expected}, got ${turn.sequence}`,
          path: ['turns', index, 'sequence'],
        });
      }
    });
  });

interface MemoryState {
  turns: Turn[];
  nextSequence: number;
}

export class ConversationMemoryStore {
  private readonly conversations = new Map<ConversationId, MemoryState>();
  readonly maxRetainedTurns: number;

  constructor(options: ConversationMemoryOptions = {}) {
    const max = options.maxRetainedTurns ?? DEFAULT_MAX_RETAINED_TURNS;
    if (!Number.isInteger(max) || max < 1) {
      throw new ValidationError(`maxRetainedTurns must be a positive integer, got ${max}`, {
        stage: 'memory',
      });
    }
    this.maxRetainedTurns = max;
  }

  /**
   * Records a turn and returns it as stored.
   *
   * @throws ValidationError for an empty id, a non-string text, or an explicit
   *   sequence that is neither already recorded with the same content nor the
   *   next one
   */
  append(conversationId: ConversationId, input: NewTurn): Turn {
    if (typeof conversationId !== 'string' || conversationId.trim().length === 0) {
      throw new ValidationError('conversationId must be a non-empty string', { stage: 'memory' });
    }
    const context = { stage: 'memory' as const, conversationId };
    if (typeof input.text !== 'string') {
      throw new ValidationError('Turn text must be a string', context);
    }

    const state = this.conversations.get(conversationId) ?? { turns: [], nextSequence: 1 };

    if (input.sequence !== undefined && input.sequence !== state.nextSequence) {
      const existing = state.turns.find((turn) => turn.sequence === input.sequence);
      if (existing && existing.speaker === input.speaker && existing.text === input.text) {
        return existing;
      }
      throw new ValidationError(
        `Cannot append sequence ${input.sequence}; the next sequence is ${state.nextSequence}`,
        context
      );
    }

    const turn: Turn = Object.freeze({
      speaker: input.speaker,
      text: input.text,
      timestamp: input.timestamp ?? new Date(),
      sequence: state.nextSequence,
    });

    state.turns.push(turn);
    state.nextSequence += 1;
    if (state.turns.length > this.maxRetainedTurns) {
      state.turns.splice(0, state.turns.length - this.maxRetainedTurns);
    }
    this.conversations.set(conversationId, state);

    return turn;
  }

  /**
   * Up to `maxTurns` of the most recent turns, oldest first.
   */
  recentContext(conversationId: ConversationId, maxTurns: number): Turn[] {
    const state = this.conversations.get(conversationId);
    const count = Math.floor(maxTurns);
    if (!state || !Number.isFinite(count) || count < 1) return [];
    return state.turns.slice(-count);
  }

  /**
   * Sequence number the next appended turn will receive.
   */
  nextSequence(conversationId: ConversationId): number {
    return this.conversations.get(conversationId)?.nextSequence ?? 1;
  }

  snapshot(conversationId: ConversationId): MemorySnapshot {
    const state = this.conversations.get(conversationId);
    return {
      conversationId,
      nextSequence: state?.nextSequence ?? 1,
      turns: [...(state?.turns ?? [])],
    };
  }

  /**
   * Replaces the state for the snapshot's conversation. Turns beyond the
   * retention bound are evicted, oldest first.
   *
   * @throws ValidationError when the snapshot is malformed or its sequences
   *   are not contiguous up to `nextSequence`
   */
  restore(snapshot: unknown): void {
    const result = memorySnapshotSchema.safeParse(snapshot);
    if (!result.success) {
      throw new ValidationError(
        `Invalid memory snapshot: ${result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`).join(', ')}`,
        { stage: 'memory', cause: result.error }
      );
    }

    const { conversationId, nextSequence } = result.data;
    const turns = result.data.turns
      .slice(-this.maxRetainedTurns)
      .map((turn): Turn => Object.freeze({ ...turn }));

    this.conversations.set(conversationId, { turns, nextSequence });
  }

  reset(conversationId: ConversationId): void {
    this.conversations.delete(conversationId);
  }

  has(conversationId: ConversationId): boolean {
    return this.conversations.has(conversationId);
  }

  /**
   * Number of retained turns for a conversation.
   */
  size(conversationId: ConversationId): number {
    return this.conversations.get(conversationId)?.turns.length ?? 0;
  }

  conversationIds(): ConversationId[] {
    return [...this.conversations.keys()];
  }
}
