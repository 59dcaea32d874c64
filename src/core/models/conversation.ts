/**
 * Conversation Domain Types
 *
 * A Conversation is one ongoing exchange between a learner and the coach,
 * keyed by a ConversationId. Its history is an ordered list of Turns held by
 * the ConversationMemoryStore.
 *
 * This module contains only pure TypeScript types with no runtime
 * dependencies, forming the contract between the memory store, the prompt
 * composer and the orchestrator.
 */

/**
 * Opaque identifier for a conversation.
 * New ids are generated as `conv_<uuid>`, but any non-empty string is
 * accepted so that callers can resume conversations they already know.
 */
export type ConversationId = string;

/**
 * Who produced a turn.
 *
 * - 'user': the learner practising English
 * - 'assistant': the coach's reply
 */
export type Speaker = 'user' | 'assistant';

/**
 * A single recorded message within a conversation.
 *
 * Turns are immutable once recorded. Sequence numbers start at 1 and increase
 * by exactly one per recorded turn, including across retention eviction.
 *
 * @example
 * ```typescript
 * const turn: Turn = {
 *   speaker: 'user',
 *   text: 'I am go market yesterday',
 *   timestamp: new Date('2024-03-01T09:00:00Z'),
 *   sequence: 1,
 * };
 * ```
 */
export interface Turn {
  readonly speaker: Speaker;
  readonly text: string;
  readonly timestamp: Date;
  readonly sequence: number;
}

/**
 * Input accepted by ConversationMemoryStore.append().
 *
 * `sequence` is normally left out and assigned by the store. Passing it makes
 * the append idempotent: re-appending an already-recorded sequence with the
 * same content is a no-op.
 */
export interface NewTurn {
  speaker: Speaker;
  text: string;
  timestamp?: Date;
  sequence?: number;
}
