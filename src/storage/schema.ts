/**
 * Database Schema Definitions for Fluency Coach
 *
 * Drizzle ORM schema definitions for SQLite. The tables hold the persisted
 * state of each conversation:
 * - Conversations: sequence counters and ledger counters per conversation
 * - Conversation Turns: the retained turn history
 * - Conversation Mistakes: the mistake ledger records
 *
 * All timestamps are stored as milliseconds since epoch (integer) for
 * SQLite compatibility.
 *
 * The matching DDL lives in ./migrate.ts and must be kept in step with these
 * definitions.
 */

import {
  sqliteTable,
  text,
  integer,
  index,
  primaryKey,
} from 'drizzle-orm/sqlite-core';
import { MISTAKE_CATEGORIES } from '../core/models';

/**
 * Conversations Table
 *
 * One row per conversation. Holds the counters that cannot be derived from
 * the retained turns once older turns have been evicted.
 */
export const conversations = sqliteTable('conversations', {
  // Conversation id, e.g. 'conv_<uuid>'
  id: text('id').primaryKey(),

  // Sequence number the next appended turn will receive
  nextSequence: integer('next_sequence').notNull(),

  // Number of user turns counted toward the proficiency estimate
  turnsObserved: integer('turns_observed').notNull().default(0),

  // Sequence of the last user turn counted
  lastObservedTurn: integer('last_observed_turn').notNull().default(0),

  // When the first and the latest counted user turns were spoken
  firstObservedAt: integer('first_observed_at', { mode: 'timestamp_ms' }),
  lastObservedAt: integer('last_observed_at', { mode: 'timestamp_ms' }),

  createdAt: integer('created_at', { mode: 'timestamp_ms' }).notNull(),
  updatedAt: integer('updated_at', { mode: 'timestamp_ms' }).notNull(),
});

/**
 * Conversation Turns Table
 *
 * The retained turns of a conversation, keyed by (conversation, sequence).
 */
export const conversationTurns = sqliteTable(
  'conversation_turns',
  {
    conversationId: text('conversation_id')
      .notNull()
      .references(() => conversations.id, { onDelete: 'cascade' }),

    sequence: integer('sequence').notNull(),

    speaker: text('speaker', { enum: ['user', 'assistant'] }).notNull(),

    text: text('text').notNull(),

    timestamp: integer('timestamp', { mode: 'timestamp_ms' }).notNull(),
  },
  (table) => ({
    pk: primaryKey({ columns: [table.conversationId, table.sequence] }),
  })
);

/**
 * Conversation Mistakes Table
 *
 * Mistake ledger records. `position` keeps the order in which records were
 * written, since several records can share one turn sequence.
 */
export const conversationMistakes = sqliteTable(
  'conversation_mistakes',
  {
    conversationId: text('conversation_id')
      .notNull()
      .references(() => conversations.id, { onDelete: 'cascade' }),

    position: integer('position').notNull(),

    category: text('category', { enum: MISTAKE_CATEGORIES }).notNull(),

    original: text('original').notNull(),

    corrected: text('corrected').notNull(),

    explanation: text('explanation').notNull(),

    // Sequence of the user turn this mistake belongs to
    turnSequence: integer('turn_sequence').notNull(),

    source: text('source', { enum: ['model', 'classifier'] }).notNull(),

    recordedAt: integer('recorded_at', { mode: 'timestamp_ms' }).notNull(),
  },
  (table) => ({
    pk: primaryKey({ columns: [table.conversationId, table.position] }),
    turnIdx: index('conversation_mistakes_turn_idx').on(table.conversationId, table.turnSequence),
  })
);

// =============================================================================
// Inferred Types
// =============================================================================

export type ConversationRow = typeof conversations.$inferSelect;
export type NewConversationRow = typeof conversations.$inferInsert;
export type ConversationTurnRow = typeof conversationTurns.$inferSelect;
export type NewConversationTurnRow = typeof conversationTurns.$inferInsert;
export type ConversationMistakeRow = typeof conversationMistakes.$inferSelect;
export type NewConversationMistakeRow = typeof conversationMistakes.$inferInsert;
