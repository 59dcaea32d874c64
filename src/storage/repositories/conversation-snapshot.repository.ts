/**
 * Conversation Snapshot Repository Implementation
 *
 * Stores and loads the complete state of a conversation (retained turns,
 * sequence counter, ledger records and counters) across the three
 * conversation tables. The coaching service saves a snapshot after every
 * turn and loads one when a conversation it does not hold in memory is
 * resumed.
 *
 * A save replaces everything stored for the conversation inside one
 * transaction, so readers never see a half-written snapshot.
 */

import { asc, desc, eq } from 'drizzle-orm';
import type { AppDatabase } from '../db';
import { conversationMistakes, conversations, conversationTurns } from '../schema';
import type { ConversationSnapshot, ConversationStateRepository } from '@/core/coaching/types';
import type { MistakeRecord, Turn } from '@/core/models';

/**
 * Maps a turn row to a Turn domain model.
 */
function mapTurnToDomain(row: typeof conversationTurns.$inferSelect): Turn {
  return {
    speaker: row.speaker,
    text: row.text,
    // Drizzle's timestamp_ms mode already returns Date objects
    timestamp: row.timestamp,
    sequence: row.sequence,
  };
}

function mapMistakeToDomain(row: typeof conversationMistakes.$inferSelect): MistakeRecord {
  return {
    category: row.category,
    original: row.original,
    corrected: row.corrected,
    explanation: row.explanation,
    turnSequence: row.turnSequence,
    source: row.source,
    recordedAt: row.recordedAt,
  };
}

/**
 * Repository for persisted conversation state.
 *
 * @example
 * ```typescript
 * const repo = new ConversationSnapshotRepository(db);
 *
 * await repo.save({
 *   conversationId: 'conv_123',
 *   memory: memory.snapshot('conv_123'),
 *   ledger: ledger.snapshot('conv_123'),
 * });
 *
 * const restored = await repo.load('conv_123');
 * ```
 */
export class ConversationSnapshotRepository implements ConversationStateRepository {
  /**
   * @param db - The Drizzle database instance to use for queries
   */
  constructor(private readonly db: AppDatabase) {}

  async load(conversationId: string): Promise<ConversationSnapshot | null> {
    const result = await this.db
      .select()
      .from(conversations)
      .where(eq(conversations.id, conversationId))
      .limit(1);

    if (result.length === 0) {
      return null;
    }
    const row = result[0];

    const turns = await this.db
      .select()
      .from(conversationTurns)
      .where(eq(conversationTurns.conversationId, conversationId))
      .orderBy(asc(conversationTurns.sequence));

    const mistakes = await this.db
      .select()
      .from(conversationMistakes)
      .where(eq(conversationMistakes.conversationId, conversationId))
      .orderBy(asc(conversationMistakes.position));

    return {
      conversationId,
      memory: {
        conversationId,
        nextSequence: row.nextSequence,
        turns: turns.map(mapTurnToDomain),
      },
      ledger: {
        conversationId,
        turnsObserved: row.turnsObserved,
        lastObservedTurn: row.lastObservedTurn,
        records: mistakes.map(mapMistakeToDomain),
        ...(row.firstObservedAt && { firstObservedAt: row.firstObservedAt }),
        ...(row.lastObservedAt && { lastObservedAt: row.lastObservedAt }),
      },
    };
  }

  async save(snapshot: ConversationSnapshot): Promise<void> {
    const { conversationId, memory, ledger } = snapshot;
    const now = new Date();

    this.db.transaction((tx) => {
      tx.insert(conversations)
        .values({
          id: conversationId,
          nextSequence: memory.nextSequence,
          turnsObserved: ledger.turnsObserved,
          lastObservedTurn: ledger.lastObservedTurn,
          firstObservedAt: ledger.firstObservedAt ?? null,
          lastObservedAt: ledger.lastObservedAt ?? null,
          createdAt: now,
          updatedAt: now,
        })
        .onConflictDoUpdate({
          target: conversations.id,
          set: {
            nextSequence: memory.nextSequence,
            turnsObserved: ledger.turnsObserved,
            lastObservedTurn: ledger.lastObservedTurn,
            firstObservedAt: ledger.firstObservedAt ?? null,
            lastObservedAt: ledger.lastObservedAt ?? null,
            updatedAt: now,
          },
        })
        .run();

      tx.delete(conversationTurns).where(eq(conversationTurns.conversationId, conversationId)).run();
      tx.delete(conversationMistakes)
        .where(eq(conversationMistakes.conversationId, conversationId))
        .run();

      if (memory.turns.length > 0) {
        tx.insert(conversationTurns)
          .values(
            memory.turns.map((turn) => ({
              conversationId,
              sequence: turn.sequence,
              speaker: turn.speaker,
              text: turn.text,
              timestamp: turn.timestamp,
            }))
          )
          .run();
      }

      if (ledger.records.length > 0) {
        tx.insert(conversationMistakes)
          .values(
            ledger.records.map((record, position) => ({
              conversationId,
              position,
              category: record.category,
              original: record.original,
              corrected: record.corrected,
              explanation: record.explanation,
              turnSequence: record.turnSequence,
              source: record.source,
              recordedAt: record.recordedAt,
            }))
          )
          .run();
      }
    });
  }

  /**
   * Removes a conversation and, through the cascade, its turns and mistakes.
   * Deleting an unknown id is a no-op.
   */
  async delete(conversationId: string): Promise<void> {
    await this.db.delete(conversations).where(eq(conversations.id, conversationId));
  }

  /**
   * Ids of all stored conversations, most recently updated first.
   */
  async listConversationIds(): Promise<string[]> {
    const rows = await this.db
      .select({ id: conversations.id })
      .from(conversations)
      .orderBy(desc(conversations.updatedAt));
    return rows.map((row) => row.id);
  }
}
