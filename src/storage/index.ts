/**
 * Storage Module - Barrel Export
 *
 * Public API of the storage layer: the database factory, the schema tables
 * and the conversation snapshot repository.
 *
 * Usage:
 *   import { openDatabase, ConversationSnapshotRepository } from '@/storage';
 *   const repo = new ConversationSnapshotRepository(openDatabase(config.database.path).db);
 */

// Database connection factory
export { openDatabase } from './db';
export type { AppDatabase, DatabaseConnection } from './db';
export { ensureSchema, listTables } from './migrate';

// Table definitions
export { conversations, conversationTurns, conversationMistakes } from './schema';

export type {
  ConversationRow,
  NewConversationRow,
  ConversationTurnRow,
  NewConversationTurnRow,
  ConversationMistakeRow,
  NewConversationMistakeRow,
} from './schema';

export { ConversationSnapshotRepository } from './repositories';
