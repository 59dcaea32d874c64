/**
 * Conversation Memory - Barrel Export
 */

export {
  ConversationMemoryStore,
  memorySnapshotSchema,
  DEFAULT_MAX_RETAINED_TURNS,
} from './conversation-memory-store';
export type { ConversationMemoryOptions, MemorySnapshot } from './conversation-memory-store';
