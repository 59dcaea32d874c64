/**
 * Repository Layer - Barrel Export
 *
 * @example
 * ```typescript
 * import { ConversationSnapshotRepository } from '@/storage/repositories';
 *
 * const repo = new ConversationSnapshotRepository(db);
 * const snapshot = await repo.load('conv_123');
 * ```
 */

export { ConversationSnapshotRepository } from './conversation-snapshot.repository';
