/**
 * Coaching Service
 *
 * The entry point used by the HTTP API and the CLI. It wraps the
 * CoachingOrchestrator with:
 *
 * - conversation id generation for callers that start a new conversation
 * - persistence: an id unknown to the in-process stores is rehydrated from
 *   the repository before its turn runs, and the full snapshot is saved
 *   after every turn, including one whose inference failed. A failed save
 *   is logged and never replaces the turn's own result or error
 * - read operations (history, proficiency, statistics) and reset
 * - snapshot export and import
 *
 * All per-conversation work goes through the same ConversationLock the
 * orchestrator uses, so a reset or import never interleaves with a turn.
 */

import { randomUUID } from 'node:crypto';
import { z } from 'zod';
import { StorageError, ValidationError } from '../errors';
import { ledgerSnapshotSchema, type MistakeLedger } from '../ledger';
import { memorySnapshotSchema, type ConversationMemoryStore } from '../memory';
import type {
  ConversationId,
  ConversationTurnResponse,
  MistakeSummary,
  ProficiencyEstimate,
  Turn,
} from '../models';
import type { BackendStatus, InferenceBackend } from '../../llm/types';
import type { CoachingOrchestrator } from './coaching-orchestrator';
import type { ConversationLock } from './conversation-lock';
import type {
  ConversationSnapshot,
  ConversationStateRepository,
  HandleTurnOptions,
} from './types';

export interface CoachingServiceDependencies {
  orchestrator: CoachingOrchestrator;
  memory: ConversationMemoryStore;
  ledger: MistakeLedger;
  backend: InferenceBackend;
  /** Must be the lock the orchestrator was built with */
  lock: ConversationLock;
  /** Omit to keep conversations in process only */
  repository?: ConversationStateRepository;
}

export interface ConverseInput {
  conversationId?: ConversationId;
  utterance: unknown;
}

const conversationSnapshotSchema = z
  .object({
    conversationId: z.string().min(1),
    memory: memorySnapshotSchema,
    ledger: ledgerSnapshotSchema,
  })
  .superRefine((snapshot, ctx) => {
    const { conversationId, memory, ledger } = snapshot;
    if (memory.conversationId !== conversationId || ledger.conversationId !== conversationId) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'memory and ledger snapshots must belong to the same conversation',
      });
    }
    // The ledger only knows user turns the memory has already numbered
    if (ledger.lastObservedTurn >= memory.nextSequence) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['ledger', 'lastObservedTurn'],
        message: `must be below memory.nextSequence (${memory.nextSequence})`,
      });
    }
    ledger.records.forEach((record, index) => {
      if (record.turnSequence >= memory.nextSequence) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['ledger', 'records', index, 'turnSequence'],
          message: `must be below memory.nextSequence (${memory.nextSequence})`,
        });
      }
    });
  });

/**
 * Generates a new conversation id.
 */
export function createConversationId(): ConversationId {
  return `conv_${randomUUID()}`;
}

export class CoachingService {
  private readonly orchestrator: CoachingOrchestrator;
  private readonly memory: ConversationMemoryStore;
  private readonly ledger: MistakeLedger;
  private readonly backend: InferenceBackend;
  private readonly lock: ConversationLock;
  private readonly repository: ConversationStateRepository | undefined;

  constructor(deps: CoachingServiceDependencies) {
    this.orchestrator = deps.orchestrator;
    this.memory = deps.memory;
    this.ledger = deps.ledger;
    this.backend = deps.backend;
    this.lock = deps.lock;
    this.repository = deps.repository;
  }

  /**
   * Handles one utterance, starting a new conversation when no id is given.
   */
  async converse(input: ConverseInput, options: HandleTurnOptions = {}): Promise<ConversationTurnResponse> {
    const conversationId = input.conversationId ?? createConversationId();

    await this.lock.run(conversationId, () => this.hydrate(conversationId));

    let response: ConversationTurnResponse;
    try {
      const result = await this.orchestrator.handleTurn(conversationId, input.utterance, options);
      response = { conversationId, result };
    } catch (error) {
      // A failed turn still leaves its user turn in memory; store that too
      await this.lock.run(conversationId, () => this.persistAfterTurn(conversationId));
      throw error;
    }

    await this.lock.run(conversationId, () => this.persistAfterTurn(conversationId));
    return response;
  }

  /**
   * Most recent turns, oldest first. `limit` defaults to everything retained.
   */
  async history(conversationId: ConversationId, limit?: number): Promise<Turn[]> {
    await this.lock.run(conversationId, () => this.hydrate(conversationId));
    return this.memory.recentContext(conversationId, limit ?? this.memory.maxRetainedTurns);
  }

  async proficiency(conversationId: ConversationId): Promise<ProficiencyEstimate> {
    await this.lock.run(conversationId, () => this.hydrate(conversationId));
    return this.ledger.proficiency(conversationId);
  }

  async summary(conversationId: ConversationId): Promise<MistakeSummary> {
    await this.lock.run(conversationId, () => this.hydrate(conversationId));
    return this.ledger.summary(conversationId);
  }

  /**
   * Clears memory, ledger and stored state for one conversation.
   */
  async reset(conversationId: ConversationId): Promise<void> {
    await this.lock.run(conversationId, async () => {
      this.memory.reset(conversationId);
      this.ledger.reset(conversationId);
      const { repository } = this;
      if (repository) {
        await this.storage(conversationId, 'delete', () => repository.delete(conversationId));
      }
    });
  }

  async exportSnapshot(conversationId: ConversationId): Promise<ConversationSnapshot> {
    return this.lock.run(conversationId, async () => {
      await this.hydrate(conversationId);
      return this.snapshotOf(conversationId);
    });
  }

  /**
   * Replaces the state of the snapshot's conversation and stores it.
   *
   * @throws ValidationError when the snapshot is malformed or its ledger is
   *   ahead of its memory
   * @throws StorageError when the snapshot cannot be stored
   */
  async importSnapshot(snapshot: unknown): Promise<ConversationId> {
    const result = conversationSnapshotSchema.safeParse(snapshot);
    if (!result.success) {
      throw new ValidationError(
        `Invalid conversation snapshot: ${result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`).join(', ')}`,
        { stage: 'input', cause: result.error }
      );
    }

    const { conversationId, memory, ledger } = result.data;
    await this.lock.run(conversationId, async () => {
      this.memory.restore(memory);
      this.ledger.restore(ledger);
      await this.persist(conversationId);
    });
    return conversationId;
  }

  /** Conversations currently held in process */
  activeConversations(): number {
    return this.memory.conversationIds().length;
  }

  status(): Promise<BackendStatus> {
    return this.backend.status();
  }

  /**
   * Loads stored state for an id the in-process stores do not know yet.
   */
  private async hydrate(conversationId: ConversationId): Promise<void> {
    if (!this.repository || this.memory.has(conversationId) || this.ledger.has(conversationId)) {
      return;
    }

    const repository = this.repository;
    const stored = await this.storage(conversationId, 'load', () => repository.load(conversationId));
    if (stored) {
      this.memory.restore(stored.memory);
      this.ledger.restore(stored.ledger);
      console.log(`[Coach] Restored ${conversationId} from storage`);
    }
  }

  /**
   * @throws StorageError when the repository rejects the save
   */
  private async persist(conversationId: ConversationId): Promise<void> {
    if (!this.repository || !this.memory.has(conversationId)) return;
    const repository = this.repository;
    const snapshot = this.snapshotOf(conversationId);
    await this.storage(conversationId, 'save', () => repository.save(snapshot));
  }

  /**
   * Saves after a turn. The turn is already committed in process, so a
   * failed save is logged and left for the next turn to retry.
   */
  private async persistAfterTurn(conversationId: ConversationId): Promise<void> {
    try {
      await this.persist(conversationId);
    } catch (error) {
      console.error(`[Coach] ${error instanceof Error ? error.message : String(error)}`);
    }
  }

  private async storage<T>(
    conversationId: ConversationId,
    action: 'load' | 'save' | 'delete',
    operation: () => Promise<T>
  ): Promise<T> {
    try {
      return await operation();
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new StorageError(`Could not ${action} ${conversationId}: ${reason}`, {
        stage: 'storage',
        conversationId,
        cause: error,
      });
    }
  }

  private snapshotOf(conversationId: ConversationId): ConversationSnapshot {
    return {
      conversationId,
      memory: this.memory.snapshot(conversationId),
      ledger: this.ledger.snapshot(conversationId),
    };
  }
}
