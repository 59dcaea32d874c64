/**
 * Coaching Orchestrator Types
 *
 * Configuration, injectable dependencies and persistence contracts for the
 * CoachingOrchestrator and the CoachingService built on top of it.
 */

import type { ConversationMemoryStore, MemorySnapshot } from '../memory';
import type { LedgerSnapshot, MistakeLedger } from '../ledger';
import type { AdaptivePromptComposer } from '../prompt';
import type { ConversationId } from '../models';
import type { InferenceBackend } from '../../llm/types';
import type { ConversationLock } from './conversation-lock';

/**
 * Configuration options for the CoachingOrchestrator.
 */
export interface CoachingOrchestratorConfig {
  /**
   * How many times a failed inference call is retried when the failure is
   * transient (timeout, unreachable backend, 5xx). 0 disables retries.
   *
   * Default: 1
   */
  maxRetries: number;

  /**
   * Pause between attempts, in milliseconds.
   *
   * Default: 250
   */
  retryDelayMs: number;
}

export const DEFAULT_ORCHESTRATOR_CONFIG: CoachingOrchestratorConfig = {
  maxRetries: 1,
  retryDelayMs: 250,
};

/**
 * Dependencies required by CoachingOrchestrator.
 *
 * @example
 * ```typescript
 * const memory = new ConversationMemoryStore({ maxRetainedTurns: 20 });
 * const ledger = new MistakeLedger();
 * const orchestrator = new CoachingOrchestrator({
 *   memory,
 *   ledger,
 *   composer: new AdaptivePromptComposer(memory, ledger),
 *   backend: new OllamaBackend({ ... }),
 * });
 * ```
 */
export interface CoachingOrchestratorDependencies {
  memory: ConversationMemoryStore;
  ledger: MistakeLedger;
  composer: AdaptivePromptComposer;
  backend: InferenceBackend;

  /**
   * Per-conversation lock. Pass the same instance to anything else that
   * touches the stores for a conversation so their work is serialised with
   * turns. A private lock is created when omitted.
   */
  lock?: ConversationLock;
}

export interface HandleTurnOptions {
  /** Aborts the turn; the orchestrator then throws TurnCancelledError */
  signal?: AbortSignal;
}

/**
 * Full persisted state of one conversation.
 */
export interface ConversationSnapshot {
  conversationId: ConversationId;
  memory: MemorySnapshot;
  ledger: LedgerSnapshot;
}

/**
 * Storage for conversation snapshots, implemented in `src/storage`.
 */
export interface ConversationStateRepository {
  /** Returns null when nothing is stored for the id */
  load(conversationId: ConversationId): Promise<ConversationSnapshot | null>;
  /** Replaces whatever is stored for the snapshot's conversation */
  save(snapshot: ConversationSnapshot): Promise<void>;
  delete(conversationId: ConversationId): Promise<void>;
}
