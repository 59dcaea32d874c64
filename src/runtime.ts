/**
 * Coaching Runtime
 *
 * Builds the full coaching stack from configuration: memory store, mistake
 * ledger, prompt composer, inference backend, orchestrator, persistence and
 * the CoachingService on top. Shared by the HTTP server and the CLI.
 *
 * @example
 * ```typescript
 * const runtime = createCoachingRuntime(config);
 * const { conversationId, result } = await runtime.service.converse({
 *   utterance: 'I am go market yesterday',
 * });
 * runtime.close();
 * ```
 */

import type { Config } from './config';
import {
  CoachingOrchestrator,
  CoachingService,
  ConversationLock,
  type ConversationStateRepository,
} from './core/coaching';
import { MistakeLedger } from './core/ledger';
import { ConversationMemoryStore } from './core/memory';
import { AdaptivePromptComposer } from './core/prompt';
import { createInferenceBackend, type InferenceBackend } from './llm';
import { ConversationSnapshotRepository, openDatabase } from './storage';

export type RuntimeSettings = Pick<Config, 'inference' | 'anthropic' | 'memory' | 'prompt' | 'database'>;

export interface CoachingRuntimeOverrides {
  /** Replaces the configured backend (tests pass a scripted fake) */
  backend?: InferenceBackend;
  /**
   * Replaces the SQLite repository. `null` keeps conversations in process
   * only and opens no database.
   */
  repository?: ConversationStateRepository | null;
  /** Pause between inference retries */
  retryDelayMs?: number;
}

export interface CoachingRuntime {
  service: CoachingService;
  memory: ConversationMemoryStore;
  ledger: MistakeLedger;
  backend: InferenceBackend;
  /** Closes the database connection, if one was opened */
  close(): void;
}

export function createCoachingRuntime(
  settings: RuntimeSettings,
  overrides: CoachingRuntimeOverrides = {}
): CoachingRuntime {
  const memory = new ConversationMemoryStore({ maxRetainedTurns: settings.memory.maxRetainedTurns });
  const ledger = new MistakeLedger();
  const composer = new AdaptivePromptComposer(memory, ledger, {
    maxChars: settings.prompt.maxChars,
    contextTurns: settings.memory.contextTurns,
  });
  const backend = overrides.backend ?? createInferenceBackend(settings);
  const lock = new ConversationLock();

  const orchestrator = new CoachingOrchestrator(
    { memory, ledger, composer, backend, lock },
    {
      maxRetries: settings.inference.maxRetries,
      ...(overrides.retryDelayMs !== undefined && { retryDelayMs: overrides.retryDelayMs }),
    }
  );

  let repository: ConversationStateRepository | undefined;
  let close = (): void => {};

  if (overrides.repository === undefined) {
    const connection = openDatabase(settings.database.path);
    repository = new ConversationSnapshotRepository(connection.db);
    close = () => connection.sqlite.close();
  } else if (overrides.repository !== null) {
    repository = overrides.repository;
  }

  const service = new CoachingService({ orchestrator, memory, ledger, backend, lock, repository });

  return { service, memory, ledger, backend, close };
}
