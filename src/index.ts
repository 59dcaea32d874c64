/**
 * Fluency Coach - Library Entry Point
 *
 * Re-exports the coaching runtime and the pieces it is built from, for
 * embedding the coach in another program. The HTTP server lives in
 * src/api/server.ts and the CLI in src/cli/index.ts.
 *
 * @example
 * ```typescript
 * import { createCoachingRuntime, loadConfig } from 'fluency-coach';
 *
 * const runtime = createCoachingRuntime(loadConfig());
 * const { result } = await runtime.service.converse({ utterance: 'She go to work.' });
 * console.log(result.correctedText);
 * runtime.close();
 * ```
 */

export { loadConfig, validateConfig, ConfigValidationError, type Config } from './config';
export {
  createCoachingRuntime,
  type CoachingRuntime,
  type CoachingRuntimeOverrides,
  type RuntimeSettings,
} from './runtime';

export * from './core/models';
export * from './core/errors';
export { classify, type ClassifiedMistake } from './core/classifier';
export { MistakeLedger } from './core/ledger';
export { ConversationMemoryStore } from './core/memory';
export { AdaptivePromptComposer } from './core/prompt';
export {
  CoachingOrchestrator,
  CoachingService,
  ConversationLock,
  type ConversationSnapshot,
  type ConversationStateRepository,
} from './core/coaching';
export { exportConversation, type ExportFormat } from './core/export';

export { createInferenceBackend, OllamaBackend, AnthropicBackend, type InferenceBackend } from './llm';
export { ConversationSnapshotRepository, openDatabase } from './storage';
export { createApp } from './api';
