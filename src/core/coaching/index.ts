/**
 * Coaching Module - Barrel Export
 *
 * The orchestrator runs single turns; the service adds id generation,
 * persistence and the read operations used by the API and the CLI.
 */

export { CoachingOrchestrator } from './coaching-orchestrator';
export {
  CoachingService,
  createConversationId,
  type CoachingServiceDependencies,
  type ConverseInput,
} from './coaching-service';
export { ConversationLock } from './conversation-lock';
export { reconcileMistakes, normalizeSentence, type ReconcileInput } from './reconcile';
export {
  DEFAULT_ORCHESTRATOR_CONFIG,
  type CoachingOrchestratorConfig,
  type CoachingOrchestratorDependencies,
  type HandleTurnOptions,
  type ConversationSnapshot,
  type ConversationStateRepository,
} from './types';
