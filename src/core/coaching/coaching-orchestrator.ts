/**
 * Coaching Orchestrator
 *
 * Runs one request/response cycle for a learner utterance:
 *
 * 1. Validate the utterance
 * 2. Classify it with the local rule table
 * 3. Record the user turn in memory (before inference, so that a failed
 *    call still leaves the learner's words in the history)
 * 4. Compose the adaptive prompt
 * 5. Call the inference backend, retrying transient failures
 * 6. Parse the response; unlabelled text becomes the reply
 * 7. Reconcile model and classifier mistakes and write them to the ledger
 * 8. Record the coach's reply in memory
 * 9. Return a frozen result with a fresh proficiency estimate
 *
 * Turns for the same conversation are serialised by a ConversationLock.
 * Ledger and assistant writes happen only after inference succeeded, so a
 * failed or cancelled turn leaves exactly one new user turn behind. The
 * ledger takes a turn's records and its observation in one checked write.
 *
 * The orchestrator is the only component that talks to the backend.
 *
 * @example
 * ```typescript
 * const orchestrator = new CoachingOrchestrator({ memory, ledger, composer, backend });
 *
 * const result = await orchestrator.handleTurn('conv_1', 'I am go market yesterday');
 * console.log(result.correctedText); // "I went to the market yesterday."
 * console.log(result.proficiency.level);
 * ```
 */

import { classify, type ClassifiedMistake } from '../classifier';
import { isTransientBackendError, TurnCancelledError, ValidationError } from '../errors';
import type { ConversationMemoryStore } from '../memory';
import type { MistakeLedger } from '../ledger';
import type { AdaptivePromptComposer } from '../prompt';
import type { CoachingTurnResult, ConversationId, MistakeRecord } from '../models';
import type { GenerateResult, InferenceBackend } from '../../llm/types';
import { parseCoachResponse } from '../../llm/prompts';
import { ConversationLock } from './conversation-lock';
import { reconcileMistakes } from './reconcile';
import {
  DEFAULT_ORCHESTRATOR_CONFIG,
  type CoachingOrchestratorConfig,
  type CoachingOrchestratorDependencies,
  type HandleTurnOptions,
} from './types';

export class CoachingOrchestrator {
  private readonly memory: ConversationMemoryStore;
  private readonly ledger: MistakeLedger;
  private readonly composer: AdaptivePromptComposer;
  private readonly backend: InferenceBackend;
  private readonly lock: ConversationLock;
  private readonly config: CoachingOrchestratorConfig;

  constructor(deps: CoachingOrchestratorDependencies, config?: Partial<CoachingOrchestratorConfig>) {
    this.memory = deps.memory;
    this.ledger = deps.ledger;
    this.composer = deps.composer;
    this.backend = deps.backend;
    this.lock = deps.lock ?? new ConversationLock();

    // Merge provided config with defaults
    this.config = { ...DEFAULT_ORCHESTRATOR_CONFIG, ...config };
  }

  /**
   * Handles one learner utterance and returns the coaching result.
   *
   * @throws ValidationError for an empty id or utterance
   * @throws PromptTooLargeError when the utterance alone exceeds the prompt budget
   * @throws BackendTimeoutError | BackendConnectionError once retries are exhausted
   * @throws TurnCancelledError when `options.signal` aborts before the result is committed
   */
  async handleTurn(
    conversationId: ConversationId,
    utterance: unknown,
    options: HandleTurnOptions = {}
  ): Promise<CoachingTurnResult> {
    const text = this.validateInput(conversationId, utterance);

    return this.lock.run(conversationId, async () => {
      const { signal } = options;
      this.throwIfCancelled(conversationId, signal);

      this.assertLedgerAccepts(conversationId);

      const candidates: ClassifiedMistake[] = classify(text);
      const userTurn = this.memory.append(conversationId, { speaker: 'user', text });
      const prompt = this.composer.compose(conversationId, text);

      const generated = await this.generateWithRetry(conversationId, prompt, signal);
      // Nothing past this point is written for a turn cancelled mid-flight
      this.throwIfCancelled(conversationId, signal);

      const response = parseCoachResponse(generated.text);
      if (!response.parsed) {
        console.log(`[Coach] Unstructured response for ${conversationId}; using raw text as reply`);
      }

      const reconciled = reconcileMistakes({
        utterance: text,
        turnSequence: userTurn.sequence,
        candidates,
        response,
      });
      const mistakes: MistakeRecord[] = this.ledger.recordTurn(
        conversationId,
        userTurn.sequence,
        reconciled,
        userTurn.timestamp
      );

      this.memory.append(conversationId, { speaker: 'assistant', text: response.reply });

      return Object.freeze({
        correctedText: response.correction,
        explanation: response.explanation,
        replyText: response.reply,
        proficiency: this.ledger.proficiency(conversationId),
        mistakes: Object.freeze(mistakes),
        parsed: response.parsed,
      });
    });
  }

  /**
   * Rejects a turn the ledger could not observe, before anything is written
   * or the backend is called.
   */
  private assertLedgerAccepts(conversationId: ConversationId): void {
    const sequence = this.memory.nextSequence(conversationId);
    if (!this.ledger.canObserve(conversationId, sequence)) {
      throw new ValidationError(
        `Ledger for ${conversationId} is ahead of its memory at turn ${sequence}`,
        { stage: 'ledger', conversationId }
      );
    }
  }

  private validateInput(conversationId: ConversationId, utterance: unknown): string {
    if (typeof conversationId !== 'string' || conversationId.trim().length === 0) {
      throw new ValidationError('conversationId must be a non-empty string', { stage: 'input' });
    }
    if (typeof utterance !== 'string' || utterance.trim().length === 0) {
      throw new ValidationError('Utterance must be a non-empty string', {
        stage: 'input',
        conversationId,
      });
    }
    return utterance.trim();
  }

  /**
   * Calls the backend, retrying transient failures up to `maxRetries` times.
   */
  private async generateWithRetry(
    conversationId: ConversationId,
    prompt: string,
    signal: AbortSignal | undefined
  ): Promise<GenerateResult> {
    for (let attempt = 0; ; attempt++) {
      try {
        return await this.backend.generate({ prompt, conversationId, signal });
      } catch (error) {
        if (!isTransientBackendError(error) || attempt >= this.config.maxRetries) {
          throw error;
        }
        console.warn(
          `[Coach] ${error.name} for ${conversationId} (attempt ${attempt + 1} of ${this.config.maxRetries + 1}), retrying:`,
          error.message
        );
        await delay(this.config.retryDelayMs);
        this.throwIfCancelled(conversationId, signal);
      }
    }
  }

  private throwIfCancelled(conversationId: ConversationId, signal: AbortSignal | undefined): void {
    if (signal?.aborted) {
      throw new TurnCancelledError({ stage: 'inference', conversationId, cause: signal.reason });
    }
  }
}

function delay(ms: number): Promise<void> {
  if (ms <= 0) return Promise.resolve();
  return new Promise((resolve) => setTimeout(resolve, ms));
}
