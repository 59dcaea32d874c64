/**
 * Ollama Backend
 *
 * Runs prompts against a locally hosted model through the official `ollama`
 * client. It handles:
 * - Non-streaming generation with temperature and token limits
 * - Per-call timeouts and caller cancellation via AbortSignal
 * - Mapping client and network failures to coaching errors
 * - A status check that verifies the configured model is pulled
 *
 * Usage:
 * ```typescript
 * const backend = new OllamaBackend({
 *   host: 'http://localhost:11434',
 *   model: 'phi3:mini',
 *   temperature: 0.7,
 *   maxTokens: 500,
 *   timeoutMs: 30000,
 * });
 * const { text } = await backend.generate({ prompt });
 * ```
 */

import { Ollama } from 'ollama';
import {
  BackendConnectionError,
  BackendTimeoutError,
  TurnCancelledError,
  type CoachingError,
} from '../core/errors';
import type {
  BackendStatus,
  GenerateRequest,
  GenerateResult,
  InferenceBackend,
  InferenceConfig,
} from './types';

/** Timeout for the status check, independent of the generation timeout */
const STATUS_TIMEOUT_MS = 5000;

export interface OllamaBackendOptions extends InferenceConfig {
  /** Base URL of the Ollama server */
  host: string;

  /**
   * fetch implementation used for every request. Defaults to the global
   * fetch; tests inject a fake.
   */
  fetch?: typeof fetch;
}

export class OllamaBackend implements InferenceBackend {
  readonly provider = 'ollama' as const;
  readonly model: string;
  private readonly options: OllamaBackendOptions;

  constructor(options: OllamaBackendOptions) {
    this.options = options;
    this.model = options.model;
  }

  async generate(request: GenerateRequest): Promise<GenerateResult> {
    const { timeoutMs } = this.options;
    const timeout = AbortSignal.timeout(timeoutMs);
    const signal = request.signal ? AbortSignal.any([request.signal, timeout]) : timeout;
    const client = this.createClient(signal);

    try {
      const response = await client.generate({
        model: this.model,
        prompt: request.prompt,
        stream: false,
        options: {
          temperature: this.options.temperature,
          num_predict: this.options.maxTokens,
        },
      });

      return {
        text: response.response,
        model: response.model || this.model,
        usage:
          typeof response.prompt_eval_count === 'number' && typeof response.eval_count === 'number'
            ? { inputTokens: response.prompt_eval_count, outputTokens: response.eval_count }
            : null,
      };
    } catch (error) {
      throw this.handleError(error, request, timeout);
    }
  }

  /**
   * Checks that Ollama is running and the configured model is available.
   */
  async status(): Promise<BackendStatus> {
    const base = { provider: this.provider, model: this.model };
    const client = this.createClient(AbortSignal.timeout(STATUS_TIMEOUT_MS));

    try {
      const { models } = await client.list();
      const installed = models.some(
        (entry) => entry.name === this.model || entry.model === this.model
      );

      return installed
        ? { ...base, reachable: true, modelAvailable: true, message: `Ollama is running with ${this.model}` }
        : {
            ...base,
            reachable: true,
            modelAvailable: false,
            message: `Model ${this.model} not found. Run: ollama pull ${this.model}`,
          };
    } catch (error) {
      if (statusCodeOf(error) !== undefined) {
        return { ...base, reachable: true, modelAvailable: false, message: 'Ollama is running but returned an error' };
      }
      return {
        ...base,
        reachable: false,
        modelAvailable: false,
        message: 'Ollama is not running. Start it with: ollama serve',
      };
    }
  }

  /**
   * Creates a client whose requests all carry the given signal.
   */
  private createClient(signal: AbortSignal): Ollama {
    const baseFetch = this.options.fetch ?? fetch;
    const boundFetch: typeof fetch = (input, init) =>
      baseFetch(input, {
        ...init,
        signal: init?.signal ? AbortSignal.any([init.signal, signal]) : signal,
      });

    return new Ollama({ host: this.options.host, fetch: boundFetch });
  }

  /**
   * Converts a failure from the client or fetch into a coaching error.
   * The timeout is checked before the caller's signal so a timeout is never
   * reported as a cancellation.
   */
  private handleError(error: unknown, request: GenerateRequest, timeout: AbortSignal): CoachingError {
    const context = { stage: 'inference' as const, conversationId: request.conversationId, cause: error };

    if (timeout.aborted) {
      return new BackendTimeoutError(this.options.timeoutMs, context);
    }

    if (request.signal?.aborted) {
      return new TurnCancelledError(context);
    }

    const statusCode = statusCodeOf(error);
    if (statusCode !== undefined) {
      return new BackendConnectionError(
        `Ollama returned status code ${statusCode}`,
        context,
        statusCode
      );
    }

    const detail = error instanceof Error ? error.message : String(error);
    return new BackendConnectionError(
      `Cannot connect to Ollama at ${this.options.host} (${detail}). Make sure Ollama is running (ollama serve)`,
      context
    );
  }
}

/**
 * HTTP status carried by the ollama client's ResponseError.
 */
function statusCodeOf(error: unknown): number | undefined {
  if (typeof error === 'object' && error !== null && 'status_code' in error) {
    const { status_code: statusCode } = error;
    return typeof statusCode === 'number' ? statusCode : undefined;
  }
  return undefined;
}
