/**
 * Anthropic Backend
 *
 * Runs coaching prompts against a hosted Claude model through the Anthropic
 * SDK. The composed prompt is sent as a single user message. SDK retries are
 * disabled; the coaching orchestrator owns the retry budget.
 */

import Anthropic, {
  APIConnectionError,
  APIConnectionTimeoutError,
  APIError,
  APIUserAbortError,
  NotFoundError,
} from '@anthropic-ai/sdk';
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

export interface AnthropicBackendOptions extends InferenceConfig {
  apiKey: string;
}

export class AnthropicBackend implements InferenceBackend {
  readonly provider = 'anthropic' as const;
  readonly model: string;

  /** The underlying Anthropic SDK client */
  private readonly client: Anthropic;
  private readonly options: AnthropicBackendOptions;

  /**
   * @throws BackendConnectionError if no API key is configured
   */
  constructor(options: AnthropicBackendOptions) {
    if (!options.apiKey) {
      throw new BackendConnectionError(
        'ANTHROPIC_API_KEY environment variable is required when LLM_PROVIDER=anthropic.\n' +
          'Get your API key at: https://console.anthropic.com/',
        { stage: 'inference' },
        401
      );
    }

    this.options = options;
    this.model = options.model;
    this.client = new Anthropic({
      apiKey: options.apiKey,
      timeout: options.timeoutMs,
      maxRetries: 0,
    });
  }

  async generate(request: GenerateRequest): Promise<GenerateResult> {
    try {
      const response = await this.client.messages.create(
        {
          model: this.model,
          max_tokens: this.options.maxTokens,
          temperature: this.options.temperature,
          messages: [{ role: 'user', content: request.prompt }],
        },
        { signal: request.signal }
      );

      // Concatenate the text blocks of the response
      const text = response.content
        .filter((block): block is Anthropic.Messages.TextBlock => block.type === 'text')
        .map((block) => block.text)
        .join('');

      return {
        text,
        model: response.model,
        usage: {
          inputTokens: response.usage.input_tokens,
          outputTokens: response.usage.output_tokens,
        },
      };
    } catch (error) {
      throw this.handleError(error, request);
    }
  }

  async status(): Promise<BackendStatus> {
    const base = { provider: this.provider, model: this.model };

    try {
      await this.client.models.retrieve(this.model);
      return { ...base, reachable: true, modelAvailable: true, message: `Anthropic API is reachable with ${this.model}` };
    } catch (error) {
      if (error instanceof NotFoundError) {
        return { ...base, reachable: true, modelAvailable: false, message: `Model ${this.model} is not available` };
      }
      if (error instanceof APIError && error.status !== undefined) {
        return {
          ...base,
          reachable: true,
          modelAvailable: false,
          message: `Anthropic API returned status ${error.status}`,
        };
      }
      return {
        ...base,
        reachable: false,
        modelAvailable: false,
        message: 'Failed to connect to Anthropic API. Please check your network connection.',
      };
    }
  }

  /**
   * Maps Anthropic SDK errors onto coaching errors.
   */
  private handleError(error: unknown, request: GenerateRequest): CoachingError {
    const context = { stage: 'inference' as const, conversationId: request.conversationId, cause: error };

    if (error instanceof APIUserAbortError) {
      return new TurnCancelledError(context);
    }

    // Must be checked before APIConnectionError, which it extends
    if (error instanceof APIConnectionTimeoutError) {
      return new BackendTimeoutError(this.options.timeoutMs, context);
    }

    if (error instanceof APIConnectionError) {
      return new BackendConnectionError(
        'Failed to connect to Anthropic API. Please check your network connection.',
        context
      );
    }

    if (error instanceof APIError) {
      return new BackendConnectionError(error.message, context, error.status);
    }

    const message = error instanceof Error ? error.message : 'Unknown error occurred';
    return new BackendConnectionError(message, context);
  }
}
