/**
 * LLM Module - Barrel Export
 *
 * This module provides the inference backends used by the coaching
 * orchestrator, plus the prompt builders and the response parser:
 * - InferenceBackend: the contract the coaching core depends on
 * - OllamaBackend: local models through the `ollama` client (default)
 * - AnthropicBackend: hosted Claude models through the Anthropic SDK
 * - createInferenceBackend: picks an implementation from configuration
 *
 * @example
 * ```typescript
 * import { createInferenceBackend } from './llm';
 * import { config } from './config';
 *
 * const backend = createInferenceBackend(config);
 * const status = await backend.status();
 * console.log(status.message);
 * ```
 */

import type { Config } from '../config';
import { AnthropicBackend } from './anthropic-client';
import { OllamaBackend } from './ollama-client';
import type { InferenceBackend } from './types';

export { OllamaBackend, type OllamaBackendOptions } from './ollama-client';
export { AnthropicBackend, type AnthropicBackendOptions } from './anthropic-client';

export type {
  InferenceProvider,
  InferenceConfig,
  InferenceBackend,
  GenerateRequest,
  GenerateResult,
  BackendStatus,
} from './types';

export {
  buildCoachPreamble,
  buildLevelInstructions,
  parseCoachResponse,
  normalizeCategory,
  type CoachResponse,
  type ParsedMistake,
} from './prompts';

/**
 * Creates the inference backend selected by `LLM_PROVIDER`.
 *
 * @throws BackendConnectionError when the Anthropic provider has no API key
 */
export function createInferenceBackend(
  settings: Pick<Config, 'inference' | 'anthropic'>
): InferenceBackend {
  const { inference, anthropic } = settings;
  const generation = {
    temperature: inference.temperature,
    maxTokens: inference.maxTokens,
    timeoutMs: inference.timeoutMs,
  };

  if (inference.provider === 'anthropic') {
    return new AnthropicBackend({
      ...generation,
      model: anthropic.model,
      apiKey: anthropic.apiKey ?? '',
    });
  }

  return new OllamaBackend({
    ...generation,
    model: inference.model,
    host: inference.baseUrl,
  });
}
