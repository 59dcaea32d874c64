/**
 * LLM Types and Interfaces
 *
 * The coaching core talks to a language model through one contract,
 * InferenceBackend. Implementations wrap a vendor SDK (the `ollama` client
 * for local models, `@anthropic-ai/sdk` for hosted ones) and translate its
 * failures into the coaching error taxonomy:
 *
 * - BackendTimeoutError when the call exceeds its timeout
 * - BackendConnectionError when the backend is unreachable or answers non-2xx
 * - TurnCancelledError when the caller's AbortSignal fires
 */

/**
 * Which backend implementation is in use.
 */
export type InferenceProvider = 'ollama' | 'anthropic';

/**
 * Generation settings shared by all backends.
 */
export interface InferenceConfig {
  /** Model name as the backend knows it, e.g. 'phi3:mini' */
  model: string;

  /**
   * Controls randomness in the response.
   * Lower values = more deterministic, higher = more creative.
   */
  temperature: number;

  /** Maximum number of tokens to generate */
  maxTokens: number;

  /** Per-call timeout in milliseconds */
  timeoutMs: number;
}

/**
 * One generation request: a fully composed prompt.
 */
export interface GenerateRequest {
  prompt: string;
  /** Attached to errors so callers can tell which conversation failed */
  conversationId?: string;
  /** Aborts the call; the backend then throws TurnCancelledError */
  signal?: AbortSignal;
}

/**
 * Result of a completed generation.
 */
export interface GenerateResult {
  /** The generated response text */
  text: string;

  /** Model that produced the text */
  model: string;

  /**
   * Token usage information for tracking.
   * Null if the backend did not report it.
   */
  usage: {
    inputTokens: number;
    outputTokens: number;
  } | null;
}

/**
 * Outcome of a backend health check.
 */
export interface BackendStatus {
  provider: InferenceProvider;
  model: string;
  /** The backend answered at all */
  reachable: boolean;
  /** The configured model is installed / accessible */
  modelAvailable: boolean;
  /** Human-readable summary, including how to fix a problem */
  message: string;
}

/**
 * The inference collaborator consumed by the coaching orchestrator.
 */
export interface InferenceBackend {
  readonly provider: InferenceProvider;
  readonly model: string;

  /**
   * Generates a completion for a prompt.
   *
   * @throws BackendTimeoutError | BackendConnectionError | TurnCancelledError
   */
  generate(request: GenerateRequest): Promise<GenerateResult>;

  /**
   * Probes the backend. Never throws; problems are reported in the result.
   */
  status(): Promise<BackendStatus>;
}
