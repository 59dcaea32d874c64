/**
 * Coaching Error Taxonomy
 *
 * Every failure the core surfaces to a caller is a CoachingError subclass
 * carrying a machine-readable code, the pipeline stage it came from, the
 * conversation it concerns (when known) and whether retrying the whole turn
 * can succeed.
 *
 * A response that could not be parsed is NOT an error: the orchestrator
 * returns a degraded result with `parsed: false` instead.
 *
 * @example
 * ```typescript
 * try {
 *   await orchestrator.handleTurn(id, text);
 * } catch (error) {
 *   if (error instanceof CoachingError && error.retryable) {
 *     // safe to submit the same utterance again
 *   }
 * }
 * ```
 */

/**
 * Pipeline stage in which an error was raised.
 */
export type CoachingStage =
  | 'input'
  | 'classifier'
  | 'memory'
  | 'ledger'
  | 'prompt'
  | 'inference'
  | 'storage';

export type CoachingErrorCode =
  | 'VALIDATION_ERROR'
  | 'PROMPT_TOO_LARGE'
  | 'BACKEND_TIMEOUT'
  | 'BACKEND_CONNECTION'
  | 'TURN_CANCELLED'
  | 'STORAGE_ERROR';

/**
 * Context attached to every CoachingError.
 */
export interface CoachingErrorContext {
  stage: CoachingStage;
  conversationId?: string;
  cause?: unknown;
}

/**
 * Base class for all errors raised by the coaching core.
 */
export class CoachingError extends Error {
  readonly code: CoachingErrorCode;
  readonly stage: CoachingStage;
  readonly conversationId: string | undefined;
  readonly retryable: boolean;

  constructor(
    code: CoachingErrorCode,
    message: string,
    context: CoachingErrorContext,
    retryable: boolean
  ) {
    super(message, context.cause === undefined ? undefined : { cause: context.cause });
    this.name = 'CoachingError';
    this.code = code;
    this.stage = context.stage;
    this.conversationId = context.conversationId;
    this.retryable = retryable;
  }
}

/**
 * Malformed or out-of-order input. Local and non-retryable.
 */
export class ValidationError extends CoachingError {
  constructor(message: string, context: CoachingErrorContext) {
    super('VALIDATION_ERROR', message, context, false);
    this.name = 'ValidationError';
  }
}

/**
 * The persona preamble plus the new utterance alone exceed the prompt budget.
 */
export class PromptTooLargeError extends CoachingError {
  readonly budget: number;
  readonly minimumSize: number;

  constructor(budget: number, minimumSize: number, context: CoachingErrorContext) {
    super(
      'PROMPT_TOO_LARGE',
      `Prompt needs at least ${minimumSize} characters but the budget is ${budget}`,
      context,
      false
    );
    this.name = 'PromptTooLargeError';
    this.budget = budget;
    this.minimumSize = minimumSize;
  }
}

/**
 * The inference backend did not answer within the configured timeout.
 */
export class BackendTimeoutError extends CoachingError {
  readonly timeoutMs: number;

  constructor(timeoutMs: number, context: CoachingErrorContext) {
    super(
      'BACKEND_TIMEOUT',
      `Inference backend did not respond within ${timeoutMs}ms. The model might still be loading.`,
      context,
      true
    );
    this.name = 'BackendTimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

/**
 * The inference backend was unreachable or answered with a non-2xx status.
 *
 * Unreachable backends, 5xx, 408 and 429 responses are retryable. Other 4xx
 * responses (bad model name, bad credentials) are not.
 */
export class BackendConnectionError extends CoachingError {
  /** HTTP status returned by the backend, when it answered at all */
  readonly statusCode: number | undefined;

  constructor(message: string, context: CoachingErrorContext, statusCode?: number) {
    super('BACKEND_CONNECTION', message, context, isRetryableStatus(statusCode));
    this.name = 'BackendConnectionError';
    this.statusCode = statusCode;
  }
}

/**
 * The caller aborted the turn before the inference result was committed.
 */
export class TurnCancelledError extends CoachingError {
  constructor(context: CoachingErrorContext) {
    super('TURN_CANCELLED', 'Turn was cancelled before completion', context, false);
    this.name = 'TurnCancelledError';
  }
}

/**
 * Conversation state could not be loaded from or written to storage. The
 * in-process state is unaffected.
 */
export class StorageError extends CoachingError {
  constructor(message: string, context: CoachingErrorContext) {
    super('STORAGE_ERROR', message, context, false);
    this.name = 'StorageError';
  }
}

function isRetryableStatus(statusCode: number | undefined): boolean {
  if (statusCode === undefined) return true;
  return statusCode >= 500 || statusCode === 408 || statusCode === 429;
}

/**
 * True for errors the orchestrator may retry within its bounded budget.
 */
export function isTransientBackendError(
  error: unknown
): error is BackendTimeoutError | BackendConnectionError {
  return (
    (error instanceof BackendTimeoutError || error instanceof BackendConnectionError) &&
    error.retryable
  );
}
