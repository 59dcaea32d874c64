/**
 * Test Setup Module
 *
 * Builds isolated test environments: in-memory SQLite databases, a scripted
 * inference backend and coaching runtimes or Hono apps wired to both.
 * Nothing here opens a port or reaches the network.
 */

import type { Hono } from 'hono';
import {
  createApp,
  createCoachingRuntime,
  loadConfig,
  type CoachingRuntime,
  type ConversationStateRepository,
  type InferenceBackend,
} from '../src';
import type { Environment } from '../src/config';
import type { GenerateRequest, GenerateResult, InferenceProvider, BackendStatus } from '../src/llm';
import { openDatabase, type DatabaseConnection } from '../src/storage';

// ============================================================================
// Scripted Inference Backend
// ============================================================================

/**
 * One scripted backend answer: raw text, an error to throw, or a function
 * computing either from the request.
 */
export type ScriptedReply = string | Error | ((request: GenerateRequest) => string | Promise<string>);

/** Reply used once the script is exhausted */
export const DEFAULT_COACH_REPLY = 'Correction: none\nExplanation: none\nReply: Tell me more!';

/**
 * InferenceBackend that plays back a script, one entry per generate() call.
 * Every request is kept for assertions.
 */
export class FakeInferenceBackend implements InferenceBackend {
  readonly provider: InferenceProvider = 'ollama';
  readonly model = 'fake-model';
  readonly requests: GenerateRequest[] = [];
  reachable = true;

  private readonly script: ScriptedReply[];

  constructor(script: ScriptedReply[] = [], private readonly fallback: string = DEFAULT_COACH_REPLY) {
    this.script = [...script];
  }

  /** Appends entries to the script */
  enqueue(...replies: ScriptedReply[]): void {
    this.script.push(...replies);
  }

  async generate(request: GenerateRequest): Promise<GenerateResult> {
    this.requests.push(request);
    const next = this.script.shift() ?? this.fallback;

    if (next instanceof Error) {
      throw next;
    }
    const text = typeof next === 'function' ? await next(request) : next;
    return { text, model: this.model, usage: null };
  }

  async status(): Promise<BackendStatus> {
    return {
      provider: this.provider,
      model: this.model,
      reachable: this.reachable,
      modelAvailable: this.reachable,
      message: this.reachable ? 'Fake backend ready' : 'Fake backend unreachable',
    };
  }
}

export interface CoachReplyParts {
  correction?: string;
  explanation?: string;
  reply?: string;
  /** "category | original | corrected | why" lines */
  mistakes?: string[];
}

/**
 * Formats a well-formed labelled coach response.
 */
export function coachReply(parts: CoachReplyParts = {}): string {
  const lines = [
    `Correction: ${parts.correction ?? 'none'}`,
    `Explanation: ${parts.explanation ?? 'none'}`,
    ...(parts.mistakes ?? []).map((mistake) => `Mistake: ${mistake}`),
    `Reply: ${parts.reply ?? 'Tell me more!'}`,
  ];
  return lines.join('\n');
}

// ============================================================================
// Database and Runtime Setup
// ============================================================================

/**
 * Opens a fresh in-memory database with the schema applied.
 */
export function createTestDatabase(): DatabaseConnection {
  return openDatabase(':memory:');
}

export interface TestRuntimeOptions {
  script?: ScriptedReply[];
  backend?: FakeInferenceBackend;
  /** Environment overrides, e.g. { MAX_PROMPT_CHARS: '800' } */
  env?: Environment;
  /**
   * Storage for conversation state: a repository to share between runtimes,
   * null for none, or a private in-memory database when left out
   */
  repository?: ConversationStateRepository | null;
}

export interface TestRuntime extends CoachingRuntime {
  backend: FakeInferenceBackend;
}

/**
 * Builds a coaching runtime on a scripted backend with no retry delay.
 */
export function createTestRuntime(options: TestRuntimeOptions = {}): TestRuntime {
  const backend = options.backend ?? new FakeInferenceBackend(options.script);
  const settings = loadConfig({ NODE_ENV: 'test', DATABASE_PATH: ':memory:', ...options.env });

  const runtime = createCoachingRuntime(settings, {
    backend,
    retryDelayMs: 0,
    ...(options.repository !== undefined && { repository: options.repository }),
  });

  return { ...runtime, backend };
}

export interface TestAppContext {
  app: Hono;
  runtime: TestRuntime;
}

/**
 * Builds the Hono app around a test runtime. Rate limiting and request
 * logging are off.
 */
export function createTestApp(options: TestRuntimeOptions = {}): TestAppContext {
  const runtime = createTestRuntime(options);
  const app = createApp(
    { service: runtime.service },
    { rateLimit: false, logger: { log: () => {} } }
  );
  return { app, runtime };
}
