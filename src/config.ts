/**
 * Centralized Configuration Module
 *
 * Type-safe, validated configuration for the Fluency Coach application.
 * Values are read from environment variables (a `.env` file is loaded by the
 * entry points through dotenv) and validated against a zod schema once at
 * module load time.
 *
 * Usage:
 *   import { config, validateConfig } from './config';
 *
 *   console.log(config.inference.model);
 *   validateConfig(); // throws ConfigValidationError in misconfigured production
 *
 * @module config
 */

import { z } from 'zod';

// =============================================================================
// Configuration Schema
// =============================================================================

/**
 * Zod schema for validating environment configuration.
 */
const configSchema = z.object({
  // Server configuration
  server: z.object({
    port: z.number().int().positive().default(3001),
    host: z.string().default('0.0.0.0'),
    nodeEnv: z.enum(['development', 'production', 'test']).default('development'),
  }),

  // Model inference configuration (the external collaborator)
  inference: z.object({
    provider: z.enum(['ollama', 'anthropic']).default('ollama'),
    baseUrl: z.string().url().default('http://localhost:11434'),
    model: z.string().min(1).default('phi3:mini'),
    temperature: z.number().min(0).max(2).default(0.7),
    maxTokens: z.number().int().positive().default(500),
    timeoutMs: z.number().int().positive().default(30000),
    maxRetries: z.number().int().min(0).max(3).default(1),
  }),

  // Anthropic API configuration (only used when provider = 'anthropic')
  anthropic: z.object({
    apiKey: z.string().optional(),
    model: z.string().default('claude-3-5-haiku-latest'),
  }),

  // Conversation memory configuration
  memory: z.object({
    maxRetainedTurns: z.number().int().positive().default(20),
    contextTurns: z.number().int().min(0).default(10),
  }),

  // Prompt budget configuration
  prompt: z.object({
    maxChars: z.number().int().positive().default(6000),
  }),

  // Database configuration
  database: z.object({
    path: z.string().default('fluency-coach.db'),
  }),
});

// TypeScript type inferred from the Zod schema
export type Config = z.infer<typeof configSchema>;

/** Raw environment shape accepted by {@link loadConfig}. */
export type Environment = Record<string, string | undefined>;

// =============================================================================
// Environment Variable Loading
// =============================================================================

/**
 * Parse an integer from an environment variable string.
 * Returns undefined if the value is not a valid integer.
 */
function parseIntOrUndefined(value: string | undefined): number | undefined {
  if (!value) return undefined;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? undefined : parsed;
}

/**
 * Parse a float from an environment variable string.
 * Returns undefined if the value is not a valid number.
 */
function parseFloatOrUndefined(value: string | undefined): number | undefined {
  if (!value) return undefined;
  const parsed = parseFloat(value);
  return isNaN(parsed) ? undefined : parsed;
}

/**
 * Build the raw (unvalidated) config object from an environment map.
 * Enum values are passed through as strings and checked by the schema.
 */
function loadFromEnvironment(env: Environment): Record<string, Record<string, unknown>> {
  return {
    server: {
      port: parseIntOrUndefined(env.PORT),
      host: env.HOST,
      nodeEnv: env.NODE_ENV,
    },
    inference: {
      provider: env.LLM_PROVIDER,
      baseUrl: env.OLLAMA_BASE_URL,
      model: env.MODEL_NAME,
      temperature: parseFloatOrUndefined(env.TEMPERATURE),
      maxTokens: parseIntOrUndefined(env.MAX_TOKENS),
      timeoutMs: parseIntOrUndefined(env.INFERENCE_TIMEOUT_MS),
      maxRetries: parseIntOrUndefined(env.INFERENCE_MAX_RETRIES),
    },
    anthropic: {
      apiKey: env.ANTHROPIC_API_KEY,
      model: env.ANTHROPIC_MODEL,
    },
    memory: {
      maxRetainedTurns: parseIntOrUndefined(env.MAX_RETAINED_TURNS),
      contextTurns: parseIntOrUndefined(env.CONTEXT_TURNS),
    },
    prompt: {
      maxChars: parseIntOrUndefined(env.MAX_PROMPT_CHARS),
    },
    database: {
      path: env.DATABASE_PATH,
    },
  };
}

/**
 * Parses configuration from an environment map.
 *
 * Unset variables fall back to the schema defaults. Exposed separately from
 * the module-level `config` so tests can build configs without touching
 * `process.env`.
 *
 * @throws {z.ZodError} if any value fails validation
 *
 * @example
 * ```typescript
 * const testConfig = loadConfig({ MODEL_NAME: 'llama3', MAX_PROMPT_CHARS: '800' });
 * ```
 */
export function loadConfig(env: Environment = process.env): Config {
  return configSchema.parse(loadFromEnvironment(env));
}

// =============================================================================
// Configuration Validation
// =============================================================================

/**
 * Configuration validation error with detailed information about missing/invalid values.
 */
export class ConfigValidationError extends Error {
  public readonly missingVars: string[];
  public readonly invalidVars: { name: string; reason: string }[];

  constructor(
    message: string,
    missingVars: string[] = [],
    invalidVars: { name: string; reason: string }[] = []
  ) {
    super(message);
    this.name = 'ConfigValidationError';
    this.missingVars = missingVars;
    this.invalidVars = invalidVars;
  }
}

/**
 * Validates cross-field requirements the schema cannot express.
 *
 * - `ANTHROPIC_API_KEY` is required whenever `LLM_PROVIDER=anthropic`.
 * - In production, `DATABASE_PATH` must not be `:memory:` (state would be
 *   lost on restart).
 *
 * @throws {ConfigValidationError} If the configuration is unusable
 */
export function validateConfig(target: Config = config): void {
  const missingVars: string[] = [];
  const invalidVars: { name: string; reason: string }[] = [];

  if (target.inference.provider === 'anthropic' && !target.anthropic.apiKey) {
    missingVars.push('ANTHROPIC_API_KEY');
  }

  if (target.server.nodeEnv === 'production' && target.database.path === ':memory:') {
    invalidVars.push({
      name: 'DATABASE_PATH',
      reason: 'An in-memory database loses all conversations on restart',
    });
  }

  if (target.memory.contextTurns > target.memory.maxRetainedTurns) {
    invalidVars.push({
      name: 'CONTEXT_TURNS',
      reason: `cannot exceed MAX_RETAINED_TURNS (${target.memory.maxRetainedTurns})`,
    });
  }

  if (missingVars.length > 0 || invalidVars.length > 0) {
    const errorParts: string[] = [];

    if (missingVars.length > 0) {
      errorParts.push(`Missing required environment variables: ${missingVars.join(', ')}`);
    }

    if (invalidVars.length > 0) {
      const invalidDescriptions = invalidVars
        .map((v) => `${v.name}: ${v.reason}`)
        .join('; ');
      errorParts.push(`Invalid configuration: ${invalidDescriptions}`);
    }

    throw new ConfigValidationError(errorParts.join('\n'), missingVars, invalidVars);
  }
}

// =============================================================================
// Configuration Export
// =============================================================================

const parseResult = configSchema.safeParse(loadFromEnvironment(process.env));

if (!parseResult.success) {
  console.error('[Config] Invalid configuration schema:');
  console.error(parseResult.error.format());
  process.exit(1);
}

/**
 * The validated, type-safe configuration object for this process.
 */
export const config: Config = parseResult.data;

/**
 * Helper function to check if we're running in production mode.
 */
export function isProduction(): boolean {
  return config.server.nodeEnv === 'production';
}

/**
 * Helper function to check if we're running in test mode.
 */
export function isTest(): boolean {
  return config.server.nodeEnv === 'test';
}

export default config;
