/**
 * CLI Entry Point for Fluency Coach
 *
 * Available Commands:
 * - `chat [--conversation <id>]` - Interactive coaching conversation
 * - `stats <id>` - Mistake statistics and proficiency for a conversation
 * - `export <id> [--format json|csv] [--output file]` - Export a conversation
 * - `status` - Check the inference backend
 *
 * Usage:
 * ```bash
 * npm run cli -- chat
 * npm run cli -- stats conv_1234
 * ```
 *
 * Conversations are stored in DATABASE_PATH, so a chat can be resumed and
 * inspected across runs.
 */

import 'dotenv/config';
import { config, ConfigValidationError, validateConfig } from '../config';
import { createCoachingRuntime } from '../runtime';
import { createProgram } from './program';
import { red } from './utils/terminal';

async function main(): Promise<void> {
  validateConfig();
  const program = createProgram({ createRuntime: () => createCoachingRuntime(config) });
  await program.parseAsync(process.argv);
}

main().catch((error: unknown) => {
  if (error instanceof ConfigValidationError) {
    console.error(red(`[Config] ${error.message}`));
  } else {
    console.error(red(`Error: ${error instanceof Error ? error.message : String(error)}`));
  }
  process.exit(1);
});
