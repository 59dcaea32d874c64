/**
 * CLI Program Definition
 *
 * Builds the commander program. The runtime factory is injected so tests
 * can run commands against an in-memory runtime with a scripted backend.
 */

import { Command } from 'commander';
import type { CoachingRuntime } from '../runtime';
import { APP_VERSION } from '../api/routes/health';
import { runChatCommand } from './commands/chat';
import { runExportCommand } from './commands/export';
import { runStatsCommand } from './commands/stats';
import { runStatusCommand } from './commands/status';
import { consolePrinter, type Printer } from './utils/terminal';

export interface CliDependencies {
  createRuntime: () => CoachingRuntime;
  print?: Printer;
}

interface ChatCommandOptions {
  conversation?: string;
}

interface ExportOptions {
  format: string;
  output?: string;
}

/**
 * Runs a command body against a fresh runtime and closes it afterwards.
 */
async function withRuntime<T>(
  deps: CliDependencies,
  task: (runtime: CoachingRuntime) => Promise<T>
): Promise<T> {
  const runtime = deps.createRuntime();
  try {
    return await task(runtime);
  } finally {
    runtime.close();
  }
}

export function createProgram(deps: CliDependencies): Command {
  const print = deps.print ?? consolePrinter;

  const program = new Command('fluency-coach')
    .description('English fluency coaching in the terminal')
    .version(APP_VERSION);

  program
    .command('chat')
    .description('Start or resume an interactive coaching conversation')
    .option('-c, --conversation <id>', 'Conversation id to resume')
    .action(async (options: ChatCommandOptions) => {
      await withRuntime(deps, async ({ service }) => {
        await runChatCommand(service, { conversationId: options.conversation, print });
      });
    });

  program
    .command('stats <conversation-id>')
    .description('Show mistake statistics and proficiency for a conversation')
    .action(async (conversationId: string) => {
      await withRuntime(deps, ({ service }) => runStatsCommand(service, conversationId, print));
    });

  program
    .command('export <conversation-id>')
    .description('Export a conversation to JSON or CSV')
    .option('-f, --format <format>', 'Output format (json or csv)', 'json')
    .option('-o, --output <file>', 'Output file path')
    .action(async (conversationId: string, options: ExportOptions) => {
      await withRuntime(deps, ({ service }) => runExportCommand(service, conversationId, options, print));
    });

  program
    .command('status')
    .description('Check the inference backend')
    .action(async () => {
      const ready = await withRuntime(deps, ({ service }) => runStatusCommand(service, print));
      if (!ready) {
        process.exitCode = 1;
      }
    });

  return program;
}
