/**
 * Chat Command Handler
 *
 * Interactive conversation practice in the terminal. Each line the learner
 * types is sent through CoachingService.converse(); the coach's correction,
 * explanation and reply are printed before the next prompt.
 *
 * Lines are handled one at a time in input order. Slash commands:
 * /stats, /history, /reset, /help and /quit (also /exit, /q).
 *
 * Usage (via CLI):
 * ```bash
 * npm run cli -- chat
 * npm run cli -- chat --conversation conv_1234
 * ```
 *
 * Ctrl+C cancels a turn in flight and ends the chat; the user turn already
 * recorded stays in the conversation.
 */

import * as readline from 'node:readline';
import { createConversationId, type CoachingService } from '../../core/coaching';
import { CoachingError } from '../../core/errors';
import type { CoachingTurnResult } from '../../core/models';
import { runStatsCommand } from './stats';
import {
  bold,
  dim,
  formatCoachReply,
  formatCorrection,
  formatLevel,
  printChatBanner,
  printCommandsHelp,
  red,
  yellow,
  cyan,
  consolePrinter,
  type Printer,
} from '../utils/terminal';

/** Turns shown by /history */
const HISTORY_LINES = 10;

export interface ChatOptions {
  /** Resume this conversation; a new id is generated when absent */
  conversationId?: string;
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
  print?: Printer;
}

export interface ChatOutcome {
  conversationId: string;
  /** Utterances that completed a coaching turn */
  turnsCompleted: number;
}

type SlashOutcome = 'continue' | 'quit';

/**
 * Lines printed for one completed coaching turn.
 */
export function formatTurnResult(result: CoachingTurnResult): string[] {
  const lines: string[] = [''];

  if (result.correctedText) {
    lines.push(...formatCorrection(result.correctedText, result.explanation));
  }
  lines.push(formatCoachReply(result.replyText));
  lines.push(dim(`[level: ${result.proficiency.level}, mistakes this turn: ${result.mistakes.length}]`));
  lines.push('');

  return lines;
}

/**
 * Runs the interactive loop until /quit, end of input or Ctrl+C.
 */
export async function runChatCommand(
  service: CoachingService,
  options: ChatOptions = {}
): Promise<ChatOutcome> {
  const print = options.print ?? consolePrinter;
  const conversationId = options.conversationId ?? createConversationId();

  const previous = await service.history(conversationId);
  printChatBanner(print, conversationId, previous.length > 0);

  const rl = readline.createInterface({
    input: options.input ?? process.stdin,
    output: options.output ?? process.stdout,
    prompt: bold('You: '),
  });
  const lines = rl[Symbol.asyncIterator]();

  let turnsCompleted = 0;
  let inFlight: AbortController | undefined;

  rl.on('SIGINT', () => {
    print(dim('\n\nReceived Ctrl+C...'));
    inFlight?.abort(new Error('Interrupted'));
    rl.close();
  });

  rl.prompt();

  for await (const rawLine of lines) {
    const line = rawLine.trim();

    if (!line) {
      rl.prompt();
      continue;
    }

    if (line.startsWith('/')) {
      const outcome = await handleSlashCommand(line, service, conversationId, print);
      if (outcome === 'quit') {
        break;
      }
      rl.prompt();
      continue;
    }

    inFlight = new AbortController();
    try {
      const { result } = await service.converse({ conversationId, utterance: line }, { signal: inFlight.signal });
      turnsCompleted++;
      for (const output of formatTurnResult(result)) {
        print(output);
      }
    } catch (error) {
      printTurnError(error, print);
    } finally {
      inFlight = undefined;
    }

    rl.prompt();
  }

  // Leaving the loop closes the interface
  print();
  print(dim(`Conversation saved as ${conversationId}. Resume with: npm run cli -- chat --conversation ${conversationId}`));
  print();

  return { conversationId, turnsCompleted };
}

function printTurnError(error: unknown, print: Printer): void {
  print();
  print(red('Error processing your message:'));
  print(dim(error instanceof Error ? error.message : String(error)));
  if (error instanceof CoachingError && error.retryable) {
    print(dim('Check the inference backend with: npm run cli -- status'));
  }
  print();
}

async function handleSlashCommand(
  input: string,
  service: CoachingService,
  conversationId: string,
  print: Printer
): Promise<SlashOutcome> {
  const command = input.toLowerCase().split(/\s+/)[0];

  switch (command) {
    case '/quit':
    case '/exit':
    case '/q':
      return 'quit';

    case '/help':
      printCommandsHelp(print);
      return 'continue';

    case '/stats':
      await runStatsCommand(service, conversationId, print);
      return 'continue';

    case '/history': {
      const turns = await service.history(conversationId, HISTORY_LINES);
      print();
      if (turns.length === 0) {
        print(dim('  No turns yet.'));
      }
      for (const turn of turns) {
        const label = turn.speaker === 'user' ? bold('You:') : cyan('Coach:');
        print(`  ${dim(`#${turn.sequence}`)} ${label} ${turn.text}`);
      }
      print();
      return 'continue';
    }

    case '/reset': {
      await service.reset(conversationId);
      const proficiency = await service.proficiency(conversationId);
      print(yellow(`Conversation reset. Level: `) + formatLevel(proficiency.level));
      return 'continue';
    }

    default:
      print(yellow(`Unknown command: ${command}. Type /help for available commands.`));
      return 'continue';
  }
}
