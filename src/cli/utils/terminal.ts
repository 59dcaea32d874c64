/**
 * Terminal Utilities for CLI Output Formatting
 *
 * ANSI escape code wrappers for colorizing terminal output, plus the
 * formatters used by the chat, stats and status commands.
 *
 * Usage:
 * ```typescript
 * import { bold, green, formatCoachReply } from './terminal';
 *
 * console.log(bold('Fluency Coach'));
 * console.log(formatCoachReply('Great! What did you buy?'));
 * ```
 *
 * In non-TTY environments the escape codes pass through unchanged.
 */

import type { MistakeRecord, ProficiencyLevel } from '../../core/models';

/**
 * Writes one line of output. Commands take one so tests can collect
 * what would have been printed.
 */
export type Printer = (line?: string) => void;

/** Prints to stdout */
export const consolePrinter: Printer = (line = '') => console.log(line);

// =============================================================================
// Text Style Modifiers
// =============================================================================

/**
 * Makes text bold/bright in the terminal.
 *
 * @example
 * console.log(bold('Conversation Statistics'));
 */
export const bold = (s: string): string => `\x1b[1m${s}\x1b[0m`;

/** Dims text; used for hints and secondary details */
export const dim = (s: string): string => `\x1b[2m${s}\x1b[0m`;

// =============================================================================
// Color Functions
// =============================================================================

export const green = (s: string): string => `\x1b[32m${s}\x1b[0m`;

export const yellow = (s: string): string => `\x1b[33m${s}\x1b[0m`;

export const blue = (s: string): string => `\x1b[34m${s}\x1b[0m`;

export const red = (s: string): string => `\x1b[31m${s}\x1b[0m`;

export const cyan = (s: string): string => `\x1b[36m${s}\x1b[0m`;

// =============================================================================
// Semantic Formatters
// =============================================================================

/**
 * Formats the coach's reply for display.
 *
 * @example
 * console.log(formatCoachReply('What did you buy at the market?'));
 * // Output: "Coach: What did you buy at the market?" in cyan
 */
export function formatCoachReply(message: string): string {
  return cyan(`Coach: ${message}`);
}

/**
 * Formats a suggested correction, with its explanation when there is one.
 */
export function formatCorrection(correctedText: string, explanation: string): string[] {
  const lines = [`${yellow('Correction:')} ${correctedText}`];
  if (explanation) {
    lines.push(dim(`  ${explanation}`));
  }
  return lines;
}

/**
 * Formats one ledger record as "category: original -> corrected".
 * Records without a concrete fix show only the original fragment.
 */
export function formatMistake(mistake: MistakeRecord): string {
  const fix = mistake.corrected ? ` -> ${green(mistake.corrected)}` : '';
  return `  ${yellow(mistake.category.padEnd(12))} ${red(mistake.original)}${fix}`;
}

/** Colors a proficiency level: red, yellow or green from beginner up */
export function formatLevel(level: ProficiencyLevel): string {
  switch (level) {
    case 'beginner':
      return red(level);
    case 'intermediate':
      return yellow(level);
    case 'advanced':
      return green(level);
  }
}

/**
 * Formats a horizontal separator line for visual section breaks.
 */
export function formatSeparator(width: number = 50): string {
  return dim('─'.repeat(width));
}

/**
 * Formats command help text for display.
 *
 * @example
 * console.log(formatCommandHelp('/quit', 'End the conversation'));
 * // Output: "  /quit      - End the conversation"
 */
export function formatCommandHelp(command: string, description: string): string {
  return `  ${yellow(command.padEnd(10))} - ${dim(description)}`;
}

/**
 * Prints the banner shown when a chat starts.
 */
export function printChatBanner(print: Printer, conversationId: string, resumed: boolean): void {
  print();
  print(formatSeparator(60));
  print(bold('  Fluency Coach - Conversation Practice'));
  print(formatSeparator(60));
  print(`  Conversation: ${green(conversationId)}${resumed ? dim(' (resumed)') : ''}`);
  print(formatSeparator(60));
  print();
  print(dim('  Write in English. Commands: /stats | /history | /reset | /quit | /help'));
  print();
}

/**
 * Prints available chat commands. Called when the user types /help.
 */
export function printCommandsHelp(print: Printer): void {
  print();
  print(bold('Available Commands:'));
  print(formatCommandHelp('/stats', 'Show mistake statistics and proficiency'));
  print(formatCommandHelp('/history', 'Show the recent conversation'));
  print(formatCommandHelp('/reset', 'Forget this conversation and start over'));
  print(formatCommandHelp('/help', 'Show this help message'));
  print(formatCommandHelp('/quit', 'End the conversation'));
  print();
}
