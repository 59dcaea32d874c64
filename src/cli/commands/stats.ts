/**
 * Stats Command Handler
 *
 * Prints the mistake statistics and proficiency estimate for one
 * conversation. Conversations stored in SQLite are loaded first, so the
 * command works across CLI runs.
 *
 * Usage (via CLI):
 * ```bash
 * npm run cli -- stats conv_1234
 * ```
 */

import type { CoachingService } from '../../core/coaching';
import type { MistakeSummary, ProficiencyEstimate } from '../../core/models';
import {
  bold,
  cyan,
  dim,
  formatLevel,
  formatMistake,
  formatSeparator,
  green,
  red,
  yellow,
  consolePrinter,
  type Printer,
} from '../utils/terminal';

/**
 * Builds the statistics report as printable lines.
 */
export function formatStatsReport(
  conversationId: string,
  summary: MistakeSummary,
  proficiency: ProficiencyEstimate
): string[] {
  const lines: string[] = [];

  lines.push(bold(cyan('===== Conversation Statistics =====')));
  lines.push(`  Conversation: ${bold(conversationId)}`);
  lines.push(formatSeparator(40));

  if (summary.totalTurns === 0) {
    lines.push(dim('  No turns yet. Start with: npm run cli -- chat --conversation ' + conversationId));
    return lines;
  }

  const accuracyColor = summary.accuracyRate >= 80 ? green : summary.accuracyRate >= 50 ? yellow : red;

  lines.push(`  Turns: ${summary.totalTurns}`);
  lines.push(`  Corrections: ${summary.correctionsMade}`);
  lines.push(`  Turns with mistakes: ${summary.turnsWithMistakes}`);
  lines.push(`  Accuracy: ${accuracyColor(`${summary.accuracyRate}%`)}`);
  lines.push(`  Level: ${formatLevel(proficiency.level)}`);
  if (summary.totalTurns > 1) {
    lines.push(`  Duration: ${summary.durationMinutes} min`);
  }

  if (summary.commonMistakes.length > 0) {
    lines.push('');
    lines.push(bold(yellow('Common Mistakes')));
    lines.push(formatSeparator(40));
    for (const { category, count } of summary.commonMistakes) {
      lines.push(`  ${category.padEnd(12)} ${count}`);
    }
  }

  if (summary.recentMistakes.length > 0) {
    lines.push('');
    lines.push(bold(yellow('Recent Mistakes')));
    lines.push(formatSeparator(40));
    for (const mistake of summary.recentMistakes) {
      lines.push(formatMistake(mistake));
    }
  }

  return lines;
}

export async function runStatsCommand(
  service: CoachingService,
  conversationId: string,
  print: Printer = consolePrinter
): Promise<void> {
  const [summary, proficiency] = await Promise.all([
    service.summary(conversationId),
    service.proficiency(conversationId),
  ]);

  print();
  for (const line of formatStatsReport(conversationId, summary, proficiency)) {
    print(line);
  }
  print();
}
