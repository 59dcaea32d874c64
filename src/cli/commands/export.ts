/**
 * Export Command Handler
 *
 * Writes one conversation's stored state to a file, as a JSON snapshot that
 * `PUT /api/conversations/:id/snapshot` accepts again, or as CSV.
 *
 * Usage (via CLI):
 * ```bash
 * npm run cli -- export conv_1234
 * npm run cli -- export conv_1234 --format csv --output practice.csv
 * ```
 */

import { stat, writeFile } from 'node:fs/promises';
import type { CoachingService } from '../../core/coaching';
import { exportConversation, isExportFormat, type ExportFormat } from '../../core/export';
import { bold, dim, formatSeparator, green, yellow, consolePrinter, type Printer } from '../utils/terminal';

export interface ExportCommandOptions {
  /** Output file path; defaults to "<id>.<format>" */
  output?: string;
  /** json or csv; anything else falls back to json with a warning */
  format: string;
}

/**
 * Formats a byte count as B, KB or MB.
 */
export function formatBytes(bytes: number): string {
  if (bytes < 1024) {
    return `${bytes} B`;
  }
  if (bytes < 1024 * 1024) {
    return `${(bytes / 1024).toFixed(1)} KB`;
  }
  return `${(bytes / (1024 * 1024)).toFixed(2)} MB`;
}

function resolveFormat(format: string, print: Printer): ExportFormat {
  const normalized = format.toLowerCase();
  if (isExportFormat(normalized)) {
    return normalized;
  }
  print(yellow(`Warning: Unknown format "${format}", defaulting to JSON`));
  return 'json';
}

/**
 * Exports a conversation and returns the path written.
 */
export async function runExportCommand(
  service: CoachingService,
  conversationId: string,
  options: ExportCommandOptions,
  print: Printer = consolePrinter
): Promise<string> {
  print();
  print(bold('Exporting Conversation'));
  print(formatSeparator(40));

  const format = resolveFormat(options.format, print);
  print(`  Conversation: ${dim(conversationId)}`);
  print(`  Format: ${dim(format)}`);

  const snapshot = await service.exportSnapshot(conversationId);
  if (snapshot.memory.turns.length === 0 && snapshot.ledger.records.length === 0) {
    print(yellow(`  Conversation "${conversationId}" has no stored turns; writing an empty export.`));
  }

  const outputFile = options.output ?? `${conversationId}.${format}`;
  await writeFile(outputFile, exportConversation(snapshot, format), 'utf-8');
  const { size } = await stat(outputFile);

  print();
  print(green(`  Exported to ${outputFile}`));
  print(dim(`  Size: ${formatBytes(size)}`));
  print();

  return outputFile;
}
