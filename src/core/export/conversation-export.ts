/**
 * Conversation Export
 *
 * Serializes a ConversationSnapshot for download: JSON keeps the full
 * snapshot and can be imported again; CSV flattens turns and mistakes into
 * two sections for spreadsheets.
 *
 * @example
 * ```typescript
 * const snapshot = await service.exportSnapshot('conv_1234');
 * await writeFile('conv_1234.csv', exportConversation(snapshot, 'csv'));
 * ```
 */

import type { ConversationSnapshot } from '../coaching';

export type ExportFormat = 'json' | 'csv';

export const EXPORT_FORMATS: readonly ExportFormat[] = ['json', 'csv'];

export function isExportFormat(value: string): value is ExportFormat {
  return value === 'json' || value === 'csv';
}

export function exportConversation(snapshot: ConversationSnapshot, format: ExportFormat): string {
  return format === 'csv' ? snapshotToCSV(snapshot) : JSON.stringify(snapshot, null, 2);
}

/**
 * Escape a value for CSV output.
 *
 * Values containing a comma, double quote or line break are quoted, with
 * inner quotes doubled.
 */
export function escapeCSV(value: string | number | null | undefined): string {
  if (value === null || value === undefined) {
    return '';
  }

  const str = String(value);
  if (str.includes(',') || str.includes('"') || str.includes('\n') || str.includes('\r')) {
    return `"${str.replace(/"/g, '""')}"`;
  }

  return str;
}

/**
 * Two sections separated by a blank line: retained turns, then every
 * ledger record.
 */
export function snapshotToCSV(snapshot: ConversationSnapshot): string {
  const sections: string[] = [];

  sections.push('# Turns');
  sections.push(['sequence', 'speaker', 'text', 'timestamp'].join(','));
  for (const turn of snapshot.memory.turns) {
    sections.push(
      [
        escapeCSV(turn.sequence),
        escapeCSV(turn.speaker),
        escapeCSV(turn.text),
        escapeCSV(turn.timestamp.toISOString()),
      ].join(',')
    );
  }

  sections.push('');
  sections.push('# Mistakes');
  sections.push(
    ['turnSequence', 'category', 'original', 'corrected', 'explanation', 'source', 'recordedAt'].join(',')
  );
  for (const record of snapshot.ledger.records) {
    sections.push(
      [
        escapeCSV(record.turnSequence),
        escapeCSV(record.category),
        escapeCSV(record.original),
        escapeCSV(record.corrected),
        escapeCSV(record.explanation),
        escapeCSV(record.source),
        escapeCSV(record.recordedAt.toISOString()),
      ].join(',')
    );
  }

  return sections.join('\n') + '\n';
}
