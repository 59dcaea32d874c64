/**
 * Conversation Export - Barrel Export
 */

export {
  exportConversation,
  snapshotToCSV,
  escapeCSV,
  isExportFormat,
  EXPORT_FORMATS,
  type ExportFormat,
} from './conversation-export';
