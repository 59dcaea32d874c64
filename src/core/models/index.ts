/**
 * Core Domain Models - Barrel Export
 *
 * Re-exports all domain types for convenient importing. Apart from the
 * category list constant, these are pure types with no runtime behaviour.
 *
 * @example
 * ```typescript
 * import type { Turn, MistakeRecord, ProficiencyEstimate } from '@/core/models';
 * ```
 */

// Conversation types - turns and identifiers
export type { ConversationId, Speaker, Turn, NewTurn } from './conversation';

// Mistake types - ledger entries and the derived proficiency estimate
export { MISTAKE_CATEGORIES } from './mistake';
export type {
  MistakeCategory,
  MistakeSource,
  MistakeRecord,
  ProficiencyLevel,
  ProficiencyEstimate,
  MistakeSummary,
} from './mistake';

// Coaching result types
export type { CoachingTurnResult, ConversationTurnResponse } from './coaching';
