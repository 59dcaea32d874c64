/**
 * Mistake & Proficiency Domain Types
 *
 * MistakeRecords are the append-only entries of the Mistake Ledger. The
 * ProficiencyEstimate is never stored: it is recomputed from the records and
 * the number of observed user turns whenever it is asked for.
 */

/**
 * The fixed set of grammar error categories, in display order.
 * Used as the tie-breaker when ranking common mistakes.
 */
export const MISTAKE_CATEGORIES = [
  'tense',
  'article',
  'preposition',
  'subject-verb-agreement',
  'vocabulary',
  'other',
] as const;

export type MistakeCategory = (typeof MISTAKE_CATEGORIES)[number];

/**
 * Where a mistake was identified.
 *
 * - 'model': listed by the language model in a `Mistake:` line
 * - 'classifier': found by the local rule-based classifier
 */
export type MistakeSource = 'model' | 'classifier';

/**
 * A single classified mistake, denormalised at write time.
 *
 * The record keeps its own copy of the fragment and explanation so that
 * evicting the originating Turn from memory never changes ledger statistics.
 */
export interface MistakeRecord {
  readonly category: MistakeCategory;
  /** The incorrect fragment as the learner wrote it */
  readonly original: string;
  /** Suggested replacement; empty when no concrete fix is known */
  readonly corrected: string;
  readonly explanation: string;
  /** Sequence number of the user Turn this mistake belongs to */
  readonly turnSequence: number;
  readonly source: MistakeSource;
  readonly recordedAt: Date;
}

/**
 * Coarse learner level used to adapt coaching tone.
 */
export type ProficiencyLevel = 'beginner' | 'intermediate' | 'advanced';

/**
 * Derived skill estimate for one conversation.
 */
export interface ProficiencyEstimate {
  readonly level: ProficiencyLevel;
  /** Mistakes per observed turn, per category */
  readonly errorRates: Readonly<Record<MistakeCategory, number>>;
  /** Total mistakes per observed turn */
  readonly overallErrorRate: number;
  readonly turnsObserved: number;
  readonly mistakeCount: number;
}

/**
 * Summary statistics for one conversation.
 */
export interface MistakeSummary {
  totalTurns: number;
  /** Number of mistake records written */
  correctionsMade: number;
  /** Number of distinct user turns with at least one mistake */
  turnsWithMistakes: number;
  /** Percentage (0-100) of observed turns without mistakes, two decimals */
  accuracyRate: number;
  /** Up to five most frequent categories, most frequent first */
  commonMistakes: Array<{ category: MistakeCategory; count: number }>;
  /** Up to five most recent records, oldest first */
  recentMistakes: MistakeRecord[];
  /** Minutes between the first and last observed user turn, two decimals */
  durationMinutes: number;
}
