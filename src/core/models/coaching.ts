/**
 * Coaching Result Types
 *
 * The structured value returned to callers for each coaching turn.
 */

import type { ConversationId } from './conversation';
import type { MistakeRecord, ProficiencyEstimate } from './mistake';

/**
 * Outcome of one handleTurn() call. Frozen before it is returned.
 */
export interface CoachingTurnResult {
  /** The learner's sentence as corrected by the coach, or '' if none */
  readonly correctedText: string;
  /** Why the correction was made, or '' if none */
  readonly explanation: string;
  /** The coach's conversational reply */
  readonly replyText: string;
  /** Proficiency snapshot taken after this turn's ledger writes */
  readonly proficiency: ProficiencyEstimate;
  /** Mistake records written for this turn */
  readonly mistakes: readonly MistakeRecord[];
  /**
   * False when the model response could not be split into sections and the
   * whole raw text was used as the reply.
   */
  readonly parsed: boolean;
}

/**
 * What the caller-facing entry point returns: the result plus the
 * conversation id (newly generated when the caller did not supply one).
 */
export interface ConversationTurnResponse {
  conversationId: ConversationId;
  result: CoachingTurnResult;
}
