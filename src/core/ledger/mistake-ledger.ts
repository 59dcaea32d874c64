/**
 * Mistake Ledger
 *
 * An append-only log of classified mistakes per conversation, plus the count
 * of user turns observed. Everything the ledger reports (proficiency, summary
 * statistics) is derived from those two pieces of state on demand.
 *
 * Records are denormalised: each keeps its own copy of the fragment and the
 * explanation, so the ledger never needs to read conversation memory.
 *
 * @example
 * ```typescript
 * const ledger = new MistakeLedger();
 *
 * ledger.record('conv_1', {
 *   category: 'tense',
 *   original: 'am go',
 *   corrected: 'went',
 *   explanation: 'Use the simple past for finished actions.',
 *   turnSequence: 1,
 *   source: 'classifier',
 * });
 * ledger.observeTurn('conv_1', 1);
 *
 * ledger.proficiency('conv_1').level; // 'beginner'
 * ```
 */

import { z } from 'zod';
import { ValidationError } from '../errors';
import {
  MISTAKE_CATEGORIES,
  type ConversationId,
  type MistakeCategory,
  type MistakeRecord,
  type MistakeSummary,
  type ProficiencyEstimate,
} from '../models';
import { computeProficiency, DEFAULT_PROFICIENCY } from './proficiency';

/** Number of entries in the summary's common and recent mistake lists */
const SUMMARY_LIST_SIZE = 5;

/**
 * Input accepted by record(). `recordedAt` defaults to now.
 */
export type NewMistakeRecord = Omit<MistakeRecord, 'recordedAt'> & { recordedAt?: Date };

/**
 * Serializable ledger state for one conversation.
 */
export interface LedgerSnapshot {
  conversationId: ConversationId;
  turnsObserved: number;
  lastObservedTurn: number;
  records: MistakeRecord[];
  /** When the first observed user turn was spoken; absent before any */
  firstObservedAt?: Date;
  lastObservedAt?: Date;
}

const mistakeRecordSchema = z.object({
  category: z.enum(MISTAKE_CATEGORIES),
  original: z.string(),
  corrected: z.string(),
  explanation: z.string(),
  turnSequence: z.number().int().positive(),
  source: z.enum(['model', 'classifier']),
  recordedAt: z.coerce.date(),
});

/**
 * Schema for LedgerSnapshot. Dates are coerced so that snapshots that went
 * through JSON can be restored directly.
 */
export const ledgerSnapshotSchema = z
  .object({
    conversationId: z.string().min(1),
    turnsObserved: z.number().int().nonnegative(),
    lastObservedTurn: z.number().int().nonnegative(),
    records: z.array(mistakeRecordSchema),
    firstObservedAt: z.coerce.date().optional(),
    lastObservedAt: z.coerce.date().optional(),
  })
  .refine((snapshot) => snapshot.turnsObserved <= snapshot.lastObservedTurn, {
    message: 'turnsObserved cannot exceed lastObservedTurn',
    path: ['turnsObserved'],
  });

interface LedgerState {
  records: MistakeRecord[];
  turnsObserved: number;
  lastObservedTurn: number;
  /** Highest turnSequence recorded so far */
  highestRecordedTurn: number;
  firstObservedAt: Date | null;
  lastObservedAt: Date | null;
}

/**
 * In-process ledger for all conversations.
 */
export class MistakeLedger {
  private readonly states = new Map<ConversationId, LedgerState>();

  /**
   * Appends a mistake record for a conversation.
   *
   * @returns The frozen record as stored
   * @throws ValidationError when the turn sequence is not a positive integer
   *   or is lower than a turn already recorded or observed
   */
  record(conversationId: ConversationId, input: NewMistakeRecord): MistakeRecord {
    this.assertConversationId(conversationId);
    const state = this.stateFor(conversationId);
    this.assertRecordable(conversationId, state, input);
    return this.commitRecord(state, input);
  }

  /**
   * Counts a user turn toward the proficiency estimate.
   *
   * @param observedAt - When the turn was spoken (default now)
   * @throws ValidationError when the sequence is not after the last observed turn
   */
  observeTurn(conversationId: ConversationId, turnSequence: number, observedAt: Date = new Date()): void {
    this.assertConversationId(conversationId);
    const state = this.stateFor(conversationId);
    this.assertObservable(conversationId, state, turnSequence);
    this.commitObservation(state, turnSequence, observedAt);
  }

  /**
   * Records all mistakes of one user turn and observes the turn. Every
   * record and the observation are checked before anything is written, so
   * a rejected turn leaves the ledger as it was.
   *
   * @throws ValidationError as record() and observeTurn() do
   */
  recordTurn(
    conversationId: ConversationId,
    turnSequence: number,
    mistakes: readonly NewMistakeRecord[],
    observedAt: Date = new Date()
  ): MistakeRecord[] {
    this.assertConversationId(conversationId);
    const state = this.states.get(conversationId) ?? emptyState();

    this.assertObservable(conversationId, state, turnSequence);
    for (const mistake of mistakes) {
      if (mistake.turnSequence !== turnSequence) {
        throw new ValidationError(
          `Mistake for turn ${mistake.turnSequence} cannot be recorded with turn ${turnSequence}`,
          { stage: 'ledger', conversationId }
        );
      }
      this.assertRecordable(conversationId, state, mistake);
    }

    this.states.set(conversationId, state);
    const records = mistakes.map((mistake) => this.commitRecord(state, mistake));
    this.commitObservation(state, turnSequence, observedAt);
    return records;
  }

  /**
   * Whether `turnSequence` would be accepted by observeTurn().
   */
  canObserve(conversationId: ConversationId, turnSequence: number): boolean {
    const lastObserved = this.states.get(conversationId)?.lastObservedTurn ?? 0;
    return Number.isInteger(turnSequence) && turnSequence > lastObserved;
  }

  /**
   * Current proficiency estimate. Never fails; unknown ids get the default.
   */
  proficiency(conversationId: ConversationId): ProficiencyEstimate {
    const state = this.states.get(conversationId);
    if (!state) return DEFAULT_PROFICIENCY;
    return computeProficiency(state.records, state.turnsObserved);
  }

  /**
   * All records for a conversation, oldest first.
   */
  records(conversationId: ConversationId): readonly MistakeRecord[] {
    return [...(this.states.get(conversationId)?.records ?? [])];
  }

  /**
   * Statistics for display: accuracy, most common categories, recent mistakes.
   */
  summary(conversationId: ConversationId): MistakeSummary {
    const state = this.states.get(conversationId);
    const records = state?.records ?? [];
    const totalTurns = state?.turnsObserved ?? 0;
    const durationMs =
      state?.firstObservedAt && state.lastObservedAt
        ? state.lastObservedAt.getTime() - state.firstObservedAt.getTime()
        : 0;

    const turnsWithMistakes = new Set(records.map((r) => r.turnSequence)).size;
    const accuracyRate =
      totalTurns === 0
        ? 100
        : Math.round((Math.max(totalTurns - turnsWithMistakes, 0) / totalTurns) * 10000) / 100;

    const counts = new Map<MistakeCategory, number>();
    for (const record of records) {
      counts.set(record.category, (counts.get(record.category) ?? 0) + 1);
    }

    // Most frequent first; ties keep the fixed category order
    const commonMistakes = MISTAKE_CATEGORIES.map((category) => ({
      category,
      count: counts.get(category) ?? 0,
    }))
      .filter((entry) => entry.count > 0)
      .sort((a, b) => b.count - a.count)
      .slice(0, SUMMARY_LIST_SIZE);

    return {
      totalTurns,
      correctionsMade: records.length,
      turnsWithMistakes,
      accuracyRate,
      commonMistakes,
      recentMistakes: records.slice(-SUMMARY_LIST_SIZE),
      durationMinutes: Math.round((durationMs / 60_000) * 100) / 100,
    };
  }

  snapshot(conversationId: ConversationId): LedgerSnapshot {
    const state = this.states.get(conversationId);
    return {
      conversationId,
      turnsObserved: state?.turnsObserved ?? 0,
      lastObservedTurn: state?.lastObservedTurn ?? 0,
      records: [...(state?.records ?? [])],
      ...(state?.firstObservedAt && { firstObservedAt: state.firstObservedAt }),
      ...(state?.lastObservedAt && { lastObservedAt: state.lastObservedAt }),
    };
  }

  /**
   * Replaces the state for the snapshot's conversation.
   *
   * @throws ValidationError when the snapshot does not match the schema
   */
  restore(snapshot: unknown): void {
    const result = ledgerSnapshotSchema.safeParse(snapshot);
    if (!result.success) {
      throw new ValidationError(
        `Invalid ledger snapshot: ${result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`).join(', ')}`,
        { stage: 'ledger', cause: result.error }
      );
    }

    const { conversationId, turnsObserved, lastObservedTurn, firstObservedAt, lastObservedAt } = result.data;
    const records = [...result.data.records]
      .sort((a, b) => a.turnSequence - b.turnSequence)
      .map((record): MistakeRecord => Object.freeze({ ...record }));

    this.states.set(conversationId, {
      records,
      turnsObserved,
      lastObservedTurn,
      highestRecordedTurn: records.at(-1)?.turnSequence ?? 0,
      firstObservedAt: firstObservedAt ?? null,
      lastObservedAt: lastObservedAt ?? null,
    });
  }

  reset(conversationId: ConversationId): void {
    this.states.delete(conversationId);
  }

  has(conversationId: ConversationId): boolean {
    return this.states.has(conversationId);
  }

  private stateFor(conversationId: ConversationId): LedgerState {
    let state = this.states.get(conversationId);
    if (!state) {
      state = emptyState();
      this.states.set(conversationId, state);
    }
    return state;
  }

  private assertRecordable(conversationId: ConversationId, state: LedgerState, input: NewMistakeRecord): void {
    const context = { stage: 'ledger' as const, conversationId };
    if (!Number.isInteger(input.turnSequence) || input.turnSequence < 1) {
      throw new ValidationError(
        `turnSequence must be a positive integer, got ${input.turnSequence}`,
        context
      );
    }
    if (!isMistakeCategory(input.category)) {
      throw new ValidationError(`Unknown mistake category: ${String(input.category)}`, context);
    }

    const highest = Math.max(state.highestRecordedTurn, state.lastObservedTurn);
    if (input.turnSequence < highest) {
      throw new ValidationError(
        `turnSequence ${input.turnSequence} is older than turn ${highest} already in the ledger`,
        context
      );
    }
  }

  private assertObservable(conversationId: ConversationId, state: LedgerState, turnSequence: number): void {
    if (!Number.isInteger(turnSequence) || turnSequence <= state.lastObservedTurn) {
      throw new ValidationError(
        `Turn ${turnSequence} must come after the last observed turn ${state.lastObservedTurn}`,
        { stage: 'ledger', conversationId }
      );
    }
  }

  private commitRecord(state: LedgerState, input: NewMistakeRecord): MistakeRecord {
    const record: MistakeRecord = Object.freeze({
      category: input.category,
      original: input.original,
      corrected: input.corrected,
      explanation: input.explanation,
      turnSequence: input.turnSequence,
      source: input.source,
      recordedAt: input.recordedAt ?? new Date(),
    });

    state.records.push(record);
    state.highestRecordedTurn = input.turnSequence;
    return record;
  }

  private commitObservation(state: LedgerState, turnSequence: number, observedAt: Date): void {
    state.turnsObserved += 1;
    state.lastObservedTurn = turnSequence;
    state.firstObservedAt ??= observedAt;
    state.lastObservedAt = observedAt;
  }

  private assertConversationId(conversationId: ConversationId): void {
    if (typeof conversationId !== 'string' || conversationId.trim().length === 0) {
      throw new ValidationError('conversationId must be a non-empty string', { stage: 'ledger' });
    }
  }
}

function emptyState(): LedgerState {
  return {
    records: [],
    turnsObserved: 0,
    lastObservedTurn: 0,
    highestRecordedTurn: 0,
    firstObservedAt: null,
    lastObservedAt: null,
  };
}

function isMistakeCategory(value: unknown): value is MistakeCategory {
  return MISTAKE_CATEGORIES.some((category) => category === value);
}
