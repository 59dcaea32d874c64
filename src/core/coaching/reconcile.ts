/**
 * Mistake Reconciliation
 *
 * Merges the model's own mistake list with the classifier's candidates into
 * the records written to the ledger for one turn:
 *
 * 1. Every `Mistake:` line from the model, in order
 * 2. Each classifier candidate whose fragment does not overlap a model
 *    fragment (case-insensitive containment either way)
 * 3. If neither produced anything but the model corrected the sentence, one
 *    'other' record for the whole utterance
 *
 * When both sources flag the same words, the model's category and wording win.
 */

import type { ClassifiedMistake } from '../classifier';
import type { NewMistakeRecord } from '../ledger';
import type { CoachResponse } from '../../llm/prompts';

export interface ReconcileInput {
  utterance: string;
  /** Sequence of the user turn the mistakes belong to */
  turnSequence: number;
  candidates: readonly ClassifiedMistake[];
  response: CoachResponse;
  recordedAt?: Date;
}

function fragmentsOverlap(a: string, b: string): boolean {
  const left = a.toLowerCase();
  const right = b.toLowerCase();
  return left.includes(right) || right.includes(left);
}

/**
 * Lowercases and drops punctuation and repeated whitespace, so that a
 * correction differing only in a final full stop counts as unchanged.
 */
export function normalizeSentence(text: string): string {
  return text
    .toLowerCase()
    .replace(/[.,!?;:"'`]/g, '')
    .replace(/\s+/g, ' ')
    .trim();
}

export function reconcileMistakes(input: ReconcileInput): NewMistakeRecord[] {
  const { utterance, turnSequence, candidates, response } = input;
  const recordedAt = input.recordedAt ?? new Date();

  const fromModel: NewMistakeRecord[] = response.mistakes.map((mistake) => ({
    category: mistake.category,
    original: mistake.original,
    corrected: mistake.corrected,
    explanation: mistake.explanation || response.explanation,
    turnSequence,
    source: 'model',
    recordedAt,
  }));

  const fromClassifier: NewMistakeRecord[] = candidates
    .filter(
      (candidate) =>
        !fromModel.some((record) => fragmentsOverlap(record.original, candidate.fragment))
    )
    .map((candidate) => ({
      category: candidate.category,
      original: candidate.fragment,
      corrected: candidate.suggestedCorrection ?? '',
      explanation: candidate.explanation,
      turnSequence,
      source: 'classifier',
      recordedAt,
    }));

  const records = [...fromModel, ...fromClassifier];
  if (records.length > 0) {
    return records;
  }

  if (response.correction && normalizeSentence(response.correction) !== normalizeSentence(utterance)) {
    return [
      {
        category: 'other',
        original: utterance,
        corrected: response.correction,
        explanation: response.explanation,
        turnSequence,
        source: 'model',
        recordedAt,
      },
    ];
  }

  return [];
}
