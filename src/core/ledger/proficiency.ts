/**
 * Proficiency Estimation
 *
 * The proficiency level is a pure function of a conversation's mistake
 * records and the number of user turns observed. Record order does not
 * matter: only the multiset of categories is counted.
 */

import {
  MISTAKE_CATEGORIES,
  type MistakeCategory,
  type MistakeRecord,
  type ProficiencyEstimate,
  type ProficiencyLevel,
} from '../models';

/** Below this many observed turns the estimate stays at beginner */
export const MIN_TURNS_FOR_ESTIMATE = 3;

/** Overall error rate at or above which a learner is rated beginner */
export const BEGINNER_ERROR_RATE = 0.5;

/** Overall error rate at or above which a learner is rated intermediate */
export const INTERMEDIATE_ERROR_RATE = 0.2;

function emptyRates(): Record<MistakeCategory, number> {
  return {
    tense: 0,
    article: 0,
    preposition: 0,
    'subject-verb-agreement': 0,
    vocabulary: 0,
    other: 0,
  };
}

/**
 * Maps an overall error rate to a level.
 */
export function levelForErrorRate(overallErrorRate: number, turnsObserved: number): ProficiencyLevel {
  if (turnsObserved < MIN_TURNS_FOR_ESTIMATE) return 'beginner';
  if (overallErrorRate >= BEGINNER_ERROR_RATE) return 'beginner';
  if (overallErrorRate >= INTERMEDIATE_ERROR_RATE) return 'intermediate';
  return 'advanced';
}

/**
 * Estimate for a conversation with no history.
 */
export const DEFAULT_PROFICIENCY: ProficiencyEstimate = Object.freeze({
  level: 'beginner',
  errorRates: Object.freeze(emptyRates()),
  overallErrorRate: 0,
  turnsObserved: 0,
  mistakeCount: 0,
});

/**
 * Derives the proficiency estimate from mistake records.
 *
 * Rates are mistakes per observed turn. When no turn has been observed yet the
 * divisor is 1, so stray records still show up in the rates.
 */
export function computeProficiency(
  records: ReadonlyArray<Pick<MistakeRecord, 'category'>>,
  turnsObserved: number
): ProficiencyEstimate {
  if (records.length === 0 && turnsObserved === 0) {
    return DEFAULT_PROFICIENCY;
  }

  const counts = emptyRates();
  for (const record of records) {
    counts[record.category] += 1;
  }

  const divisor = Math.max(turnsObserved, 1);
  const errorRates = emptyRates();
  for (const category of MISTAKE_CATEGORIES) {
    errorRates[category] = counts[category] / divisor;
  }

  const overallErrorRate = records.length / divisor;

  return Object.freeze({
    level: levelForErrorRate(overallErrorRate, turnsObserved),
    errorRates: Object.freeze(errorRates),
    overallErrorRate,
    turnsObserved,
    mistakeCount: records.length,
  });
}
