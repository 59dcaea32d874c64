/**
 * Utterance Classifier
 *
 * A deterministic first pass over a learner's message. It runs the rule table
 * and returns candidate mistakes before the model is consulted, so the
 * orchestrator has a local signal even when the inference backend is down,
 * and so the model's own corrections can be bucketed into categories.
 *
 * Overlapping matches are resolved by keeping the longest fragment, then the
 * earliest one. The surviving candidates come back in position order.
 *
 * @example
 * ```typescript
 * classify('I am go market yesterday');
 * // [{ category: 'tense', fragment: 'am go', suggestedCorrection: 'went', ... }]
 * ```
 */

import type { MistakeCategory } from '../models';
import { CLASSIFIER_RULES, buildRuleContext, type ClassifierRule, type RuleContext } from './rules';

/**
 * A candidate mistake found by the rule table.
 */
export interface ClassifiedMistake {
  category: MistakeCategory;
  /** The exact text of the utterance that matched */
  fragment: string;
  /** Replacement for the fragment, when the rule can build one */
  suggestedCorrection?: string;
  explanation: string;
  /** Character offset of the fragment within the utterance */
  start: number;
  /** Id of the rule that produced this candidate */
  ruleId: string;
}

interface RankedCandidate {
  mistake: ClassifiedMistake;
  end: number;
  /** Position of the producing rule in the table, for stable tie-breaks */
  rank: number;
}

function collectMatches(
  utterance: string,
  context: RuleContext,
  rule: ClassifierRule,
  rank: number
): RankedCandidate[] {
  const candidates: RankedCandidate[] = [];

  for (const match of utterance.matchAll(rule.pattern)) {
    const start = match.index ?? 0;
    const verdict = rule.correct(match, context);
    if (!verdict) continue;

    const fragment = match[0];
    candidates.push({
      mistake: {
        category: rule.category,
        fragment,
        ...(verdict.correction !== fragment ? { suggestedCorrection: verdict.correction } : {}),
        explanation: verdict.explanation,
        start,
        ruleId: rule.id,
      },
      end: start + fragment.length,
      rank,
    });
  }

  return candidates;
}

function overlaps(a: RankedCandidate, b: RankedCandidate): boolean {
  return a.mistake.start < b.end && b.mistake.start < a.end;
}

/**
 * Classifies an utterance into candidate mistakes.
 *
 * Never throws: empty, whitespace-only or non-string input yields `[]`.
 */
export function classify(utterance: unknown): ClassifiedMistake[] {
  if (typeof utterance !== 'string' || utterance.trim().length === 0) {
    return [];
  }

  const context = buildRuleContext(utterance);
  const all = CLASSIFIER_RULES.flatMap((rule, rank) =>
    collectMatches(utterance, context, rule, rank)
  );

  // Longest fragment first, then earliest position, then table order
  all.sort(
    (a, b) =>
      b.mistake.fragment.length - a.mistake.fragment.length ||
      a.mistake.start - b.mistake.start ||
      a.rank - b.rank
  );

  const kept: RankedCandidate[] = [];
  for (const candidate of all) {
    if (!kept.some((existing) => overlaps(existing, candidate))) {
      kept.push(candidate);
    }
  }

  return kept
    .sort((a, b) => a.mistake.start - b.mistake.start)
    .map((candidate) => candidate.mistake);
}
