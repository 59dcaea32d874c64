/**
 * Utterance Classifier - Barrel Export
 */

export { classify } from './utterance-classifier';
export type { ClassifiedMistake } from './utterance-classifier';
export { CLASSIFIER_RULES, matchCase } from './rules';
export type { ClassifierRule, RuleContext, RuleVerdict } from './rules';
