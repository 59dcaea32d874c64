/**
 * Classifier Lexicon
 *
 * Word lists used by the rule table, loaded from `data/lexicon.json`, plus
 * the small inflection helpers the rules need (past tense, third person,
 * -ing form). Only the verbs listed in the lexicon are ever inflected, so the
 * helpers do not need to cover every English spelling rule.
 */

import lexiconData from './data/lexicon.json';

interface IrregularForms {
  past: string;
  thirdPerson: string;
}

export interface PrepositionEntry {
  heads: string[];
  wrong: string[];
  right: string;
  explanation: string;
}

export interface ConfusedPhrase {
  wrong: string;
  right: string;
  explanation: string;
}

const irregular = new Map<string, IrregularForms>(Object.entries(lexiconData.irregularVerbs));
const doubleFinal = new Set<string>(lexiconData.doubleFinalConsonant);

/** Base forms the verb rules recognise ('be' is handled by its own forms) */
export const BASE_VERBS: readonly string[] = [
  ...[...irregular.keys()].filter((verb) => verb !== 'be'),
  ...lexiconData.regularVerbs,
];

/**
 * Verbs that also read as adjectives, nouns or past participles after "be"
 * ("the shop is open", "it is like a dream"), so "be + verb" is not flagged.
 */
export const BE_COMPATIBLE_VERBS: ReadonlySet<string> = new Set(lexiconData.adjectiveLikeVerbs);

export const PREPOSITIONS: readonly PrepositionEntry[] = lexiconData.prepositions;

export const CONFUSED_PHRASES: readonly ConfusedPhrase[] = lexiconData.confusedPhrases;

const CONSONANT_SOUND_PREFIXES: readonly string[] = lexiconData.consonantSoundVowelWords;
const VOWEL_SOUND_PREFIXES: readonly string[] = lexiconData.vowelSoundConsonantWords;

const isVowel = (ch: string): boolean => 'aeiou'.includes(ch);

export function pastTense(verb: string): string {
  const forms = irregular.get(verb);
  if (forms) return forms.past;
  if (verb.endsWith('e')) return `${verb}d`;
  if (verb.endsWith('y') && !isVowel(verb.charAt(verb.length - 2))) {
    return `${verb.slice(0, -1)}ied`;
  }
  if (doubleFinal.has(verb)) return `${verb}${verb.charAt(verb.length - 1)}ed`;
  return `${verb}ed`;
}

export function thirdPerson(verb: string): string {
  const forms = irregular.get(verb);
  if (forms) return forms.thirdPerson;
  if (verb.endsWith('y') && !isVowel(verb.charAt(verb.length - 2))) {
    return `${verb.slice(0, -1)}ies`;
  }
  if (/(s|sh|ch|x|z|o)$/.test(verb)) return `${verb}es`;
  return `${verb}s`;
}

export function presentParticiple(verb: string): string {
  if (verb.endsWith('ie')) return `${verb.slice(0, -2)}ying`;
  if (verb.endsWith('e') && !verb.endsWith('ee')) return `${verb.slice(0, -1)}ing`;
  if (doubleFinal.has(verb)) return `${verb}${verb.charAt(verb.length - 1)}ing`;
  return `${verb}ing`;
}

/**
 * Past forms that differ from their base form, mapped back to the base.
 * ("cut" and "put" are excluded because "did cut" is correct.)
 */
export const DISTINCT_PAST_FORMS: ReadonlyMap<string, string> = new Map(
  BASE_VERBS.map((verb) => [pastTense(verb), verb] as const).filter(
    ([past, verb]) => past !== verb
  )
);

/**
 * True when a word starting with a vowel letter is pronounced with a
 * consonant sound ("a university", "a one-way ticket").
 */
export function startsWithConsonantSound(word: string): boolean {
  const lower = word.toLowerCase();
  return CONSONANT_SOUND_PREFIXES.some((prefix) => lower.startsWith(prefix));
}

/**
 * True when a word starting with a consonant letter is pronounced with a
 * vowel sound ("an hour", "an honest answer").
 */
export function startsWithVowelSound(word: string): boolean {
  const lower = word.toLowerCase();
  return VOWEL_SOUND_PREFIXES.some((prefix) => lower.startsWith(prefix));
}
