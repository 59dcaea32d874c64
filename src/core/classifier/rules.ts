/**
 * Utterance Classifier Rule Table
 *
 * An explicit, ordered table of grammar heuristics. Each rule is tagged with
 * the mistake category it detects and carries:
 *
 * - a global, case-insensitive pattern
 * - a `correct` function that builds the suggested replacement for a match,
 *   or returns null to reject the match (e.g. "I was" is fine, "you was" is not)
 * - a fixed explanation shown to the learner
 *
 * Table order matters only for equally long matches at the same position:
 * the earlier rule wins.
 */

import type { MistakeCategory } from '../models';
import {
  BASE_VERBS,
  BE_COMPATIBLE_VERBS,
  CONFUSED_PHRASES,
  DISTINCT_PAST_FORMS,
  PREPOSITIONS,
  pastTense,
  presentParticiple,
  startsWithConsonantSound,
  startsWithVowelSound,
  thirdPerson,
} from './lexicon';

// ============================================================================
// Types
// ============================================================================

/**
 * Facts about the whole utterance that rules may consult.
 */
export interface RuleContext {
  utterance: string;
  /** The utterance mentions a finished time ("yesterday", "last week", "ago") */
  hasPastMarker: boolean;
}

/**
 * Outcome of applying a rule to one match.
 */
export interface RuleVerdict {
  correction: string;
  explanation: string;
}

export interface ClassifierRule {
  id: string;
  category: MistakeCategory;
  pattern: RegExp;
  correct: (match: RegExpMatchArray, context: RuleContext) => RuleVerdict | null;
}

// ============================================================================
// Helpers
// ============================================================================

const PAST_MARKER = /\b(yesterday|ago|last\s+(night|week|weekend|month|year|summer|winter|time))\b/i;

/** Words after which a bare verb is grammatical ("does he go", "can she have") */
const AUXILIARIES = new Set([
  'do', 'does', 'did', "don't", "doesn't", "didn't", 'can', 'could', 'will',
  'would', 'shall', 'should', 'may', 'might', 'must', 'let', 'to', 'make',
  'help', 'watch', 'saw', 'see', 'hear', 'heard',
]);

function escapeRegExp(word: string): string {
  return word.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/** Alternation of words, longest first so that "goes" wins over "go". */
function alternation(words: Iterable<string>): string {
  return [...new Set(words)]
    .sort((a, b) => b.length - a.length || a.localeCompare(b))
    .map(escapeRegExp)
    .join('|');
}

/** Copies the capitalisation of the source's first letter onto the replacement. */
export function matchCase(source: string, replacement: string): string {
  if (replacement.length === 0) return replacement;
  const first = source.charAt(0);
  if (first !== first.toUpperCase() || first === first.toLowerCase()) {
    return replacement;
  }
  return replacement.charAt(0).toUpperCase() + replacement.slice(1);
}

function previousWord(utterance: string, index: number): string {
  const before = /(\S+)\s*$/.exec(utterance.slice(0, index));
  return before ? before[1].toLowerCase().replace(/[^a-z']/g, '') : '';
}

function followsAuxiliary(match: RegExpMatchArray, context: RuleContext): boolean {
  return AUXILIARIES.has(previousWord(context.utterance, match.index ?? 0));
}

/** The pronoun closes a compound subject: "he and she have" */
function endsCompoundSubject(match: RegExpMatchArray, context: RuleContext): boolean {
  const word = previousWord(context.utterance, match.index ?? 0);
  return word === 'and' || word === 'or';
}

/** Letter-by-letter words ("MBA", "USB") whose sound the spelling does not show */
const INITIALISM = /^[A-Z][A-Z0-9]+$/;

export function buildRuleContext(utterance: string): RuleContext {
  return { utterance, hasPastMarker: PAST_MARKER.test(utterance) };
}

const VERBS = alternation(BASE_VERBS);
const PAST_FORMS = alternation(DISTINCT_PAST_FORMS.keys());

const BE_CORRECTION: Record<string, Record<string, string>> = {
  he: { do: 'does', "don't": "doesn't", have: 'has', are: 'is', am: 'is', were: 'was' },
  i: { is: 'am', are: 'am', has: 'have', does: 'do', "doesn't": "don't" },
  plural: { is: 'are', am: 'are', has: 'have', does: 'do', "doesn't": "don't", was: 'were' },
};

// ============================================================================
// Rule Table
// ============================================================================

const TENSE_RULES: ClassifierRule[] = [
  {
    // "I am go market yesterday" -> "went"; "she is play now" -> "is playing"
    id: 'be-with-base-verb',
    category: 'tense',
    pattern: new RegExp(String.raw`\b(am|is|are|was|were)\s+(${VERBS})\b`, 'gi'),
    correct: (match, context) => {
      const [, be, verb] = match;
      const base = verb.toLowerCase();
      if (BE_COMPATIBLE_VERBS.has(base)) return null;
      if (context.hasPastMarker) {
        return {
          correction: pastTense(base),
          explanation:
            'This action is finished, so use the simple past tense ' +
            `("${pastTense(base)}") instead of "${be.toLowerCase()}" + the base verb.`,
        };
      }
      return {
        correction: `${be} ${presentParticiple(base)}`,
        explanation: `After "${be.toLowerCase()}", use the -ing form for an action in progress.`,
      };
    },
  },
  {
    // "I didn't went" -> "didn't go"
    id: 'did-with-past-form',
    category: 'tense',
    pattern: new RegExp(String.raw`\b(did|didn't|didnt)\s+(${PAST_FORMS})\b`, 'gi'),
    correct: (match) => {
      const [, did, past] = match;
      const base = DISTINCT_PAST_FORMS.get(past.toLowerCase());
      if (!base) return null;
      const auxiliary = did.toLowerCase() === 'didnt' ? "didn't" : did;
      return {
        correction: `${auxiliary} ${base}`,
        explanation: `"${auxiliary.toLowerCase()}" already shows the past, so the main verb stays in its base form.`,
      };
    },
  },
  {
    // "Yesterday I go to school" -> "I went"
    id: 'base-verb-with-past-marker',
    category: 'tense',
    pattern: new RegExp(String.raw`\b(I|you|we|they|he|she)\s+(${VERBS})\b`, 'gi'),
    correct: (match, context) => {
      if (!context.hasPastMarker || followsAuxiliary(match, context)) return null;
      const [, subject, verb] = match;
      return {
        correction: `${subject} ${pastTense(verb.toLowerCase())}`,
        explanation: 'Time words like "yesterday" or "last week" need the simple past tense.',
      };
    },
  },
];

const AGREEMENT_RULES: ClassifierRule[] = [
  {
    // "he don't", "she have", "it are"
    id: 'third-person-auxiliary',
    category: 'subject-verb-agreement',
    pattern: /\b(he|she|it)\s+(don't|dont|do|have|are|am|were)\b/gi,
    correct: (match, context) => {
      if (followsAuxiliary(match, context) || endsCompoundSubject(match, context)) return null;
      const [, subject, verb] = match;
      const normalized = verb.toLowerCase() === 'dont' ? "don't" : verb.toLowerCase();
      const fixed = BE_CORRECTION.he[normalized];
      if (!fixed) return null;
      return {
        correction: `${subject} ${fixed}`,
        explanation: `With "he", "she" or "it", use "${fixed}" instead of "${normalized}".`,
      };
    },
  },
  {
    // "you was", "they is", "I has"
    id: 'non-third-person-verb',
    category: 'subject-verb-agreement',
    pattern: /\b(I|you|we|they)\s+(is|are|has|does|doesn't|was)\b/gi,
    correct: (match, context) => {
      if (followsAuxiliary(match, context)) return null;
      const [, subject, verb] = match;
      const table = subject.toLowerCase() === 'i' ? BE_CORRECTION.i : BE_CORRECTION.plural;
      const fixed = table[verb.toLowerCase()];
      if (!fixed) return null;
      return {
        correction: `${subject} ${fixed}`,
        explanation: `"${subject}" takes "${fixed}", not "${verb.toLowerCase()}".`,
      };
    },
  },
  {
    // "she go to work every day" -> "she goes"
    id: 'third-person-missing-s',
    category: 'subject-verb-agreement',
    pattern: new RegExp(String.raw`\b(he|she)\s+(${VERBS})\b`, 'gi'),
    correct: (match, context) => {
      if (
        context.hasPastMarker ||
        followsAuxiliary(match, context) ||
        endsCompoundSubject(match, context)
      ) {
        return null;
      }
      const [, subject, verb] = match;
      const fixed = thirdPerson(verb.toLowerCase());
      return {
        correction: `${subject} ${fixed}`,
        explanation: `In the present tense, "he" and "she" need the -s form of the verb ("${fixed}").`,
      };
    },
  },
];

const ARTICLE_RULES: ClassifierRule[] = [
  {
    id: 'a-before-vowel-sound',
    category: 'article',
    pattern: /\b(a)\s+([a-z][\w-]*)\b/gi,
    correct: (match) => {
      const [, article, word] = match;
      if (INITIALISM.test(word)) return null;
      const vowelSound =
        ('aeiou'.includes(word.charAt(0).toLowerCase()) && !startsWithConsonantSound(word)) ||
        startsWithVowelSound(word);
      if (!vowelSound) return null;
      return {
        correction: `${matchCase(article, 'an')} ${word}`,
        explanation: `Use "an" before a word that starts with a vowel sound ("an ${word}").`,
      };
    },
  },
  {
    id: 'an-before-consonant-sound',
    category: 'article',
    pattern: /\b(an)\s+([a-z][\w-]*)\b/gi,
    correct: (match) => {
      const [, article, word] = match;
      if (INITIALISM.test(word)) return null;
      const consonantSound =
        (!'aeiou'.includes(word.charAt(0).toLowerCase()) && !startsWithVowelSound(word)) ||
        startsWithConsonantSound(word);
      if (!consonantSound) return null;
      return {
        correction: `${matchCase(article, 'a')} ${word}`,
        explanation: `Use "a" before a word that starts with a consonant sound ("a ${word}").`,
      };
    },
  },
];

const PREPOSITION_RULES: ClassifierRule[] = PREPOSITIONS.map((entry, index) => ({
  id: `preposition-${entry.heads[0]}-${index}`,
  category: 'preposition' as const,
  pattern: new RegExp(
    String.raw`\b(${alternation(entry.heads)})\s+(${alternation(entry.wrong)})\b`,
    'gi'
  ),
  correct: (match: RegExpMatchArray): RuleVerdict => {
    const [, head] = match;
    return {
      correction: entry.right ? `${head} ${entry.right}` : head,
      explanation: entry.explanation,
    };
  },
}));

const VOCABULARY_RULES: ClassifierRule[] = CONFUSED_PHRASES.map((phrase) => ({
  id: `vocabulary-${phrase.wrong.replace(/\s+/g, '-')}`,
  category: 'vocabulary' as const,
  pattern: new RegExp(
    String.raw`\b${phrase.wrong.split(/\s+/).map(escapeRegExp).join(String.raw`\s+`)}\b`,
    'gi'
  ),
  correct: (match: RegExpMatchArray): RuleVerdict => ({
    correction: matchCase(match[0], phrase.right),
    explanation: phrase.explanation,
  }),
}));

/**
 * The complete ordered rule table.
 */
export const CLASSIFIER_RULES: readonly ClassifierRule[] = [
  ...TENSE_RULES,
  ...AGREEMENT_RULES,
  ...ARTICLE_RULES,
  ...PREPOSITION_RULES,
  ...VOCABULARY_RULES,
];
