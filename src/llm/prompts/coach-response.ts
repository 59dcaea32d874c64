/**
 * Coach Response Parser
 *
 * Splits the model's raw text into the sections requested by the persona
 * prompt. Models decorate labels freely, so all of these are accepted:
 *
 * ```
 * Correction: I went to the market yesterday.
 * ✅ **Corrected:** I went to the market yesterday.
 * 💡 **Tip:** Use "went" for finished actions.
 * **Reply**: Nice! What did you buy?
 * ```
 *
 * Parsing never throws. When no usable labelled section is found the whole
 * text becomes the reply and `parsed` is false.
 */

import { MISTAKE_CATEGORIES, type MistakeCategory } from '../../core/models';

/**
 * A mistake the model listed in a `Mistake:` line.
 */
export interface ParsedMistake {
  category: MistakeCategory;
  original: string;
  corrected: string;
  explanation: string;
}

export interface CoachResponse {
  /** Corrected version of the learner's message, '' when none */
  correction: string;
  /** Explanation of the correction, '' when none */
  explanation: string;
  reply: string;
  mistakes: ParsedMistake[];
  /** False when the fallback applied */
  parsed: boolean;
}

type SectionLabel = 'correction' | 'explanation' | 'reply' | 'mistake';

const LABELS: Record<string, SectionLabel> = {
  correction: 'correction',
  corrected: 'correction',
  explanation: 'explanation',
  tip: 'explanation',
  reply: 'reply',
  mistake: 'mistake',
};

// Any emoji, bullet or markdown prefix, the label, an optional bold marker and a colon
const LABEL_LINE =
  /^[^\p{L}\p{N}]*(correction|corrected|explanation|tip|reply|mistake)[*_\s]*:[*_\s]*(.*)$/iu;

const EMPTY_VALUES = new Set(['none', 'n/a', 'na', 'no mistakes', 'no mistake', 'nothing', '-']);

const CATEGORY_ALIASES: Record<string, MistakeCategory> = {
  agreement: 'subject-verb-agreement',
  sva: 'subject-verb-agreement',
  'subject-verb': 'subject-verb-agreement',
  'verb-agreement': 'subject-verb-agreement',
  'word-choice': 'vocabulary',
  vocab: 'vocabulary',
  'verb-tense': 'tense',
  grammar: 'other',
};

/**
 * Maps a free-form category name onto a known category, 'other' if unknown.
 */
export function normalizeCategory(raw: string): MistakeCategory {
  const key = raw.trim().toLowerCase().replace(/[\s_]+/g, '-');
  const singular = key.endsWith('s') ? key.slice(0, -1) : key;

  for (const candidate of [key, singular]) {
    const known = MISTAKE_CATEGORIES.find((category) => category === candidate);
    if (known) return known;
    const alias = CATEGORY_ALIASES[candidate];
    if (alias) return alias;
  }
  return 'other';
}

function cleanValue(value: string): string {
  const stripped = value
    .trim()
    .replace(/^(\*\*|__)|(\*\*|__)$/g, '')
    .trim();
  const bare = stripped.toLowerCase().replace(/[.!]+$/, '').trim();
  return EMPTY_VALUES.has(bare) ? '' : stripped;
}

/** Joins continuation lines of a single-line section with spaces. */
function joinInline(lines: string[]): string {
  return lines
    .map((line) => line.trim())
    .filter(Boolean)
    .join(' ');
}

function parseMistakeLine(value: string): ParsedMistake | null {
  const [category = '', original = '', corrected = '', ...why] = value
    .split('|')
    .map((part) => part.trim());
  const fragment = cleanValue(original);
  if (!category || !fragment) return null;

  return {
    category: normalizeCategory(category),
    original: fragment,
    corrected: cleanValue(corrected),
    explanation: why.join(' | ').trim(),
  };
}

function fallback(raw: string): CoachResponse {
  return { correction: '', explanation: '', reply: raw.trim(), mistakes: [], parsed: false };
}

/**
 * Parses a raw model response into its labelled sections.
 */
export function parseCoachResponse(raw: unknown): CoachResponse {
  if (typeof raw !== 'string') {
    return fallback('');
  }

  const sections: Record<Exclude<SectionLabel, 'mistake'>, string[]> = {
    correction: [],
    explanation: [],
    reply: [],
  };
  const unlabelled: string[] = [];
  const mistakes: ParsedMistake[] = [];
  let current: Exclude<SectionLabel, 'mistake'> | null = null;
  let sawLabel = false;

  for (const line of raw.split(/\r?\n/)) {
    const match = LABEL_LINE.exec(line);
    const label = match ? LABELS[match[1].toLowerCase()] : undefined;

    if (match && label) {
      sawLabel = true;
      if (label === 'mistake') {
        const mistake = parseMistakeLine(match[2]);
        if (mistake) mistakes.push(mistake);
        current = null;
      } else {
        current = label;
        sections[label].push(match[2]);
      }
      continue;
    }

    if (current) {
      sections[current].push(line);
    } else {
      unlabelled.push(line);
    }
  }

  const reply = sections.reply.join('\n').trim() || unlabelled.join('\n').trim();

  if (!sawLabel || reply.length === 0) {
    return fallback(raw);
  }

  return {
    correction: cleanValue(joinInline(sections.correction)),
    explanation: cleanValue(joinInline(sections.explanation)),
    reply,
    mistakes,
    parsed: true,
  };
}
