/**
 * Coach Persona Prompt Builder
 *
 * Builds the fixed parts of the coaching prompt: the persona preamble with
 * the structured response format, and the instruction block that adapts the
 * coaching style to the learner's estimated level.
 *
 * The prompt composer in `core/prompt` assembles these with the conversation
 * history under a character budget.
 *
 * Key design decisions:
 *
 * 1. **Labelled sections**: The model is asked to answer with `Correction:`,
 *    `Explanation:` and `Reply:` lines so the response parser can split them.
 *
 * 2. **Optional mistake lines**: `Mistake: <category> | <original> | <corrected> | <why>`
 *    lets the model bucket its own corrections into the ledger's categories.
 *
 * 3. **Level block**: Only tunes the tone. The composer drops it once all
 *    history has been trimmed and the prompt still does not fit.
 */

import { MISTAKE_CATEGORIES, type ProficiencyLevel, type Speaker } from '../../core/models';

/** Label the model's turns carry in the transcript */
export const COACH_LABEL = 'Coach';

/** Label the learner's turns carry in the transcript */
export const LEARNER_LABEL = 'User';

/** Heading above the recent turns */
export const HISTORY_HEADING = 'Previous conversation:';

/**
 * Builds the persona preamble, including the response format.
 */
export function buildCoachPreamble(): string {
  return `You are a friendly English speaking coach. You help learners improve their English fluency, grammar and confidence through natural conversation.

Your role:
1. Have a natural conversation with the learner
2. Correct grammar mistakes politely and clearly
3. Explain each correction in simple terms
4. Encourage the learner and ask follow-up questions

Response format:
Correction: <the learner's last message, corrected; write "none" if it had no mistakes>
Explanation: <one or two sentences on what was wrong; write "none" if nothing was>
Mistake: <category> | <original words> | <corrected words> | <short reason>
Reply: <your conversational response>

Write one Mistake line per mistake, or none at all. The category must be one of: ${MISTAKE_CATEGORIES.join(', ')}.

Guidelines:
- Be positive and encouraging
- Keep corrections brief and focused on the most important mistakes
- Always finish with a Reply that keeps the conversation going`;
}

const LEVEL_INSTRUCTIONS: Record<ProficiencyLevel, string> = {
  beginner: `The learner is a beginner.
- Use short sentences and simple, everyday words
- Correct only the most important mistake and explain it slowly, step by step
- Ask one easy question at a time`,
  intermediate: `The learner is at an intermediate level.
- Use natural everyday English with some new vocabulary
- Point out the main mistakes and the rule behind them, with a little nuance
- Ask open questions that invite longer answers`,
  advanced: `The learner is advanced.
- Speak naturally, using idioms and varied vocabulary
- Focus on subtle, idiomatic and stylistic improvements as well as grammar
- Challenge the learner with nuanced follow-up questions`,
};

/**
 * Instruction block tuning the coaching style to a proficiency level.
 */
export function buildLevelInstructions(level: ProficiencyLevel): string {
  return `Learner level:\n${LEVEL_INSTRUCTIONS[level]}`;
}

/**
 * Formats one transcript line.
 */
export function formatTranscriptLine(speaker: Speaker, text: string): string {
  return `${speaker === 'user' ? LEARNER_LABEL : COACH_LABEL}: ${text}`;
}

/**
 * The closing section: the new utterance and the cue for the model's answer.
 */
export function buildUtteranceSection(utterance: string): string {
  return `${formatTranscriptLine('user', utterance)}\n\n${COACH_LABEL}:`;
}
