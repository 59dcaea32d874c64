/**
 * Adaptive Prompt Composer
 *
 * Assembles the prompt for one coaching turn from four sections, in order:
 *
 * 1. The coach persona preamble (always present)
 * 2. The instruction block for the learner's current proficiency level
 * 3. Recent turns from conversation memory, under "Previous conversation:"
 * 4. The new utterance and the "Coach:" cue
 *
 * The result never exceeds `maxChars`. When it would, the oldest history
 * turns are dropped first, then the level block. If the preamble and the
 * utterance alone do not fit, composing fails with PromptTooLargeError.
 *
 * The orchestrator records the user's turn before composing, so a trailing
 * user turn with the same text as the new utterance is left out of the
 * history to avoid repeating it.
 */

import { PromptTooLargeError, ValidationError } from '../errors';
import type { ConversationId, Turn } from '../models';
import type { MistakeLedger } from '../ledger';
import type { ConversationMemoryStore } from '../memory';
import {
  buildCoachPreamble,
  buildLevelInstructions,
  buildUtteranceSection,
  formatTranscriptLine,
  HISTORY_HEADING,
} from '../../llm/prompts';

export interface PromptComposerOptions {
  /** Maximum prompt length in characters */
  maxChars?: number;
  /** Number of recent turns offered as history before trimming */
  contextTurns?: number;
}

export const DEFAULT_MAX_PROMPT_CHARS = 6000;
export const DEFAULT_CONTEXT_TURNS = 10;

const SECTION_SEPARATOR = '\n\n';

export class AdaptivePromptComposer {
  readonly maxChars: number;
  readonly contextTurns: number;
  private readonly preamble = buildCoachPreamble();

  constructor(
    private readonly memory: ConversationMemoryStore,
    private readonly ledger: MistakeLedger,
    options: PromptComposerOptions = {}
  ) {
    this.maxChars = options.maxChars ?? DEFAULT_MAX_PROMPT_CHARS;
    this.contextTurns = options.contextTurns ?? DEFAULT_CONTEXT_TURNS;
  }

  /**
   * Builds the prompt for a new utterance. Deterministic for a given memory
   * and ledger state.
   *
   * @throws ValidationError when the utterance is empty
   * @throws PromptTooLargeError when the preamble and utterance exceed the budget
   */
  compose(conversationId: ConversationId, newUtterance: string): string {
    const utterance = newUtterance.trim();
    if (utterance.length === 0) {
      throw new ValidationError('Utterance must not be empty', { stage: 'prompt', conversationId });
    }

    const closing = buildUtteranceSection(utterance);
    const minimum = [this.preamble, closing].join(SECTION_SEPARATOR);
    if (minimum.length > this.maxChars) {
      throw new PromptTooLargeError(this.maxChars, minimum.length, {
        stage: 'prompt',
        conversationId,
      });
    }

    const levelBlock = buildLevelInstructions(this.ledger.proficiency(conversationId).level);
    const history = this.historyLines(conversationId, utterance);

    // Drop the oldest history line until the prompt fits
    for (let start = 0; start <= history.length; start++) {
      const prompt = this.assemble(levelBlock, history.slice(start), closing);
      if (prompt.length <= this.maxChars) return prompt;
    }

    // No history fits alongside the level block; the minimum always fits
    return minimum;
  }

  private historyLines(conversationId: ConversationId, utterance: string): string[] {
    if (this.contextTurns <= 0) return [];

    let turns: Turn[] = this.memory.recentContext(conversationId, this.contextTurns + 1);

    const last = turns.at(-1);
    if (last && last.speaker === 'user' && last.text.trim() === utterance) {
      turns = turns.slice(0, -1);
    }

    return turns
      .slice(-this.contextTurns)
      .map((turn) => formatTranscriptLine(turn.speaker, turn.text));
  }

  private assemble(levelBlock: string, history: string[], closing: string): string {
    const sections = [this.preamble, levelBlock];
    if (history.length > 0) {
      sections.push([HISTORY_HEADING, ...history].join('\n'));
    }
    sections.push(closing);
    return sections.join(SECTION_SEPARATOR);
  }
}
