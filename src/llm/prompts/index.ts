/**
 * LLM Prompts Module - Barrel Export
 *
 * Prompt builders and the response parser for coaching turns:
 *
 * 1. **Coach persona**: The fixed preamble with the labelled response format,
 *    and the instruction block for each proficiency level.
 *
 * 2. **Coach response**: Splits the model's raw text back into correction,
 *    explanation, reply and mistake lines.
 *
 * @example
 * ```typescript
 * import { buildCoachPreamble, parseCoachResponse } from '@/llm/prompts';
 *
 * const preamble = buildCoachPreamble();
 * const { correction, reply, parsed } = parseCoachResponse(raw);
 * ```
 */

// Coach persona and prompt fragments
export {
  buildCoachPreamble,
  buildLevelInstructions,
  buildUtteranceSection,
  formatTranscriptLine,
  COACH_LABEL,
  LEARNER_LABEL,
  HISTORY_HEADING,
} from './coach-persona';

// Response parsing
export {
  parseCoachResponse,
  normalizeCategory,
  type CoachResponse,
  type ParsedMistake,
} from './coach-response';
