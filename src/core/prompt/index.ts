/**
 * Adaptive Prompt Composer - Barrel Export
 */

export {
  AdaptivePromptComposer,
  DEFAULT_MAX_PROMPT_CHARS,
  DEFAULT_CONTEXT_TURNS,
} from './adaptive-prompt-composer';
export type { PromptComposerOptions } from './adaptive-prompt-composer';
