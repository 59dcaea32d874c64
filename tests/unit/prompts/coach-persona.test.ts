/**
 * Unit Tests: Coach Persona Prompt
 *
 * The preamble must ask for exactly the sections the response parser reads,
 * and the level block must differ per proficiency level.
 */

import { describe, it, expect } from 'vitest';
import {
  buildCoachPreamble,
  buildLevelInstructions,
  buildUtteranceSection,
  formatTranscriptLine,
  parseCoachResponse,
} from '../../../src/llm/prompts';
import { MISTAKE_CATEGORIES } from '../../../src/core/models';

describe('buildCoachPreamble', () => {
  const preamble = buildCoachPreamble();

  it('requests every labelled section', () => {
    expect(preamble).toContain('Correction: <');
    expect(preamble).toContain('Explanation: <');
    expect(preamble).toContain('Mistake: <category> | <original words> | <corrected words> | <short reason>');
    expect(preamble).toContain('Reply: <');
  });

  it('lists every mistake category', () => {
    expect(preamble).toContain(`The category must be one of: ${MISTAKE_CATEGORIES.join(', ')}.`);
  });

  it('is stable between calls', () => {
    expect(buildCoachPreamble()).toBe(preamble);
  });

  it('describes a format the parser understands', () => {
    const answer = 'Correction: none\nExplanation: none\nReply: Hello!';
    expect(parseCoachResponse(answer).parsed).toBe(true);
  });
});

describe('buildLevelInstructions', () => {
  it('starts with the level heading', () => {
    expect(buildLevelInstructions('beginner').startsWith('Learner level:\nThe learner is a beginner.')).toBe(true);
    expect(buildLevelInstructions('intermediate')).toContain('The learner is at an intermediate level.');
    expect(buildLevelInstructions('advanced')).toContain('The learner is advanced.');
  });

  it('gives each level its own instructions', () => {
    const blocks = new Set([
      buildLevelInstructions('beginner'),
      buildLevelInstructions('intermediate'),
      buildLevelInstructions('advanced'),
    ]);
    expect(blocks.size).toBe(3);
  });
});

describe('transcript formatting', () => {
  it('labels learner and coach turns', () => {
    expect(formatTranscriptLine('user', 'I like tea.')).toBe('User: I like tea.');
    expect(formatTranscriptLine('assistant', 'Me too!')).toBe('Coach: Me too!');
  });

  it('ends the utterance section with the coach cue', () => {
    expect(buildUtteranceSection('I like tea.')).toBe('User: I like tea.\n\nCoach:');
  });
});
