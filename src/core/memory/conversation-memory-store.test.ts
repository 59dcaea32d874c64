/**
 * ConversationMemoryStore Unit Tests
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { ConversationMemoryStore } from './conversation-memory-store';
import { ValidationError } from '../errors';

const CONVERSATION = 'conv_memory';

describe('ConversationMemoryStore', () => {
  let store: ConversationMemoryStore;

  beforeEach(() => {
    store = new ConversationMemoryStore({ maxRetainedTurns: 4 });
  });

  describe('append', () => {
    it('assigns sequence numbers starting at 1', () => {
      const first = store.append(CONVERSATION, { speaker: 'user', text: 'Hello' });
      const second = store.append(CONVERSATION, { speaker: 'assistant', text: 'Hi there!' });

      expect(first.sequence).toBe(1);
      expect(second.sequence).toBe(2);
      expect(first.timestamp).toBeInstanceOf(Date);
      expect(Object.isFrozen(first)).toBe(true);
    });

    it('evicts the oldest turns and keeps numbering across evictions', () => {
      for (let i = 1; i <= 6; i++) {
        store.append(CONVERSATION, { speaker: i % 2 === 1 ? 'user' : 'assistant', text: `turn ${i}` });
      }

      const retained = store.recentContext(CONVERSATION, 10);
      expect(retained.map((t) => t.sequence)).toEqual([3, 4, 5, 6]);
      expect(store.size(CONVERSATION)).toBe(4);

      const next = store.append(CONVERSATION, { speaker: 'user', text: 'turn 7' });
      expect(next.sequence).toBe(7);
    });

    it('is idempotent for an explicit sequence already recorded', () => {
      const original = store.append(CONVERSATION, { speaker: 'user', text: 'Hello', sequence: 1 });
      const replay = store.append(CONVERSATION, { speaker: 'user', text: 'Hello', sequence: 1 });

      expect(replay).toBe(original);
      expect(store.size(CONVERSATION)).toBe(1);
    });

    it('rejects an explicit sequence that conflicts or skips ahead', () => {
      store.append(CONVERSATION, { speaker: 'user', text: 'Hello' });

      expect(() =>
        store.append(CONVERSATION, { speaker: 'user', text: 'Different', sequence: 1 })
      ).toThrow(ValidationError);
      expect(() =>
        store.append(CONVERSATION, { speaker: 'assistant', text: 'Skip', sequence: 5 })
      ).toThrow(ValidationError);
      expect(store.append(CONVERSATION, { speaker: 'assistant', text: 'Hi', sequence: 2 }).sequence).toBe(2);
    });

    it('rejects an empty conversation id', () => {
      expect(() => store.append('  ', { speaker: 'user', text: 'Hello' })).toThrow(ValidationError);
    });

    it('keeps conversations independent', () => {
      store.append('conv_a', { speaker: 'user', text: 'A1' });
      store.append('conv_a', { speaker: 'assistant', text: 'A2' });
      const b = store.append('conv_b', { speaker: 'user', text: 'B1' });

      expect(b.sequence).toBe(1);
      expect(store.conversationIds().sort()).toEqual(['conv_a', 'conv_b']);
    });
  });

  describe('recentContext', () => {
    beforeEach(() => {
      store.append(CONVERSATION, { speaker: 'user', text: 'one' });
      store.append(CONVERSATION, { speaker: 'assistant', text: 'two' });
      store.append(CONVERSATION, { speaker: 'user', text: 'three' });
    });

    it('returns the most recent turns in chronological order', () => {
      expect(store.recentContext(CONVERSATION, 2).map((t) => t.text)).toEqual(['two', 'three']);
    });

    it('returns an empty list for unknown ids and non-positive limits', () => {
      expect(store.recentContext('conv_unknown', 5)).toEqual([]);
      expect(store.recentContext(CONVERSATION, 0)).toEqual([]);
      expect(store.recentContext(CONVERSATION, -3)).toEqual([]);
    });

    it('rounds fractional limits down and returns nothing for limits below one', () => {
      expect(store.recentContext(CONVERSATION, 0.5)).toEqual([]);
      expect(store.recentContext(CONVERSATION, 2.7).map((t) => t.text)).toEqual(['two', 'three']);
    });

    it('returns an empty list for limits that are not finite numbers', () => {
      expect(store.recentContext(CONVERSATION, Number.NaN)).toEqual([]);
      expect(store.recentContext(CONVERSATION, Number.POSITIVE_INFINITY)).toEqual([]);
    });

    it('returns a copy that callers cannot use to mutate history', () => {
      const context = store.recentContext(CONVERSATION, 3);
      context.pop();

      expect(store.size(CONVERSATION)).toBe(3);
    });
  });

  describe('nextSequence', () => {
    it('starts at 1 and follows appended turns', () => {
      expect(store.nextSequence(CONVERSATION)).toBe(1);

      store.append(CONVERSATION, { speaker: 'user', text: 'one' });
      store.append(CONVERSATION, { speaker: 'assistant', text: 'two' });

      expect(store.nextSequence(CONVERSATION)).toBe(3);
    });
  });

  describe('snapshot and restore', () => {
    it('round-trips through JSON', () => {
      store.append(CONVERSATION, {
        speaker: 'user',
        text: 'I am go market yesterday',
        timestamp: new Date('2024-03-01T09:00:00Z'),
      });
      store.append(CONVERSATION, {
        speaker: 'assistant',
        text: 'You went to the market!',
        timestamp: new Date('2024-03-01T09:00:02Z'),
      });

      const json = JSON.parse(JSON.stringify(store.snapshot(CONVERSATION)));
      const restored = new ConversationMemoryStore({ maxRetainedTurns: 4 });
      restored.restore(json);

      expect(restored.snapshot(CONVERSATION)).toEqual(store.snapshot(CONVERSATION));
      expect(restored.append(CONVERSATION, { speaker: 'user', text: 'Next' }).sequence).toBe(3);
    });

    it('re-applies the retention bound of the restoring store', () => {
      const turns = [3, 4, 5, 6].map((sequence) => ({
        speaker: 'user' as const,
        text: `turn ${sequence}`,
        timestamp: '2024-03-01T09:00:00.000Z',
        sequence,
      }));
      const small = new ConversationMemoryStore({ maxRetainedTurns: 2 });

      small.restore({ conversationId: CONVERSATION, nextSequence: 7, turns });

      expect(small.recentContext(CONVERSATION, 10).map((t) => t.sequence)).toEqual([5, 6]);
    });

    it('rejects snapshots with gaps in the sequence', () => {
      const timestamp = '2024-03-01T09:00:00.000Z';

      expect(() =>
        store.restore({
          conversationId: CONVERSATION,
          nextSequence: 4,
          turns: [
            { speaker: 'user', text: 'one', timestamp, sequence: 1 },
            { speaker: 'assistant', text: 'three', timestamp, sequence: 3 },
          ],
        })
      ).toThrow(ValidationError);
      expect(store.has(CONVERSATION)).toBe(false);
    });
  });

  it('reset clears a single conversation', () => {
    store.append('conv_a', { speaker: 'user', text: 'A' });
    store.append('conv_b', { speaker: 'user', text: 'B' });

    store.reset('conv_a');

    expect(store.has('conv_a')).toBe(false);
    expect(store.size('conv_b')).toBe(1);
    expect(store.append('conv_a', { speaker: 'user', text: 'again' }).sequence).toBe(1);
  });

  it('rejects a non-positive retention bound', () => {
    expect(() => new ConversationMemoryStore({ maxRetainedTurns: 0 })).toThrow(ValidationError);
  });
});
