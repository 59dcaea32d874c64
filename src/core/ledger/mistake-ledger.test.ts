/**
 * MistakeLedger Unit Tests
 *
 * These tests verify:
 * - Append-only recording and sequence validation
 * - Proficiency thresholds and order independence
 * - Summary statistics
 * - Snapshot/restore
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { MistakeLedger, type NewMistakeRecord } from './mistake-ledger';
import { computeProficiency, DEFAULT_PROFICIENCY } from './proficiency';
import { ValidationError } from '../errors';
import type { MistakeCategory } from '../models';

const CONVERSATION = 'conv_test';

function mistake(
  turnSequence: number,
  category: MistakeCategory = 'tense',
  overrides: Partial<NewMistakeRecord> = {}
): NewMistakeRecord {
  return {
    category,
    original: 'am go',
    corrected: 'went',
    explanation: 'Use the simple past.',
    turnSequence,
    source: 'classifier',
    recordedAt: new Date('2024-03-01T09:00:00Z'),
    ...overrides,
  };
}

describe('MistakeLedger', () => {
  let ledger: MistakeLedger;

  beforeEach(() => {
    ledger = new MistakeLedger();
  });

  describe('record', () => {
    it('appends records in order and allows several per turn', () => {
      ledger.record(CONVERSATION, mistake(1, 'tense'));
      ledger.record(CONVERSATION, mistake(1, 'article'));
      ledger.record(CONVERSATION, mistake(3, 'vocabulary'));

      expect(ledger.records(CONVERSATION).map((r) => r.category)).toEqual([
        'tense',
        'article',
        'vocabulary',
      ]);
    });

    it('returns a frozen record with a timestamp', () => {
      const stored = ledger.record(CONVERSATION, mistake(1, 'tense', { recordedAt: undefined }));

      expect(Object.isFrozen(stored)).toBe(true);
      expect(stored.recordedAt).toBeInstanceOf(Date);
    });

    it('rejects a sequence older than one already recorded', () => {
      ledger.record(CONVERSATION, mistake(5));

      expect(() => ledger.record(CONVERSATION, mistake(4))).toThrow(ValidationError);
      expect(ledger.records(CONVERSATION)).toHaveLength(1);
    });

    it('rejects a sequence older than the last observed turn', () => {
      ledger.observeTurn(CONVERSATION, 3);

      expect(() => ledger.record(CONVERSATION, mistake(2))).toThrow(ValidationError);
      expect(() => ledger.record(CONVERSATION, mistake(3))).not.toThrow();
    });

    it('rejects non-positive or fractional sequences', () => {
      expect(() => ledger.record(CONVERSATION, mistake(0))).toThrow(ValidationError);
      expect(() => ledger.record(CONVERSATION, mistake(1.5))).toThrow(ValidationError);
    });

    it('tags validation errors with the ledger stage and conversation', () => {
      ledger.record(CONVERSATION, mistake(2));

      try {
        ledger.record(CONVERSATION, mistake(1));
        expect.unreachable('record should have thrown');
      } catch (error) {
        expect(error).toBeInstanceOf(ValidationError);
        if (error instanceof ValidationError) {
          expect(error.stage).toBe('ledger');
          expect(error.conversationId).toBe(CONVERSATION);
          expect(error.retryable).toBe(false);
        }
      }
    });

    it('keeps conversations isolated', () => {
      ledger.record('conv_a', mistake(4));

      expect(() => ledger.record('conv_b', mistake(1))).not.toThrow();
      expect(ledger.records('conv_a')).toHaveLength(1);
      expect(ledger.records('conv_b')).toHaveLength(1);
    });
  });

  describe('observeTurn', () => {
    it('requires strictly increasing sequences', () => {
      ledger.observeTurn(CONVERSATION, 1);
      ledger.observeTurn(CONVERSATION, 3);

      expect(() => ledger.observeTurn(CONVERSATION, 3)).toThrow(ValidationError);
      expect(ledger.proficiency(CONVERSATION).turnsObserved).toBe(2);
    });
  });

  describe('recordTurn', () => {
    it('writes the records and observes the turn', () => {
      const stored = ledger.recordTurn(CONVERSATION, 1, [mistake(1, 'tense'), mistake(1, 'article')]);

      expect(stored.map((r) => r.category)).toEqual(['tense', 'article']);
      expect(ledger.proficiency(CONVERSATION).turnsObserved).toBe(1);
      expect(ledger.proficiency(CONVERSATION).mistakeCount).toBe(2);
    });

    it('writes nothing when the turn was already observed', () => {
      ledger.restore({ conversationId: CONVERSATION, turnsObserved: 1, lastObservedTurn: 3, records: [] });

      expect(() => ledger.recordTurn(CONVERSATION, 3, [mistake(3)])).toThrow(
        'Turn 3 must come after the last observed turn 3'
      );
      expect(ledger.records(CONVERSATION)).toEqual([]);
      expect(ledger.proficiency(CONVERSATION).turnsObserved).toBe(1);
    });

    it('writes nothing when one record is invalid', () => {
      expect(() =>
        ledger.recordTurn(CONVERSATION, 1, [mistake(1, 'tense'), mistake(1, 'tense', { turnSequence: 2 })])
      ).toThrow(ValidationError);
      expect(ledger.has(CONVERSATION)).toBe(false);
    });

    it('reports whether a turn can still be observed', () => {
      ledger.observeTurn(CONVERSATION, 3);

      expect(ledger.canObserve(CONVERSATION, 3)).toBe(false);
      expect(ledger.canObserve(CONVERSATION, 5)).toBe(true);
      expect(ledger.canObserve('conv_new', 1)).toBe(true);
    });
  });

  describe('proficiency', () => {
    it('returns the default estimate for unknown conversations', () => {
      const estimate = ledger.proficiency('conv_unknown');

      expect(estimate).toEqual(DEFAULT_PROFICIENCY);
      expect(estimate.level).toBe('beginner');
      expect(estimate.errorRates.tense).toBe(0);
      expect(estimate.mistakeCount).toBe(0);
    });

    it('stays at beginner for fewer than three observed turns', () => {
      ledger.observeTurn(CONVERSATION, 1);
      ledger.observeTurn(CONVERSATION, 3);

      expect(ledger.proficiency(CONVERSATION).level).toBe('beginner');
    });

    it('reaches advanced after five clean turns', () => {
      for (const sequence of [1, 3, 5, 7, 9]) {
        ledger.observeTurn(CONVERSATION, sequence);
      }

      const estimate = ledger.proficiency(CONVERSATION);
      expect(estimate.level).toBe('advanced');
      expect(estimate.overallErrorRate).toBe(0);
      expect(estimate.turnsObserved).toBe(5);
    });

    it('maps overall error rates onto levels', () => {
      // 4 turns, 1 mistake: 0.25 -> intermediate
      ledger.record(CONVERSATION, mistake(1));
      for (const sequence of [1, 3, 5, 7]) {
        ledger.observeTurn(CONVERSATION, sequence);
      }
      expect(ledger.proficiency(CONVERSATION).level).toBe('intermediate');

      // 4 turns, 2 mistakes: 0.5 -> beginner
      ledger.record(CONVERSATION, mistake(7, 'article'));
      const estimate = ledger.proficiency(CONVERSATION);
      expect(estimate.level).toBe('beginner');
      expect(estimate.overallErrorRate).toBe(0.5);
      expect(estimate.errorRates.tense).toBe(0.25);
      expect(estimate.errorRates.article).toBe(0.25);
      expect(estimate.mistakeCount).toBe(2);
    });
  });

  describe('computeProficiency', () => {
    it('does not depend on record order', () => {
      const categories: MistakeCategory[] = ['tense', 'article', 'tense', 'other'];
      const forward = computeProficiency(categories.map((category) => ({ category })), 10);
      const reversed = computeProficiency(
        [...categories].reverse().map((category) => ({ category })),
        10
      );

      expect(forward).toEqual(reversed);
      expect(forward.errorRates.tense).toBe(0.2);
      expect(forward.overallErrorRate).toBe(0.4);
      expect(forward.level).toBe('intermediate');
    });

    it('divides by one when no turn has been observed', () => {
      const estimate = computeProficiency([{ category: 'vocabulary' }], 0);

      expect(estimate.overallErrorRate).toBe(1);
      expect(estimate.level).toBe('beginner');
    });
  });

  describe('summary', () => {
    it('reports perfect accuracy for an empty conversation', () => {
      expect(ledger.summary(CONVERSATION)).toEqual({
        totalTurns: 0,
        correctionsMade: 0,
        turnsWithMistakes: 0,
        accuracyRate: 100,
        commonMistakes: [],
        recentMistakes: [],
        durationMinutes: 0,
      });
    });

    it('computes accuracy and ranks common categories', () => {
      ledger.record(CONVERSATION, mistake(1, 'article'));
      ledger.record(CONVERSATION, mistake(1, 'tense'));
      ledger.record(CONVERSATION, mistake(3, 'tense'));
      ledger.record(CONVERSATION, mistake(5, 'preposition'));
      for (const sequence of [1, 3, 5, 7, 9, 11]) {
        ledger.observeTurn(CONVERSATION, sequence);
      }

      const summary = ledger.summary(CONVERSATION);

      expect(summary.totalTurns).toBe(6);
      expect(summary.correctionsMade).toBe(4);
      expect(summary.turnsWithMistakes).toBe(3);
      expect(summary.accuracyRate).toBe(50);
      expect(summary.commonMistakes).toEqual([
        { category: 'tense', count: 2 },
        { category: 'article', count: 1 },
        { category: 'preposition', count: 1 },
      ]);
    });

    it('measures duration from the first to the last observed turn', () => {
      ledger.observeTurn(CONVERSATION, 1, new Date('2024-03-01T09:00:00Z'));
      ledger.observeTurn(CONVERSATION, 3, new Date('2024-03-01T09:04:30Z'));
      ledger.recordTurn(CONVERSATION, 5, [], new Date('2024-03-01T09:12:00Z'));

      expect(ledger.summary(CONVERSATION).durationMinutes).toBe(12);
    });

    it('keeps the observation times through a snapshot', () => {
      ledger.observeTurn(CONVERSATION, 1, new Date('2024-03-01T09:00:00Z'));
      ledger.observeTurn(CONVERSATION, 3, new Date('2024-03-01T09:01:30Z'));

      const restored = new MistakeLedger();
      restored.restore(JSON.parse(JSON.stringify(ledger.snapshot(CONVERSATION))));

      expect(restored.summary(CONVERSATION).durationMinutes).toBe(1.5);
    });

    it('rounds accuracy to two decimals and keeps the last five records', () => {
      for (const sequence of [1, 2, 3, 4, 5, 6]) {
        ledger.record(CONVERSATION, mistake(sequence, 'other', { original: `fragment ${sequence}` }));
      }
      for (let sequence = 1; sequence <= 9; sequence++) {
        ledger.observeTurn(CONVERSATION, sequence);
      }

      const summary = ledger.summary(CONVERSATION);

      // (9 - 6) / 9 = 33.333...%
      expect(summary.accuracyRate).toBe(33.33);
      expect(summary.recentMistakes.map((r) => r.original)).toEqual([
        'fragment 2',
        'fragment 3',
        'fragment 4',
        'fragment 5',
        'fragment 6',
      ]);
    });
  });

  describe('snapshot and restore', () => {
    it('round-trips through JSON', () => {
      ledger.record(CONVERSATION, mistake(1, 'tense'));
      ledger.record(CONVERSATION, mistake(3, 'article'));
      ledger.observeTurn(CONVERSATION, 1);
      ledger.observeTurn(CONVERSATION, 3);

      const json = JSON.parse(JSON.stringify(ledger.snapshot(CONVERSATION)));
      const restored = new MistakeLedger();
      restored.restore(json);

      expect(restored.snapshot(CONVERSATION)).toEqual(ledger.snapshot(CONVERSATION));
      expect(restored.proficiency(CONVERSATION)).toEqual(ledger.proficiency(CONVERSATION));
      expect(restored.records(CONVERSATION)[0].recordedAt).toBeInstanceOf(Date);
    });

    it('sorts records by turn sequence and enforces order afterwards', () => {
      const later = { ...mistake(4, 'article'), recordedAt: new Date('2024-03-01T09:05:00Z') };
      const earlier = mistake(2, 'tense');

      ledger.restore({
        conversationId: CONVERSATION,
        turnsObserved: 2,
        lastObservedTurn: 4,
        records: [later, earlier],
      });

      expect(ledger.records(CONVERSATION).map((r) => r.turnSequence)).toEqual([2, 4]);
      expect(() => ledger.record(CONVERSATION, mistake(3))).toThrow(ValidationError);
    });

    it('rejects malformed snapshots without touching existing state', () => {
      ledger.record(CONVERSATION, mistake(1));

      expect(() =>
        ledger.restore({ conversationId: CONVERSATION, turnsObserved: -1, records: [] })
      ).toThrow(ValidationError);
      expect(() =>
        ledger.restore({
          conversationId: CONVERSATION,
          turnsObserved: 1,
          lastObservedTurn: 1,
          records: [{ ...mistake(1), category: 'spelling' }],
        })
      ).toThrow(ValidationError);
      expect(ledger.records(CONVERSATION)).toHaveLength(1);
    });
  });

  describe('reset', () => {
    it('clears one conversation only', () => {
      ledger.record('conv_a', mistake(1));
      ledger.record('conv_b', mistake(1));

      ledger.reset('conv_a');

      expect(ledger.has('conv_a')).toBe(false);
      expect(ledger.proficiency('conv_a')).toEqual(DEFAULT_PROFICIENCY);
      expect(ledger.records('conv_b')).toHaveLength(1);
    });
  });
});
