/**
 * Persistence Integration Tests
 *
 * Conversation state stored through ConversationSnapshotRepository in an
 * in-memory SQLite database, and rehydrated by a fresh CoachingService.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import Database from 'better-sqlite3';
import { BackendConnectionError } from '../../src/core/errors';
import {
  ConversationSnapshotRepository,
  ensureSchema,
  listTables,
  type DatabaseConnection,
} from '../../src/storage';
import {
  coachReply,
  createTestDatabase,
  createTestRuntime,
  type TestRuntime,
  type TestRuntimeOptions,
} from '../setup';

const MARKET = 'I am go market yesterday';
const MARKET_REPLY = coachReply({
  correction: 'I went to the market yesterday.',
  explanation: 'Use the past tense.',
  reply: 'Nice! What did you buy?',
});

describe('Conversation persistence', () => {
  let connection: DatabaseConnection;
  let repository: ConversationSnapshotRepository;

  // Runtimes given a repository open no database of their own
  function runtimeWith(options: TestRuntimeOptions = {}): TestRuntime {
    return createTestRuntime({ ...options, repository });
  }

  beforeEach(() => {
    connection = createTestDatabase();
    repository = new ConversationSnapshotRepository(connection.db);
  });

  afterEach(() => {
    connection.sqlite.close();
  });

  describe('schema', () => {
    it('creates the three conversation tables', () => {
      expect(listTables(connection.sqlite)).toEqual([
        'conversation_mistakes',
        'conversation_turns',
        'conversations',
      ]);
    });

    it('adds the observation time columns to an older conversations table', () => {
      const sqlite = new Database(':memory:');
      sqlite.exec(`CREATE TABLE conversations (
        id TEXT PRIMARY KEY NOT NULL,
        next_sequence INTEGER NOT NULL,
        turns_observed INTEGER NOT NULL DEFAULT 0,
        last_observed_turn INTEGER NOT NULL DEFAULT 0,
        created_at INTEGER NOT NULL,
        updated_at INTEGER NOT NULL
      )`);

      ensureSchema(sqlite);

      const rows: unknown[] = sqlite.prepare('PRAGMA table_info(conversations)').all();
      const columns = rows.flatMap((row) =>
        typeof row === 'object' && row !== null && 'name' in row ? [row.name] : []
      );
      expect(columns).toContain('first_observed_at');
      expect(columns).toContain('last_observed_at');
      sqlite.close();
    });

    it('can be applied again without error', () => {
      expect(() => ensureSchema(connection.sqlite)).not.toThrow();
      expect(listTables(connection.sqlite)).toHaveLength(3);
    });
  });

  describe('ConversationSnapshotRepository', () => {
    it('returns null for an unknown conversation', async () => {
      expect(await repository.load('conv_missing')).toBeNull();
    });

    it('stores and loads a snapshot', async () => {
      const at = new Date('2026-03-01T10:00:00.000Z');
      await repository.save({
        conversationId: 'conv_repo',
        memory: {
          conversationId: 'conv_repo',
          nextSequence: 3,
          turns: [
            { speaker: 'user', text: 'She go to school.', timestamp: at, sequence: 1 },
            { speaker: 'assistant', text: 'Which school?', timestamp: at, sequence: 2 },
          ],
        },
        ledger: {
          conversationId: 'conv_repo',
          turnsObserved: 1,
          lastObservedTurn: 1,
          records: [
            {
              category: 'subject-verb-agreement',
              original: 'She go',
              corrected: 'She goes',
              explanation: 'Add -s after she.',
              turnSequence: 1,
              source: 'classifier',
              recordedAt: at,
            },
          ],
        },
      });

      const loaded = await repository.load('conv_repo');

      expect(loaded?.memory.nextSequence).toBe(3);
      expect(loaded?.memory.turns.map((t) => [t.sequence, t.speaker, t.text])).toEqual([
        [1, 'user', 'She go to school.'],
        [2, 'assistant', 'Which school?'],
      ]);
      expect(loaded?.memory.turns[0].timestamp).toEqual(at);
      expect(loaded?.ledger).toEqual({
        conversationId: 'conv_repo',
        turnsObserved: 1,
        lastObservedTurn: 1,
        records: [
          {
            category: 'subject-verb-agreement',
            original: 'She go',
            corrected: 'She goes',
            explanation: 'Add -s after she.',
            turnSequence: 1,
            source: 'classifier',
            recordedAt: at,
          },
        ],
      });
    });

    it('keeps the first and last observation times', async () => {
      const first = new Date('2026-03-01T10:00:00.000Z');
      const last = new Date('2026-03-01T10:06:00.000Z');
      await repository.save({
        conversationId: 'conv_times',
        memory: { conversationId: 'conv_times', nextSequence: 4, turns: [] },
        ledger: {
          conversationId: 'conv_times',
          turnsObserved: 2,
          lastObservedTurn: 3,
          records: [],
          firstObservedAt: first,
          lastObservedAt: last,
        },
      });

      const loaded = await repository.load('conv_times');
      expect(loaded?.ledger.firstObservedAt).toEqual(first);
      expect(loaded?.ledger.lastObservedAt).toEqual(last);
    });

    it('replaces earlier rows on save', async () => {
      const at = new Date('2026-03-01T10:00:00.000Z');
      const memory = { conversationId: 'conv_repo', nextSequence: 2, turns: [{ speaker: 'user' as const, text: 'Hi.', timestamp: at, sequence: 1 }] };
      const ledger = { conversationId: 'conv_repo', turnsObserved: 0, lastObservedTurn: 0, records: [] };

      await repository.save({ conversationId: 'conv_repo', memory, ledger });
      await repository.save({
        conversationId: 'conv_repo',
        memory: { ...memory, nextSequence: 1, turns: [] },
        ledger,
      });

      const loaded = await repository.load('conv_repo');
      expect(loaded?.memory.turns).toEqual([]);
      expect(loaded?.memory.nextSequence).toBe(1);
    });

    it('lists stored conversations and deletes them with their rows', async () => {
      const empty = (id: string) => ({
        conversationId: id,
        memory: { conversationId: id, nextSequence: 1, turns: [] },
        ledger: { conversationId: id, turnsObserved: 0, lastObservedTurn: 0, records: [] },
      });
      await repository.save(empty('conv_1'));
      await repository.save(empty('conv_2'));

      expect((await repository.listConversationIds()).sort()).toEqual(['conv_1', 'conv_2']);

      await repository.delete('conv_1');
      expect(await repository.listConversationIds()).toEqual(['conv_2']);
      expect(await repository.load('conv_1')).toBeNull();
    });
  });

  describe('CoachingService with storage', () => {
    it('saves each completed turn', async () => {
      const runtime = runtimeWith({ script: [MARKET_REPLY] });

      await runtime.service.converse({ conversationId: 'conv_saved', utterance: MARKET });

      const stored = await repository.load('conv_saved');
      expect(stored?.memory.turns.map((t) => t.speaker)).toEqual(['user', 'assistant']);
      expect(stored?.ledger.records.map((r) => r.original)).toEqual(['am go']);
      expect(stored?.ledger.turnsObserved).toBe(1);
    });

    it('saves the user turn of a failed turn', async () => {
      const refused = new BackendConnectionError('Cannot connect to Ollama', { stage: 'inference' });
      const runtime = runtimeWith({ script: [refused, refused] });

      await expect(
        runtime.service.converse({ conversationId: 'conv_failed', utterance: MARKET })
      ).rejects.toBeInstanceOf(BackendConnectionError);

      const stored = await repository.load('conv_failed');
      expect(stored?.memory.turns.map((t) => [t.sequence, t.speaker])).toEqual([[1, 'user']]);
      expect(stored?.ledger.records).toEqual([]);
    });

    it('rehydrates a conversation in a new service', async () => {
      const first = runtimeWith({ script: [MARKET_REPLY] });
      await first.service.converse({ conversationId: 'conv_resume', utterance: MARKET });

      const second = runtimeWith();
      const history = await second.service.history('conv_resume');
      expect(history.map((t) => t.text)).toEqual([MARKET, 'Nice! What did you buy?']);

      const { result } = await second.service.converse({ conversationId: 'conv_resume', utterance: 'I bought apples.' });
      expect(result.proficiency.turnsObserved).toBe(2);
      expect(result.proficiency.mistakeCount).toBe(1);

      const resumed = await second.service.history('conv_resume');
      expect(resumed.map((t) => t.sequence)).toEqual([1, 2, 3, 4]);
      // The earlier exchange is part of the new prompt
      expect(second.backend.requests[0].prompt).toContain(`User: ${MARKET}`);
    });

    it('removes stored state on reset', async () => {
      const runtime = runtimeWith({ script: [MARKET_REPLY] });
      await runtime.service.converse({ conversationId: 'conv_reset', utterance: MARKET });

      await runtime.service.reset('conv_reset');

      expect(await repository.load('conv_reset')).toBeNull();
      const fresh = runtimeWith();
      expect(await fresh.service.history('conv_reset')).toEqual([]);
    });

    it('stores an imported snapshot', async () => {
      const source = runtimeWith({ script: [MARKET_REPLY] });
      await source.service.converse({ conversationId: 'conv_import', utterance: MARKET });
      const snapshot: unknown = JSON.parse(JSON.stringify(await source.service.exportSnapshot('conv_import')));
      await source.service.reset('conv_import');

      const target = runtimeWith();
      const conversationId = await target.service.importSnapshot(snapshot);

      expect(conversationId).toBe('conv_import');
      const stored = await repository.load('conv_import');
      expect(stored?.memory.turns).toHaveLength(2);
      expect(stored?.ledger.records[0].recordedAt).toBeInstanceOf(Date);
    });
  });
});
