/**
 * Schema Setup for Fluency Coach
 *
 * Creates the tables described in ./schema.ts when they do not exist yet.
 * Every statement is idempotent, so this runs each time a database is opened.
 */

import type Database from 'better-sqlite3';

const SCHEMA_STATEMENTS = [
  `CREATE TABLE IF NOT EXISTS conversations (
    id TEXT PRIMARY KEY NOT NULL,
    next_sequence INTEGER NOT NULL,
    turns_observed INTEGER NOT NULL DEFAULT 0,
    last_observed_turn INTEGER NOT NULL DEFAULT 0,
    first_observed_at INTEGER,
    last_observed_at INTEGER,
    created_at INTEGER NOT NULL,
    updated_at INTEGER NOT NULL
  )`,
  `CREATE TABLE IF NOT EXISTS conversation_turns (
    conversation_id TEXT NOT NULL REFERENCES conversations(id) ON DELETE CASCADE,
    sequence INTEGER NOT NULL,
    speaker TEXT NOT NULL,
    text TEXT NOT NULL,
    timestamp INTEGER NOT NULL,
    PRIMARY KEY (conversation_id, sequence)
  )`,
  `CREATE TABLE IF NOT EXISTS conversation_mistakes (
    conversation_id TEXT NOT NULL REFERENCES conversations(id) ON DELETE CASCADE,
    position INTEGER NOT NULL,
    category TEXT NOT NULL,
    original TEXT NOT NULL,
    corrected TEXT NOT NULL,
    explanation TEXT NOT NULL,
    turn_sequence INTEGER NOT NULL,
    source TEXT NOT NULL,
    recorded_at INTEGER NOT NULL,
    PRIMARY KEY (conversation_id, position)
  )`,
  `CREATE INDEX IF NOT EXISTS conversation_mistakes_turn_idx
    ON conversation_mistakes (conversation_id, turn_sequence)`,
];

/** Columns added after the first release, with their DDL type */
const ADDED_COLUMNS: Array<{ table: string; column: string; type: string }> = [
  { table: 'conversations', column: 'first_observed_at', type: 'INTEGER' },
  { table: 'conversations', column: 'last_observed_at', type: 'INTEGER' },
];

function columnNames(sqlite: Database.Database, table: string): Set<string> {
  const rows: unknown[] = sqlite.prepare(`PRAGMA table_info(${table})`).all();
  return new Set(
    rows.flatMap((row) =>
      typeof row === 'object' && row !== null && 'name' in row && typeof row.name === 'string'
        ? [row.name]
        : []
    )
  );
}

/**
 * Creates any missing tables, indexes and columns.
 */
export function ensureSchema(sqlite: Database.Database): void {
  sqlite.transaction(() => {
    for (const statement of SCHEMA_STATEMENTS) {
      sqlite.exec(statement);
    }
    for (const { table, column, type } of ADDED_COLUMNS) {
      if (!columnNames(sqlite, table).has(column)) {
        sqlite.exec(`ALTER TABLE ${table} ADD COLUMN ${column} ${type}`);
      }
    }
  })();
}

/**
 * Names of the application tables present in the database, sorted.
 */
export function listTables(sqlite: Database.Database): string[] {
  const rows: unknown[] = sqlite
    .prepare("SELECT name FROM sqlite_master WHERE type='table' AND name NOT LIKE 'sqlite_%' ORDER BY name")
    .all();

  return rows.flatMap((row) =>
    typeof row === 'object' && row !== null && 'name' in row && typeof row.name === 'string'
      ? [row.name]
      : []
  );
}
