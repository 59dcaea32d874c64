/**
 * Database Connection Factory for Fluency Coach
 *
 * Opens a better-sqlite3 connection with foreign key enforcement, makes sure
 * the schema exists, and wraps the connection with Drizzle ORM.
 *
 * Usage:
 *   const { db, sqlite } = openDatabase(config.database.path);
 *   const repo = new ConversationSnapshotRepository(db);
 *   // ...
 *   sqlite.close();
 */

import Database from 'better-sqlite3';
import { drizzle, type BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import * as schema from './schema';
import { ensureSchema } from './migrate';

/**
 * Type alias for the Drizzle database instance.
 */
export type AppDatabase = BetterSQLite3Database<typeof schema>;

export interface DatabaseConnection {
  /** Drizzle ORM database instance */
  db: AppDatabase;
  /** Raw SQLite connection, for closing */
  sqlite: Database.Database;
}

/**
 * Opens (creating if needed) the SQLite database at `dbPath`.
 *
 * @param dbPath - Path to the database file, or ':memory:'
 */
export function openDatabase(dbPath: string = 'fluency-coach.db'): DatabaseConnection {
  const sqlite = new Database(dbPath);

  // SQLite has foreign keys disabled by default; turn and mistake rows
  // cascade from their conversation row
  sqlite.pragma('foreign_keys = ON');

  ensureSchema(sqlite);

  return { db: drizzle(sqlite, { schema }), sqlite };
}

