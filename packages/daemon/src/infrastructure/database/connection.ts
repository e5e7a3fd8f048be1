/**
 * SQLite database connection with the required PRAGMAs.
 *
 * PRAGMAs are applied in order on every new connection:
 *   1. journal_mode = WAL
 *   2. synchronous = NORMAL
 *   3. foreign_keys = ON
 *   4. busy_timeout (configurable, default 5000)
 *   5. temp_store = MEMORY
 */

import Database from 'better-sqlite3';
import type { Database as DatabaseType } from 'better-sqlite3';
import { drizzle } from 'drizzle-orm/better-sqlite3';
import type { BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import * as schema from './schema.js';

export type IssuerDatabase = BetterSQLite3Database<typeof schema>;

export interface DatabaseConnection {
  sqlite: DatabaseType;
  db: IssuerDatabase;
}

/**
 * @param dbPath - Path to the SQLite database file, or ':memory:' for in-memory.
 */
export function createDatabase(dbPath: string, options?: { busyTimeout?: number }): DatabaseConnection {
  const sqlite = new Database(dbPath);

  sqlite.pragma('journal_mode = WAL');
  sqlite.pragma('synchronous = NORMAL');
  sqlite.pragma('foreign_keys = ON');
  sqlite.pragma(`busy_timeout = ${options?.busyTimeout ?? 5000}`);
  sqlite.pragma('temp_store = MEMORY');

  const db = drizzle(sqlite, { schema });
  return { sqlite, db };
}

/**
 * Checkpoint the WAL into the main file, then close.
 */
export function closeDatabase(sqlite: DatabaseType): void {
  if (!sqlite.memory) {
    sqlite.pragma('wal_checkpoint(TRUNCATE)');
  }
  sqlite.close();
}
