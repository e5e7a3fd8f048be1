/**
 * Schema push for the issuer SQLite database.
 *
 * Creates all tables with CREATE TABLE IF NOT EXISTS, seeds the redemption
 * queue cursor, and records the schema version. Safe to call on every start.
 */

import type { Database } from 'better-sqlite3';
import { SETTLEMENT_ACTIONS } from '@reservemint/core';

const inList = (values: readonly string[]) => values.map((v) => `'${v}'`).join(', ');

/** Cursor row name for the redemption queue in queue_cursors. */
export const REDEMPTION_QUEUE_NAME = 'redemptions';

export const LATEST_SCHEMA_VERSION = 1;

function getCreateTableStatements(): string[] {
  return [
    `CREATE TABLE IF NOT EXISTS schema_version (
  version INTEGER PRIMARY KEY,
  applied_at INTEGER NOT NULL,
  description TEXT NOT NULL
)`,

    `CREATE TABLE IF NOT EXISTS redemption_requests (
  idx INTEGER PRIMARY KEY,
  beneficiary TEXT NOT NULL,
  amount TEXT NOT NULL CHECK (length(amount) > 0),
  created_at INTEGER NOT NULL
)`,

    `CREATE TABLE IF NOT EXISTS queue_cursors (
  name TEXT PRIMARY KEY,
  head INTEGER NOT NULL DEFAULT 0 CHECK (head >= 0),
  tail INTEGER NOT NULL DEFAULT 0 CHECK (tail >= head)
)`,

    `CREATE TABLE IF NOT EXISTS settlement_records (
  id TEXT PRIMARY KEY,
  action TEXT NOT NULL CHECK (action IN (${inList(SETTLEMENT_ACTIONS)})),
  participant TEXT NOT NULL,
  amount TEXT NOT NULL,
  payload TEXT NOT NULL,
  delivered INTEGER NOT NULL CHECK (delivered IN (0, 1)),
  created_at INTEGER NOT NULL
)`,
  ];
}

function getCreateIndexStatements(): string[] {
  return [
    'CREATE INDEX IF NOT EXISTS idx_redemption_requests_beneficiary ON redemption_requests(beneficiary)',
    'CREATE INDEX IF NOT EXISTS idx_settlement_records_participant ON settlement_records(participant)',
  ];
}

/**
 * Create tables, indexes and the queue cursor in one transaction.
 */
export function pushSchema(sqlite: Database): void {
  const now = Math.floor(Date.now() / 1000);
  sqlite.transaction(() => {
    for (const stmt of getCreateTableStatements()) {
      sqlite.exec(stmt);
    }
    for (const stmt of getCreateIndexStatements()) {
      sqlite.exec(stmt);
    }
    sqlite
      .prepare('INSERT OR IGNORE INTO queue_cursors (name, head, tail) VALUES (?, 0, 0)')
      .run(REDEMPTION_QUEUE_NAME);
    sqlite
      .prepare(
        'INSERT OR IGNORE INTO schema_version (version, applied_at, description) VALUES (?, ?, ?)',
      )
      .run(LATEST_SCHEMA_VERSION, now, 'Initial issuer schema');
  })();
}
