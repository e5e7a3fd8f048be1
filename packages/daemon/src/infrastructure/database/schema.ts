/**
 * Drizzle ORM schema definitions for the issuer SQLite database.
 *
 * 3 tables: redemption_requests, queue_cursors, settlement_records
 *
 * Amounts are stored as decimal TEXT because they routinely exceed 2^63.
 * redemption_requests is keyed by the request's absolute queue index; rows are
 * deleted when paid, so the table only ever holds `tail - head` rows.
 */

import { sqliteTable, text, integer, index, check } from 'drizzle-orm/sqlite-core';
import { sql } from 'drizzle-orm';
import { SETTLEMENT_ACTIONS } from '@reservemint/core';

const buildCheckSql = (column: string, values: readonly string[]) =>
  sql.raw(`${column} IN (${values.map((v) => `'${v}'`).join(', ')})`);

// ---------------------------------------------------------------------------
// Table 1: redemption_requests -- pending payout obligations
// ---------------------------------------------------------------------------

export const redemptionRequests = sqliteTable(
  'redemption_requests',
  {
    idx: integer('idx').primaryKey(),
    beneficiary: text('beneficiary').notNull(),
    amount: text('amount').notNull(),
    createdAt: integer('created_at', { mode: 'timestamp' }).notNull(),
  },
  (table) => [index('idx_redemption_requests_beneficiary').on(table.beneficiary)],
);

// ---------------------------------------------------------------------------
// Table 2: queue_cursors -- head/tail per named queue
// ---------------------------------------------------------------------------

export const queueCursors = sqliteTable('queue_cursors', {
  name: text('name').primaryKey(),
  head: integer('head').notNull().default(0),
  tail: integer('tail').notNull().default(0),
});

// ---------------------------------------------------------------------------
// Table 3: settlement_records -- journal of records sent over the bridge
// ---------------------------------------------------------------------------

export const settlementRecords = sqliteTable(
  'settlement_records',
  {
    id: text('id').primaryKey(),
    action: text('action').notNull(),
    participant: text('participant').notNull(),
    amount: text('amount').notNull(),
    payload: text('payload').notNull(),
    delivered: integer('delivered', { mode: 'boolean' }).notNull(),
    createdAt: integer('created_at', { mode: 'timestamp' }).notNull(),
  },
  (table) => [
    index('idx_settlement_records_participant').on(table.participant),
    check('check_action', buildCheckSql('action', SETTLEMENT_ACTIONS)),
  ],
);
