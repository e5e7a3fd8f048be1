/**
 * Settlement journal - local copy of every settlement record the engine
 * emitted, with whether the bridge accepted it.
 *
 * The bridge message channel is fire-and-forget; the journal is what lets an
 * operator find and resend records whose delivery failed.
 */

import { and, desc, eq, type SQL } from 'drizzle-orm';
import {
  SettlementRecordSchema,
  type Address,
  type Hex,
  type SettlementAction,
} from '@reservemint/core';
import type { IssuerDatabase } from '../infrastructure/database/connection.js';
import { settlementRecords } from '../infrastructure/database/schema.js';
import { generateId } from '../infrastructure/database/id.js';

export interface JournalEntry {
  action: SettlementAction;
  participant: Address;
  amount: bigint;
  payload: Hex;
  delivered: boolean;
}

export interface JournalRecord extends JournalEntry {
  id: string;
  createdAt: Date;
}

export interface ISettlementJournal {
  append(entry: JournalEntry): string;
  list(options?: { participant?: Address; undeliveredOnly?: boolean; limit?: number }): JournalRecord[];
  markDelivered(id: string): void;
}

export class SqliteSettlementJournal implements ISettlementJournal {
  constructor(private readonly db: IssuerDatabase) {}

  append(entry: JournalEntry): string {
    const id = generateId();
    this.db
      .insert(settlementRecords)
      .values({
        id,
        action: entry.action,
        participant: entry.participant.toLowerCase(),
        amount: entry.amount.toString(),
        payload: entry.payload,
        delivered: entry.delivered,
        createdAt: new Date(),
      })
      .run();
    return id;
  }

  list(
    options: { participant?: Address; undeliveredOnly?: boolean; limit?: number } = {},
  ): JournalRecord[] {
    const filters: SQL[] = [];
    if (options.participant) {
      filters.push(eq(settlementRecords.participant, options.participant.toLowerCase()));
    }
    if (options.undeliveredOnly) {
      filters.push(eq(settlementRecords.delivered, false));
    }

    const rows = this.db
      .select()
      .from(settlementRecords)
      .where(filters.length > 0 ? and(...filters) : undefined)
      .orderBy(desc(settlementRecords.id))
      .limit(options.limit ?? 100)
      .all();

    return rows.map((row) => {
      const record = SettlementRecordSchema.safeParse({
        action: row.action,
        participant: row.participant,
        amount: row.amount,
      });
      if (!record.success) {
        throw new Error(`SqliteSettlementJournal: corrupt record ${row.id}`);
      }
      return {
        id: row.id,
        ...record.data,
        payload: toHex(row.payload),
        delivered: row.delivered,
        createdAt: row.createdAt,
      };
    });
  }

  markDelivered(id: string): void {
    this.db
      .update(settlementRecords)
      .set({ delivered: true })
      .where(eq(settlementRecords.id, id))
      .run();
  }
}

function toHex(value: string): Hex {
  if (!/^0x[0-9a-fA-F]*$/.test(value)) {
    throw new Error('SqliteSettlementJournal: payload is not hex');
  }
  return `0x${value.slice(2)}`;
}
