/**
 * SqliteQueueStore - durable redemption queue on the issuer database.
 *
 * Same head/tail layout as IndexedQueueStore, persisted: one row per pending
 * request keyed by absolute index, plus a cursor row in queue_cursors. Every
 * mutating call runs inside a better-sqlite3 transaction, so a crash never
 * leaves the cursor and the rows disagreeing.
 */

import { and, asc, eq, gte, lt } from 'drizzle-orm';
import type { Database } from 'better-sqlite3';
import {
  RedemptionRequestSchema,
  type IRedemptionQueueStore,
  type QueuedRedemption,
  type RedemptionRequest,
} from '@reservemint/core';
import type { IssuerDatabase } from '../database/connection.js';
import { queueCursors, redemptionRequests } from '../database/schema.js';
import { REDEMPTION_QUEUE_NAME } from '../database/migrate.js';

interface RequestRow {
  idx: number;
  beneficiary: string;
  amount: string;
}

function toRequest(row: RequestRow): RedemptionRequest {
  const parsed = RedemptionRequestSchema.safeParse({ beneficiary: row.beneficiary, amount: row.amount });
  if (!parsed.success) {
    throw new Error(`SqliteQueueStore: corrupt request at index ${row.idx}`);
  }
  return parsed.data;
}

export class SqliteQueueStore implements IRedemptionQueueStore {
  readonly kind = 'sqlite' as const;

  constructor(
    private readonly db: IssuerDatabase,
    private readonly sqlite: Database,
    private readonly queueName: string = REDEMPTION_QUEUE_NAME,
  ) {
    this.db
      .insert(queueCursors)
      .values({ name: this.queueName, head: 0, tail: 0 })
      .onConflictDoNothing()
      .run();
  }

  private cursor(): { head: number; tail: number } {
    const row = this.db
      .select({ head: queueCursors.head, tail: queueCursors.tail })
      .from(queueCursors)
      .where(eq(queueCursors.name, this.queueName))
      .get();
    if (!row) {
      throw new Error(`SqliteQueueStore: cursor '${this.queueName}' missing`);
    }
    return row;
  }

  head(): number {
    return this.cursor().head;
  }

  tail(): number {
    return this.cursor().tail;
  }

  length(): number {
    const { head, tail } = this.cursor();
    return tail - head;
  }

  peek(offset: number): RedemptionRequest | undefined {
    if (offset < 0) return undefined;
    const { head, tail } = this.cursor();
    const index = head + offset;
    if (index >= tail) return undefined;
    const row = this.db
      .select()
      .from(redemptionRequests)
      .where(eq(redemptionRequests.idx, index))
      .get();
    return row ? toRequest(row) : undefined;
  }

  enqueue(request: RedemptionRequest): number {
    return this.sqlite.transaction(() => {
      const { tail } = this.cursor();
      this.db
        .insert(redemptionRequests)
        .values({
          idx: tail,
          beneficiary: request.beneficiary,
          amount: request.amount.toString(),
          createdAt: new Date(),
        })
        .run();
      this.db
        .update(queueCursors)
        .set({ tail: tail + 1 })
        .where(eq(queueCursors.name, this.queueName))
        .run();
      return tail;
    })();
  }

  dequeue(count: number): RedemptionRequest[] {
    return this.sqlite.transaction(() => {
      const { head, tail } = this.cursor();
      if (count < 0 || count > tail - head) {
        throw new Error(`SqliteQueueStore: cannot dequeue ${count} of ${tail - head}`);
      }
      if (count === 0) return [];

      const range = and(
        gte(redemptionRequests.idx, head),
        lt(redemptionRequests.idx, head + count),
      );
      const rows = this.db
        .select()
        .from(redemptionRequests)
        .where(range)
        .orderBy(asc(redemptionRequests.idx))
        .all();
      if (rows.length !== count) {
        throw new Error(`SqliteQueueStore: expected ${count} rows from ${head}, found ${rows.length}`);
      }

      this.db.delete(redemptionRequests).where(range).run();
      this.db
        .update(queueCursors)
        .set({ head: head + count })
        .where(eq(queueCursors.name, this.queueName))
        .run();
      return rows.map(toRequest);
    })();
  }

  list(limit?: number): QueuedRedemption[] {
    const { head, tail } = this.cursor();
    const n = Math.min(Math.max(limit ?? tail - head, 0), tail - head);
    if (n === 0) return [];
    const rows = this.db
      .select()
      .from(redemptionRequests)
      .where(and(gte(redemptionRequests.idx, head), lt(redemptionRequests.idx, head + n)))
      .orderBy(asc(redemptionRequests.idx))
      .all();
    return rows.map((row) => ({ index: row.idx, ...toRequest(row) }));
  }

  /** Nested calls become savepoints; a throw rolls back everything inside. */
  transaction<T>(fn: () => T): T {
    return this.sqlite.transaction(fn)();
  }
}
