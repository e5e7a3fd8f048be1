/**
 * CompactingQueueStore - append-only array with an advancing head cursor.
 *
 * Dequeue only moves the cursor. Once the consumed prefix exceeds half of the
 * array, the live entries are shifted down and the array truncated, which
 * bounds total allocation to about twice the live queue at the cost of an
 * occasional O(n) copy. Absolute indices stay stable across compaction via
 * `base` (the absolute index of array slot 0).
 */

import type { IRedemptionQueueStore, QueuedRedemption, RedemptionRequest } from '@reservemint/core';

export class CompactingQueueStore implements IRedemptionQueueStore {
  readonly kind = 'compacting' as const;
  private entries: RedemptionRequest[] = [];
  /** Absolute index of entries[0]. */
  private base = 0;
  /** Array offset of the next unpaid entry. */
  private cursor = 0;
  private _compactions = 0;

  head(): number {
    return this.base + this.cursor;
  }

  tail(): number {
    return this.base + this.entries.length;
  }

  length(): number {
    return this.entries.length - this.cursor;
  }

  /** Allocated slots including the consumed prefix (for tests and metrics). */
  capacity(): number {
    return this.entries.length;
  }

  get compactions(): number {
    return this._compactions;
  }

  peek(offset: number): RedemptionRequest | undefined {
    if (offset < 0) return undefined;
    const entry = this.entries[this.cursor + offset];
    return entry ? { ...entry } : undefined;
  }

  enqueue(request: RedemptionRequest): number {
    const index = this.tail();
    this.entries.push({ beneficiary: request.beneficiary, amount: request.amount });
    return index;
  }

  dequeue(count: number): RedemptionRequest[] {
    if (count < 0 || count > this.length()) {
      throw new Error(`CompactingQueueStore: cannot dequeue ${count} of ${this.length()}`);
    }
    const removed = this.entries.slice(this.cursor, this.cursor + count);
    this.cursor += count;
    if (this.cursor * 2 > this.entries.length) {
      this.compact();
    }
    return removed;
  }

  list(limit: number = this.length()): QueuedRedemption[] {
    const n = Math.min(Math.max(limit, 0), this.length());
    return this.entries
      .slice(this.cursor, this.cursor + n)
      .map((entry, i) => ({ index: this.head() + i, ...entry }));
  }

  transaction<T>(fn: () => T): T {
    return fn();
  }

  private compact(): void {
    this.entries = this.entries.slice(this.cursor);
    this.base += this.cursor;
    this.cursor = 0;
    this._compactions += 1;
  }
}
