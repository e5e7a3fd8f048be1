/**
 * IndexedQueueStore - head/tail keyed map (default redemption queue storage).
 *
 * Each request lives under its absolute index. Dequeued slots are deleted and
 * indices are never reused, so live storage is exactly `tail - head` entries
 * and every operation is O(1) per request. Trade-off against
 * CompactingQueueStore: no O(n) compaction pauses, but the Map's own
 * allocation is left to the runtime.
 */

import type { IRedemptionQueueStore, QueuedRedemption, RedemptionRequest } from '@reservemint/core';

export class IndexedQueueStore implements IRedemptionQueueStore {
  readonly kind = 'indexed' as const;
  private readonly slots = new Map<number, RedemptionRequest>();
  private _head = 0;
  private _tail = 0;

  head(): number {
    return this._head;
  }

  tail(): number {
    return this._tail;
  }

  length(): number {
    return this._tail - this._head;
  }

  peek(offset: number): RedemptionRequest | undefined {
    if (offset < 0) return undefined;
    const slot = this.slots.get(this._head + offset);
    return slot ? { ...slot } : undefined;
  }

  enqueue(request: RedemptionRequest): number {
    const index = this._tail;
    this.slots.set(index, { beneficiary: request.beneficiary, amount: request.amount });
    this._tail = index + 1;
    return index;
  }

  dequeue(count: number): RedemptionRequest[] {
    if (count < 0 || count > this.length()) {
      throw new Error(`IndexedQueueStore: cannot dequeue ${count} of ${this.length()}`);
    }
    const removed: RedemptionRequest[] = [];
    for (let i = 0; i < count; i++) {
      const index = this._head + i;
      const slot = this.slots.get(index);
      if (!slot) {
        throw new Error(`IndexedQueueStore: missing slot ${index}`);
      }
      removed.push(slot);
    }
    for (let i = 0; i < count; i++) {
      this.slots.delete(this._head + i);
    }
    this._head += count;
    return removed;
  }

  list(limit: number = this.length()): QueuedRedemption[] {
    const n = Math.min(Math.max(limit, 0), this.length());
    const out: QueuedRedemption[] = [];
    for (let i = 0; i < n; i++) {
      const index = this._head + i;
      const slot = this.slots.get(index);
      if (slot) out.push({ index, ...slot });
    }
    return out;
  }

  /** In-memory mutations cannot fail midway, so no rollback is needed. */
  transaction<T>(fn: () => T): T {
    return fn();
  }
}
