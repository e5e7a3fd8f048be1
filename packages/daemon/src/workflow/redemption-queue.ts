/**
 * RedemptionQueue - FIFO payout obligations with admission control.
 *
 * Strict ordering with head-of-line blocking: a queued request that does not
 * fit the remaining liquidity stops the walk, even when smaller requests
 * behind it would fit. A new request is paid on submission only when it
 * would not overtake anything: every queued request was paid in the same
 * pass, the batch bound still has room, and its amount fits what remains.
 * Otherwise it joins the tail.
 *
 * Two-phase use: plan() is read-only, commit() applies the dequeue of the
 * paid prefix and the append of an unpaid new request in one store
 * transaction. The caller transfers funds between the two, and commits only
 * the prefix it actually paid.
 *
 * Storage is pluggable (IRedemptionQueueStore): indexed (default),
 * compacting, or sqlite.
 */

import {
  ReserveMintError,
  isAddress,
  isZeroAddress,
  sumAmounts,
  type Address,
  type IRedemptionQueueStore,
  type QueuedRedemption,
  type QueueStorageType,
  type RedemptionRequest,
} from '@reservemint/core';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface Payout {
  beneficiary: Address;
  amount: bigint;
  /** Absolute queue index, or null for a request paid on submission. */
  index: number | null;
}

export interface RedemptionPlan {
  /** Store cursors the plan was computed against. */
  readonly head: number;
  readonly tail: number;
  /** Queued payouts first (FIFO), then the new request if payable now. */
  readonly payouts: readonly Payout[];
  /** How many of `payouts` come from the queue. */
  readonly queuedPaid: number;
  readonly newRequest: RedemptionRequest | null;
  readonly newRequestPaid: boolean;
  /** available - sum(payouts). */
  readonly remaining: bigint;
}

export interface ProcessResult {
  payouts: Payout[];
  /** Index given to the new request when it was queued instead of paid. */
  enqueuedIndex: number | null;
  dequeued: number;
  queueLength: number;
  /** available - sum(payouts actually made). */
  remaining: bigint;
}

// ---------------------------------------------------------------------------
// Validation helpers
// ---------------------------------------------------------------------------

export function assertBatchSize(maxBatch: number): void {
  if (!Number.isSafeInteger(maxBatch) || maxBatch < 1) {
    throw new ReserveMintError('INVALID_BATCH_SIZE', { details: { maxBatch } });
  }
}

/**
 * Normalize an optional new request. An empty beneficiary or zero amount
 * means "no new request".
 */
function normalizeRequest(request: RedemptionRequest | null): RedemptionRequest | null {
  if (!request) return null;
  if (!isAddress(request.beneficiary)) {
    throw new ReserveMintError('INVALID_ADDRESS', { details: { beneficiary: request.beneficiary } });
  }
  if (request.amount < 0n) {
    throw new ReserveMintError('INVALID_AMOUNT', { details: { amount: request.amount.toString() } });
  }
  if (isZeroAddress(request.beneficiary) || request.amount === 0n) return null;
  return { beneficiary: request.beneficiary, amount: request.amount };
}

// ---------------------------------------------------------------------------
// RedemptionQueue
// ---------------------------------------------------------------------------

export class RedemptionQueue {
  constructor(private readonly store: IRedemptionQueueStore) {}

  get storage(): QueueStorageType {
    return this.store.kind;
  }

  length(): number {
    return this.store.length();
  }

  head(): number {
    return this.store.head();
  }

  tail(): number {
    return this.store.tail();
  }

  list(limit?: number): QueuedRedemption[] {
    return this.store.list(limit);
  }

  /**
   * Compute which requests `available` liquidity pays, without mutating.
   */
  plan(newRequest: RedemptionRequest | null, available: bigint, maxBatch: number): RedemptionPlan {
    assertBatchSize(maxBatch);
    if (available < 0n) {
      throw new ReserveMintError('INVALID_AMOUNT', {
        message: 'Available liquidity cannot be negative',
        details: { available: available.toString() },
      });
    }
    const request = normalizeRequest(newRequest);

    const head = this.store.head();
    const tail = this.store.tail();
    const queued = tail - head;

    const payouts: Payout[] = [];
    let remaining = available;
    let walked = 0;

    // Steps 1-2: walk from head, stop at the batch bound or the first misfit.
    while (walked < maxBatch && walked < queued) {
      const next = this.store.peek(walked);
      if (!next) {
        throw new Error(`RedemptionQueue: missing request at index ${head + walked}`);
      }
      if (next.amount > remaining) break;
      remaining -= next.amount;
      payouts.push({ beneficiary: next.beneficiary, amount: next.amount, index: head + walked });
      walked++;
    }

    // Step 3: admission of the new request.
    let newRequestPaid = false;
    if (request) {
      const queueCleared = walked === queued;
      const batchHasRoom = walked < maxBatch;
      if (queueCleared && batchHasRoom && request.amount <= remaining) {
        remaining -= request.amount;
        payouts.push({ beneficiary: request.beneficiary, amount: request.amount, index: null });
        newRequestPaid = true;
      }
    }

    return {
      head,
      tail,
      payouts,
      queuedPaid: walked,
      newRequest: request,
      newRequestPaid,
      remaining,
    };
  }

  /**
   * Apply a plan after `paidCount` of its payouts (a prefix) were transferred.
   * The paid queued prefix is dequeued; an unpaid new request is appended.
   *
   * @throws Error if the store moved since the plan was computed.
   */
  commit(plan: RedemptionPlan, paidCount: number = plan.payouts.length): ProcessResult {
    if (!Number.isSafeInteger(paidCount) || paidCount < 0 || paidCount > plan.payouts.length) {
      throw new Error(`RedemptionQueue: paidCount ${paidCount} outside 0..${plan.payouts.length}`);
    }

    return this.store.transaction(() => {
      if (this.store.head() !== plan.head || this.store.tail() !== plan.tail) {
        throw new Error('RedemptionQueue: stale plan, queue changed since planning');
      }

      const dequeued = Math.min(paidCount, plan.queuedPaid);
      this.store.dequeue(dequeued);

      const newPaid = plan.newRequestPaid && paidCount > plan.queuedPaid;
      let enqueuedIndex: number | null = null;
      if (plan.newRequest && !newPaid) {
        enqueuedIndex = this.store.enqueue(plan.newRequest);
      }

      const unpaid = sumAmounts(plan.payouts.slice(paidCount).map((p) => p.amount));
      return {
        payouts: plan.payouts.slice(0, paidCount).map((p) => ({ ...p })),
        enqueuedIndex,
        dequeued,
        queueLength: this.store.length(),
        remaining: plan.remaining + unpaid,
      };
    });
  }

  /** plan() + commit() of every payout, for callers that transfer afterwards. */
  process(newRequest: RedemptionRequest | null, available: bigint, maxBatch: number): ProcessResult {
    return this.commit(this.plan(newRequest, available, maxBatch));
  }
}
