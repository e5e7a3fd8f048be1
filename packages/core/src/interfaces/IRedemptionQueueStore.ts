import type { QueueStorageType } from '../enums/queue.js';
import type { QueuedRedemption, RedemptionRequest } from '../schemas/redemption.schema.js';

/**
 * Backing storage for the FIFO redemption queue.
 *
 * Positions are absolute: `head()` is the index of the next unpaid request,
 * `tail()` the index the next enqueue will take. Everything before head is
 * logically deleted; `length() === tail() - head()` at all times.
 *
 * All methods are synchronous. `transaction(fn)` groups a dequeue and an
 * enqueue so they commit together.
 */
export interface IRedemptionQueueStore {
  readonly kind: QueueStorageType;

  head(): number;

  tail(): number;

  length(): number;

  /** Request at `head() + offset`, or undefined past the tail. */
  peek(offset: number): RedemptionRequest | undefined;

  /** Append to the tail. Returns the absolute index assigned. */
  enqueue(request: RedemptionRequest): number;

  /**
   * Remove `count` requests from the head, in order.
   * @throws Error if count exceeds length().
   */
  dequeue(count: number): RedemptionRequest[];

  /** Up to `limit` pending requests from the head, in FIFO order. */
  list(limit?: number): QueuedRedemption[];

  transaction<T>(fn: () => T): T;
}
