import { z } from 'zod';

/**
 * Redemption queue backing storage.
 * - indexed: head/tail keyed map, dequeued slots cleared and never reused
 * - compacting: append-only array with periodic shift-down compaction
 * - sqlite: indexed strategy persisted through better-sqlite3
 */
export const QUEUE_STORAGE_TYPES = ['indexed', 'compacting', 'sqlite'] as const;
export type QueueStorageType = (typeof QUEUE_STORAGE_TYPES)[number];
export const QueueStorageTypeEnum = z.enum(QUEUE_STORAGE_TYPES);
