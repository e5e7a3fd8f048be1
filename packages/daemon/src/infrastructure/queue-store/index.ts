import type { IRedemptionQueueStore, QueueStorageType } from '@reservemint/core';
import type { DatabaseConnection } from '../database/connection.js';
import { IndexedQueueStore } from './indexed-queue-store.js';
import { CompactingQueueStore } from './compacting-queue-store.js';
import { SqliteQueueStore } from './sqlite-queue-store.js';

export { IndexedQueueStore, CompactingQueueStore, SqliteQueueStore };

/**
 * Build the configured queue backend. `sqlite` needs an open connection with
 * the schema pushed.
 */
export function createQueueStore(
  kind: QueueStorageType,
  connection?: DatabaseConnection,
): IRedemptionQueueStore {
  switch (kind) {
    case 'indexed':
      return new IndexedQueueStore();
    case 'compacting':
      return new CompactingQueueStore();
    case 'sqlite':
      if (!connection) {
        throw new Error('createQueueStore: sqlite storage requires a database connection');
      }
      return new SqliteQueueStore(connection.db, connection.sqlite);
  }
}
