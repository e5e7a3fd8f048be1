/**
 * Database module barrel export.
 */

export { createDatabase, closeDatabase } from './connection.js';
export type { DatabaseConnection, IssuerDatabase } from './connection.js';
export { pushSchema, LATEST_SCHEMA_VERSION, REDEMPTION_QUEUE_NAME } from './migrate.js';
export { redemptionRequests, queueCursors, settlementRecords } from './schema.js';
export { generateId } from './id.js';
