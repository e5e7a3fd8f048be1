import { uuidv7 } from 'uuidv7';

/**
 * UUID v7 for settlement record ids: embeds a ms timestamp, so `ORDER BY id`
 * is chronological.
 */
export function generateId(): string {
  return uuidv7();
}
