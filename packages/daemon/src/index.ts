// @reservemint/daemon - settlement engine and its infrastructure

// Database module
export {
  createDatabase,
  closeDatabase,
  pushSchema,
  redemptionRequests,
  queueCursors,
  settlementRecords,
  generateId,
  LATEST_SCHEMA_VERSION,
  REDEMPTION_QUEUE_NAME,
} from './infrastructure/database/index.js';
export type { DatabaseConnection, IssuerDatabase } from './infrastructure/database/index.js';

// Queue storage
export {
  createQueueStore,
  IndexedQueueStore,
  CompactingQueueStore,
  SqliteQueueStore,
} from './infrastructure/queue-store/index.js';

// Config module
export {
  loadConfig,
  IssuerDaemonConfigSchema,
  detectNestedSections,
  applyEnvOverrides,
  parseEnvValue,
  toIssuerParameters,
} from './infrastructure/config/index.js';
export type { IssuerDaemonConfig } from './infrastructure/config/index.js';

// Services
export { PricingEngine } from './services/pricing-engine.js';
export type { Quote, BuyPreview, RedeemPreview } from './services/pricing-engine.js';
export { LiquidityController } from './services/liquidity-controller.js';
export type {
  ForwardInstruction,
  ForwardResult,
  ForwardTargets,
} from './services/liquidity-controller.js';
export { IssuerConfigAuthority } from './services/issuer-config-authority.js';
export type {
  IssuerConfig,
  IssuerConfigSnapshot,
  IssuerConfigAuthorityOptions,
} from './services/issuer-config-authority.js';
export { InMemorySyntheticLedger } from './services/synthetic-ledger.js';
export { SqliteSettlementJournal } from './services/settlement-journal.js';
export type {
  ISettlementJournal,
  JournalEntry,
  JournalRecord,
} from './services/settlement-journal.js';

// Workflow module
export * from './workflow/index.js';

// Lifecycle module
export { IssuerLifecycle, registerSignalHandlers, BackgroundWorkers } from './lifecycle/index.js';
export type {
  IssuerCollaborators,
  IssuerLifecycleOptions,
  BackgroundWorkersOptions,
} from './lifecycle/index.js';

// ---------------------------------------------------------------------------
// Convenience: top-level startIssuer()
// ---------------------------------------------------------------------------

import { IssuerLifecycle } from './lifecycle/index.js';
import { registerSignalHandlers } from './lifecycle/index.js';
import type { IssuerCollaborators } from './lifecycle/index.js';

/**
 * Start the issuer engine.
 *
 * Creates an IssuerLifecycle, registers signal handlers, and starts it with
 * the given data directory (contains config.toml) and collaborators.
 */
export async function startIssuer(
  dataDir: string,
  collaborators: IssuerCollaborators,
): Promise<IssuerLifecycle> {
  const lifecycle = new IssuerLifecycle();
  registerSignalHandlers(lifecycle);
  await lifecycle.start(dataDir, collaborators);
  return lifecycle;
}
