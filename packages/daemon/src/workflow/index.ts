/**
 * Workflow module barrel export.
 */

export { RedemptionQueue, assertBatchSize } from './redemption-queue.js';
export type { Payout, RedemptionPlan, ProcessResult } from './redemption-queue.js';

export { SettlementOrchestrator } from './settlement-orchestrator.js';
export type {
  SettlementOrchestratorDeps,
  SettleReport,
  BuyResult,
  RedeemResult,
  DepositResult,
} from './settlement-orchestrator.js';

export {
  encodeSettlementRecord,
  decodeSettlementRecord,
  SETTLEMENT_RECORD_VERSION,
  SETTLEMENT_RECORD_BYTES,
} from './settlement-record.js';

export { CompensationStack } from './compensation.js';
export type { CompensationFailure } from './compensation.js';
export { Mutex } from './mutex.js';
