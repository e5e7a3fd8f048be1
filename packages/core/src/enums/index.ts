export {
  SETTLEMENT_ACTIONS,
  type SettlementAction,
  SettlementActionEnum,
  SETTLEMENT_ACTION_TAGS,
  REDEMPTION_STATUSES,
  type RedemptionStatus,
  RedemptionStatusEnum,
} from './settlement.js';

export {
  QUEUE_STORAGE_TYPES,
  type QueueStorageType,
  QueueStorageTypeEnum,
} from './queue.js';
