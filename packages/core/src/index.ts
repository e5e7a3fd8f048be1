// @reservemint/core - shared types, schemas, errors, interfaces

// Enums
export {
  SETTLEMENT_ACTIONS,
  type SettlementAction,
  SettlementActionEnum,
  SETTLEMENT_ACTION_TAGS,
  REDEMPTION_STATUSES,
  type RedemptionStatus,
  RedemptionStatusEnum,
  QUEUE_STORAGE_TYPES,
  type QueueStorageType,
  QueueStorageTypeEnum,
} from './enums/index.js';

// Schemas
export {
  AddressSchema,
  AmountSchema,
  PositiveAmountSchema,
  PricingParametersSchema,
  type PricingParameters,
  validatePricingParameters,
  LiquidityPolicySchema,
  type LiquidityPolicy,
  IssuerAccountsSchema,
  type IssuerAccounts,
  SettlementKnobsSchema,
  type SettlementKnobs,
  IssuerParametersSchema,
  type IssuerParameters,
  RedemptionRequestSchema,
  type RedemptionRequest,
  type QueuedRedemption,
  SettlementRecordSchema,
  type SettlementRecord,
} from './schemas/index.js';

// Errors
export {
  ERROR_CODES,
  type ErrorCode,
  type ErrorDomain,
  type ErrorCodeEntry,
  ReserveMintError,
  isReserveMintError,
} from './errors/index.js';

// Interfaces
export type {
  IPriceOracle,
  IBridgeGateway,
  SendStableParams,
  IReserveToken,
  ISyntheticLedger,
  IRedemptionQueueStore,
} from './interfaces/index.js';

// Events
export {
  EventBus,
  type IssuerEventMap,
  type BuySettledEvent,
  type RedeemSettledEvent,
  type RedemptionEnqueuedEvent,
  type RedemptionPaidEvent,
  type LiquidityForwardedEvent,
  type LiquidityForwardFailedEvent,
  type SettlementFailedEvent,
  type ConfigChangedEvent,
} from './events/index.js';

// Utils
export {
  PRICE_DECIMALS,
  PRICE_SCALE,
  mulDiv,
  rescale,
  sumAmounts,
  formatAmount,
  type Address,
  type Hex,
  ZERO_ADDRESS,
  isAddress,
  isZeroAddress,
  sameAddress,
  addressKey,
} from './utils/index.js';
