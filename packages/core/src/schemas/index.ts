export { AddressSchema, AmountSchema, PositiveAmountSchema } from './primitives.schema.js';
export {
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
} from './issuer.schema.js';
export {
  RedemptionRequestSchema,
  type RedemptionRequest,
  type QueuedRedemption,
  SettlementRecordSchema,
  type SettlementRecord,
} from './redemption.schema.js';
