export { EventBus } from './event-bus.js';
export type {
  IssuerEventMap,
  BuySettledEvent,
  RedeemSettledEvent,
  RedemptionEnqueuedEvent,
  RedemptionPaidEvent,
  LiquidityForwardedEvent,
  LiquidityForwardFailedEvent,
  SettlementFailedEvent,
  ConfigChangedEvent,
} from './event-types.js';
