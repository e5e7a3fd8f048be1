/**
 * Issuer EventBus event type definitions.
 *
 * - settlement:buy / settlement:redeem -- a buy or redeem committed
 * - queue:enqueued -- a redemption could not be paid and joined the tail
 * - queue:paid -- a redemption (queued or fresh) was paid out
 * - liquidity:forwarded / liquidity:forward-failed -- bridge forwarding outcome
 * - settlement:failed -- an automatic settle() after buy/deposit failed
 * - config:changed -- the configuration authority changed a field
 */

import type { Address } from '../utils/address.js';

export interface BuySettledEvent {
  participant: Address;
  reserveAmount: bigint;
  netAmount: bigint;
  fee: bigint;
  tokenAmount: bigint;
  execPrice: bigint;
  timestamp: number;
}

export interface RedeemSettledEvent {
  participant: Address;
  tokenAmount: bigint;
  netAmount: bigint;
  fee: bigint;
  execPrice: bigint;
  paidImmediately: boolean;
  timestamp: number;
}

export interface RedemptionEnqueuedEvent {
  index: number;
  beneficiary: Address;
  amount: bigint;
  queueLength: number;
  timestamp: number;
}

export interface RedemptionPaidEvent {
  beneficiary: Address;
  amount: bigint;
  /** Absolute queue index, or null when paid on submission. */
  index: number | null;
  timestamp: number;
}

export interface LiquidityForwardedEvent {
  amount: bigint;
  retained: bigint;
  timestamp: number;
}

export interface LiquidityForwardFailedEvent {
  amount: bigint;
  error: string;
  timestamp: number;
}

export interface SettlementFailedEvent {
  trigger: 'buy' | 'deposit' | 'worker';
  error: string;
  timestamp: number;
}

export interface ConfigChangedEvent {
  field: string;
  changedBy: Address;
  timestamp: number;
}

export interface IssuerEventMap {
  'settlement:buy': BuySettledEvent;
  'settlement:redeem': RedeemSettledEvent;
  'queue:enqueued': RedemptionEnqueuedEvent;
  'queue:paid': RedemptionPaidEvent;
  'liquidity:forwarded': LiquidityForwardedEvent;
  'liquidity:forward-failed': LiquidityForwardFailedEvent;
  'settlement:failed': SettlementFailedEvent;
  'config:changed': ConfigChangedEvent;
}
