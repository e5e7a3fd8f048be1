import { z } from 'zod';

/**
 * Settlement actions carried in the record delivered over the bridge message channel.
 * Array order is the wire tag: BUY=0, REDEEM=1.
 */
export const SETTLEMENT_ACTIONS = ['BUY', 'REDEEM'] as const;
export type SettlementAction = (typeof SETTLEMENT_ACTIONS)[number];
export const SettlementActionEnum = z.enum(SETTLEMENT_ACTIONS);

export const SETTLEMENT_ACTION_TAGS = {
  BUY: 0,
  REDEEM: 1,
} as const satisfies Record<SettlementAction, number>;

/**
 * Redemption request lifecycle: CREATED -> QUEUED -> PAID, or CREATED -> PAID
 * when liquidity covers the payout at submission time.
 */
export const REDEMPTION_STATUSES = ['CREATED', 'QUEUED', 'PAID'] as const;
export type RedemptionStatus = (typeof REDEMPTION_STATUSES)[number];
export const RedemptionStatusEnum = z.enum(REDEMPTION_STATUSES);
