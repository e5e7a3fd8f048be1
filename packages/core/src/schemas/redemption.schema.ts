import { z } from 'zod';
import { SettlementActionEnum } from '../enums/settlement.js';
import { AddressSchema, AmountSchema, PositiveAmountSchema } from './primitives.schema.js';

export const RedemptionRequestSchema = z.object({
  beneficiary: AddressSchema,
  amount: PositiveAmountSchema,
});
export type RedemptionRequest = z.infer<typeof RedemptionRequestSchema>;

/** A request sitting in the queue, with its absolute position. */
export interface QueuedRedemption extends RedemptionRequest {
  index: number;
}

export const SettlementRecordSchema = z.object({
  action: SettlementActionEnum,
  participant: AddressSchema,
  amount: AmountSchema,
});
export type SettlementRecord = z.infer<typeof SettlementRecordSchema>;
