import { z } from 'zod';
import { ReserveMintError } from '../errors/index.js';
import { PRICE_SCALE } from '../utils/fixed-point.js';
import { AddressSchema, AmountSchema } from './primitives.schema.js';

// ---------------------------------------------------------------------------
// PricingParameters: spreads scaled by PRICE_SCALE, fees in reserve units
// ---------------------------------------------------------------------------

export const PricingParametersSchema = z
  .object({
    buySpread: AmountSchema.default(0n),
    redeemSpread: AmountSchema.default(0n),
    buyFee: AmountSchema.default(0n),
    redeemFee: AmountSchema.default(0n),
  })
  .superRefine((params, ctx) => {
    if (params.redeemSpread >= PRICE_SCALE) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['redeemSpread'],
        message: 'must be below 100% (PRICE_SCALE)',
      });
    }
  });
export type PricingParameters = z.infer<typeof PricingParametersSchema>;

/**
 * Parse pricing parameters, mapping failures onto the error taxonomy:
 * a redeem spread of 100% or more is INVALID_SPREAD, anything else
 * (negative or non-integer values) is INVALID_CONFIG.
 */
export function validatePricingParameters(
  input: z.input<typeof PricingParametersSchema>,
): PricingParameters {
  const result = PricingParametersSchema.safeParse(input);
  if (result.success) return result.data;

  const issues = result.error.issues;
  const spreadIssue = issues.some((issue) => issue.path[0] === 'redeemSpread');
  throw new ReserveMintError(spreadIssue ? 'INVALID_SPREAD' : 'INVALID_CONFIG', {
    message: issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; '),
    cause: result.error,
  });
}

// ---------------------------------------------------------------------------
// LiquidityPolicy: both reserve-asset amounts
// ---------------------------------------------------------------------------

export const LiquidityPolicySchema = z.object({
  bufferThreshold: AmountSchema.default(0n),
  minBridgeAmount: AmountSchema.default(0n),
});
export type LiquidityPolicy = z.infer<typeof LiquidityPolicySchema>;

// ---------------------------------------------------------------------------
// Issuer accounts and settlement knobs
// ---------------------------------------------------------------------------

export const IssuerAccountsSchema = z.object({
  /** Configuration authority. */
  owner: AddressSchema,
  /** Automation principal allowed to trigger settlement and top up the buffer. */
  operator: AddressSchema,
  /** Local custody account holding the reserve buffer. */
  custodyAccount: AddressSchema,
  feeCollector: AddressSchema,
});
export type IssuerAccounts = z.infer<typeof IssuerAccountsSchema>;

export const SettlementKnobsSchema = z.object({
  /** Max queued requests paid per settlement call. */
  maxBatch: z.number().int().min(1).max(1000).default(50),
  /** Settle automatically after buy (drain + forward) and deposit (drain). */
  autoSettle: z.boolean().default(true),
});
export type SettlementKnobs = z.infer<typeof SettlementKnobsSchema>;

// ---------------------------------------------------------------------------
// IssuerParameters: the starting configuration of an issuer
// ---------------------------------------------------------------------------

export const IssuerParametersSchema = IssuerAccountsSchema.merge(SettlementKnobsSchema).extend({
  pricing: PricingParametersSchema.default({}),
  liquidity: LiquidityPolicySchema.default({}),
});
export type IssuerParameters = z.infer<typeof IssuerParametersSchema>;
