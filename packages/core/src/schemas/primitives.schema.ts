import { z } from 'zod';
import { isAddress, type Address } from '../utils/address.js';

/** 0x-prefixed 20-byte hex address. */
export const AddressSchema = z.custom<Address>(isAddress, {
  message: 'Expected a 0x-prefixed 20-byte hex address',
});

/**
 * Non-negative integer amount. Accepts bigint, a safe integer number, or a
 * numeric string (TOML/env/JSON friendly) and always yields bigint.
 */
export const AmountSchema = z
  .union([
    z.bigint().nonnegative(),
    z.number().int().nonnegative().max(Number.MAX_SAFE_INTEGER),
    z.string().regex(/^\d+$/, 'amount must be a non-negative integer string'),
  ])
  .transform((value) => BigInt(value));

/** Strictly positive integer amount. */
export const PositiveAmountSchema = AmountSchema.refine((value) => value > 0n, {
  message: 'amount must be greater than zero',
});
