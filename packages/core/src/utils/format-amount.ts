/**
 * Reserve and token amount formatting for logs and reports.
 *
 * Amounts are raw bigints in the asset's smallest unit. Pure bigint arithmetic.
 *
 * @example
 * formatAmount(1_500_000_000_000_000_000n)  // "1.5"
 * formatAmount(250_000n, 6)                 // "0.25"
 */

import { PRICE_DECIMALS } from './fixed-point.js';

/**
 * Format a raw amount to a decimal string with trailing zeros trimmed.
 *
 * @throws Error if amount is negative.
 */
export function formatAmount(amount: bigint, decimals: number = PRICE_DECIMALS): string {
  if (amount < 0n) {
    throw new Error('Amount must be non-negative');
  }
  if (amount === 0n) return '0';
  if (decimals === 0) return amount.toString();

  const divisor = 10n ** BigInt(decimals);
  const intPart = amount / divisor;
  const fracPart = amount % divisor;

  if (fracPart === 0n) return intPart.toString();

  const fracStr = fracPart.toString().padStart(decimals, '0').replace(/0+$/, '');
  return `${intPart}.${fracStr}`;
}
