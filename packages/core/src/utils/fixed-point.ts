/**
 * Fixed-point arithmetic for prices and spreads.
 *
 * Prices and spreads are integers scaled by PRICE_SCALE (10^18). bigint has no
 * upper bound, so `a * b` never overflows before the division.
 *
 * @example
 * mulDiv(100n * PRICE_SCALE, PRICE_SCALE, 2n * PRICE_SCALE) // 50n * PRICE_SCALE
 */

export const PRICE_DECIMALS = 18;
export const PRICE_SCALE = 10n ** BigInt(PRICE_DECIMALS);

/**
 * Compute floor(a * b / d) for non-negative operands.
 *
 * @throws Error if d is zero or any operand is negative.
 */
export function mulDiv(a: bigint, b: bigint, d: bigint): bigint {
  if (d === 0n) {
    throw new Error('mulDiv: division by zero');
  }
  if (a < 0n || b < 0n || d < 0n) {
    throw new Error('mulDiv: operands must be non-negative');
  }
  return (a * b) / d;
}

/**
 * Rescale an integer with `fromDecimals` fraction digits to `toDecimals`.
 * Scaling down truncates.
 */
export function rescale(value: bigint, fromDecimals: number, toDecimals: number): bigint {
  if (fromDecimals === toDecimals) return value;
  if (fromDecimals < toDecimals) {
    return value * 10n ** BigInt(toDecimals - fromDecimals);
  }
  return value / 10n ** BigInt(fromDecimals - toDecimals);
}

/** Sum a list of bigints. */
export function sumAmounts(values: Iterable<bigint>): bigint {
  let total = 0n;
  for (const v of values) total += v;
  return total;
}
