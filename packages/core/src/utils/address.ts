/** 20-byte account identifier as 0x-prefixed hex. */
export type Address = `0x${string}`;

/** Arbitrary hex payload (0x-prefixed). */
export type Hex = `0x${string}`;

export const ZERO_ADDRESS: Address = '0x0000000000000000000000000000000000000000';

const ADDRESS_PATTERN = /^0x[0-9a-fA-F]{40}$/;

export function isAddress(value: unknown): value is Address {
  return typeof value === 'string' && ADDRESS_PATTERN.test(value);
}

export function isZeroAddress(value: string): boolean {
  return value.toLowerCase() === ZERO_ADDRESS;
}

/** Case-insensitive address comparison (checksummed and lowercase forms are equal). */
export function sameAddress(a: string, b: string): boolean {
  return a.toLowerCase() === b.toLowerCase();
}

/** Map key for an address, independent of checksum casing. */
export function addressKey(value: string): string {
  return value.toLowerCase();
}
