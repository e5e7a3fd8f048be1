import type { Address } from '../utils/address.js';

/**
 * Synthetic token balance ledger.
 *
 * Invariant: sum of balances == total minted - total burned == totalSupply().
 * burn rejects with INSUFFICIENT_TOKEN_BALANCE and leaves state untouched when
 * the holder has less than `amount`.
 */
export interface ISyntheticLedger {
  mint(to: Address, amount: bigint): Promise<void>;

  burn(from: Address, amount: bigint): Promise<void>;

  transfer(from: Address, to: Address, amount: bigint): Promise<void>;

  balanceOf(account: Address): Promise<bigint>;

  totalSupply(): Promise<bigint>;
}
