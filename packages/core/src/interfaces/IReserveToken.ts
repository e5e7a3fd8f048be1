import type { Address } from '../utils/address.js';

/**
 * Reserve asset ledger (fungible-token semantics).
 *
 * transfer moves funds owned by `from`; transferFrom spends an allowance the
 * owner `from` granted to `spender`. Every method either fully applies or
 * rejects.
 */
export interface IReserveToken {
  readonly address: Address;

  balanceOf(account: Address): Promise<bigint>;

  transfer(from: Address, to: Address, amount: bigint): Promise<void>;

  transferFrom(spender: Address, from: Address, to: Address, amount: bigint): Promise<void>;

  approve(owner: Address, spender: Address, amount: bigint): Promise<void>;

  allowance(owner: Address, spender: Address): Promise<bigint>;
}
