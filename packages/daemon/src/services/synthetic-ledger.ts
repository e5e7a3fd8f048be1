/**
 * In-memory synthetic token ledger.
 *
 * Default ISyntheticLedger for the engine when no external token is wired.
 * Keeps sum(balances) == minted - burned == totalSupply().
 */

import {
  ReserveMintError,
  addressKey,
  isAddress,
  type Address,
  type ISyntheticLedger,
} from '@reservemint/core';

export class InMemorySyntheticLedger implements ISyntheticLedger {
  private readonly balances = new Map<string, bigint>();
  private supply = 0n;

  async mint(to: Address, amount: bigint): Promise<void> {
    assertAccount(to);
    assertPositive(amount);
    this.credit(to, amount);
    this.supply += amount;
  }

  async burn(from: Address, amount: bigint): Promise<void> {
    assertAccount(from);
    assertPositive(amount);
    this.debit(from, amount);
    this.supply -= amount;
  }

  async transfer(from: Address, to: Address, amount: bigint): Promise<void> {
    assertAccount(from);
    assertAccount(to);
    assertPositive(amount);
    this.debit(from, amount);
    this.credit(to, amount);
  }

  async balanceOf(account: Address): Promise<bigint> {
    return this.balances.get(addressKey(account)) ?? 0n;
  }

  async totalSupply(): Promise<bigint> {
    return this.supply;
  }

  private credit(to: Address, amount: bigint): void {
    const key = addressKey(to);
    this.balances.set(key, (this.balances.get(key) ?? 0n) + amount);
  }

  private debit(from: Address, amount: bigint): void {
    const key = addressKey(from);
    const balance = this.balances.get(key) ?? 0n;
    if (balance < amount) {
      throw new ReserveMintError('INSUFFICIENT_TOKEN_BALANCE', {
        details: { account: from, balance: balance.toString(), amount: amount.toString() },
      });
    }
    if (balance === amount) {
      this.balances.delete(key);
    } else {
      this.balances.set(key, balance - amount);
    }
  }
}

function assertAccount(account: string): void {
  if (!isAddress(account)) {
    throw new ReserveMintError('INVALID_ADDRESS', { details: { account } });
  }
}

function assertPositive(amount: bigint): void {
  if (amount <= 0n) {
    throw new ReserveMintError('INVALID_AMOUNT', { details: { amount: amount.toString() } });
  }
}
