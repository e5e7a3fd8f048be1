import type { IPriceOracle } from '../interfaces/IPriceOracle.js';
import { PRICE_SCALE } from '../utils/fixed-point.js';

/** Settable oracle stub. Defaults to a price of 1 (PRICE_SCALE). */
export class FixedPriceOracle implements IPriceOracle {
  private unavailable: Error | null = null;

  constructor(private price: bigint = PRICE_SCALE) {}

  setPrice(price: bigint): void {
    this.price = price;
  }

  setUnavailable(error: Error | null): void {
    this.unavailable = error;
  }

  async getPrice(): Promise<bigint> {
    if (this.unavailable) throw this.unavailable;
    return this.price;
  }
}
