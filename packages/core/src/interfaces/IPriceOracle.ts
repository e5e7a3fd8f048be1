/**
 * Price oracle contract consumed by the pricing engine.
 *
 * Returns the reserve-per-token ratio as a fixed-point integer scaled by
 * PRICE_SCALE (10^18). Implementations reject when no price is available;
 * the engine separately rejects any non-positive value.
 */
export interface IPriceOracle {
  getPrice(): Promise<bigint>;
}
