/**
 * PricingEngine - turns an oracle price into buy/redeem execution prices and fees.
 *
 *   buy:    execPrice = base + base * buySpread / P
 *   redeem: execPrice = base - base * redeemSpread / P
 *
 * P = PRICE_SCALE (10^18). All math is bigint, multiply before divide.
 * One engine is built per settlement call from a config snapshot, so a call
 * never mixes parameters from two configurations.
 */

import {
  PRICE_SCALE,
  ReserveMintError,
  formatAmount,
  mulDiv,
  type PricingParameters,
} from '@reservemint/core';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface Quote {
  execPrice: bigint;
  fee: bigint;
}

export interface BuyPreview extends Quote {
  basePrice: bigint;
  reserveAmount: bigint;
  netAmount: bigint;
  tokenAmount: bigint;
}

export interface RedeemPreview extends Quote {
  basePrice: bigint;
  tokenAmount: bigint;
  grossAmount: bigint;
  netAmount: bigint;
}

// ---------------------------------------------------------------------------
// PricingEngine
// ---------------------------------------------------------------------------

export class PricingEngine {
  constructor(private readonly params: PricingParameters) {}

  /**
   * @throws ReserveMintError INVALID_PRICE if basePrice <= 0
   */
  buyQuote(basePrice: bigint): Quote {
    assertPositivePrice(basePrice);
    const execPrice = basePrice + mulDiv(basePrice, this.params.buySpread, PRICE_SCALE);
    return { execPrice, fee: this.params.buyFee };
  }

  /**
   * @throws ReserveMintError INVALID_PRICE if basePrice <= 0
   * @throws ReserveMintError INVALID_SPREAD if redeemSpread >= 100% or the result is not positive
   */
  redeemQuote(basePrice: bigint): Quote {
    assertPositivePrice(basePrice);
    if (this.params.redeemSpread >= PRICE_SCALE) {
      throw new ReserveMintError('INVALID_SPREAD', {
        message: `redeemSpread ${formatAmount(this.params.redeemSpread)} is 100% or more`,
        details: { redeemSpread: this.params.redeemSpread.toString() },
      });
    }
    const execPrice = basePrice - mulDiv(basePrice, this.params.redeemSpread, PRICE_SCALE);
    if (execPrice <= 0n) {
      throw new ReserveMintError('INVALID_SPREAD', {
        details: { basePrice: basePrice.toString(), execPrice: execPrice.toString() },
      });
    }
    return { execPrice, fee: this.params.redeemFee };
  }

  /**
   * Full buy computation: netAmount = reserveAmount - fee,
   * tokenAmount = netAmount * P / execPrice.
   *
   * @throws ReserveMintError INVALID_AMOUNT if reserveAmount is 0
   * @throws ReserveMintError AMOUNT_TOO_SMALL if reserveAmount <= fee or no token would be minted
   */
  quoteBuy(reserveAmount: bigint, basePrice: bigint): BuyPreview {
    if (reserveAmount <= 0n) {
      throw new ReserveMintError('INVALID_AMOUNT');
    }
    const { execPrice, fee } = this.buyQuote(basePrice);
    if (reserveAmount <= fee) {
      throw new ReserveMintError('AMOUNT_TOO_SMALL', {
        details: { amount: reserveAmount.toString(), fee: fee.toString() },
      });
    }
    const netAmount = reserveAmount - fee;
    const tokenAmount = mulDiv(netAmount, PRICE_SCALE, execPrice);
    if (tokenAmount === 0n) {
      throw new ReserveMintError('AMOUNT_TOO_SMALL', {
        message: 'Amount buys zero tokens at the current price',
        details: { netAmount: netAmount.toString(), execPrice: execPrice.toString() },
      });
    }
    return { basePrice, execPrice, fee, reserveAmount, netAmount, tokenAmount };
  }

  /**
   * Full redeem computation: grossAmount = tokenAmount * execPrice / P,
   * netAmount = grossAmount - fee.
   *
   * @throws ReserveMintError INVALID_AMOUNT if tokenAmount is 0
   * @throws ReserveMintError AMOUNT_TOO_SMALL if grossAmount <= fee
   */
  quoteRedeem(tokenAmount: bigint, basePrice: bigint): RedeemPreview {
    if (tokenAmount <= 0n) {
      throw new ReserveMintError('INVALID_AMOUNT');
    }
    const { execPrice, fee } = this.redeemQuote(basePrice);
    const grossAmount = mulDiv(tokenAmount, execPrice, PRICE_SCALE);
    if (grossAmount <= fee) {
      throw new ReserveMintError('AMOUNT_TOO_SMALL', {
        details: { grossAmount: grossAmount.toString(), fee: fee.toString() },
      });
    }
    return { basePrice, execPrice, fee, tokenAmount, grossAmount, netAmount: grossAmount - fee };
  }
}

function assertPositivePrice(price: bigint): void {
  if (price <= 0n) {
    throw new ReserveMintError('INVALID_PRICE', {
      details: { price: price.toString() },
    });
  }
}
