/**
 * LiquidityController - keeps a local reserve buffer and forwards the excess
 * to the bridge.
 *
 * Forwarding is approve-then-send. If the bridge rejects, the bridge's
 * allowance is restored to its value before the attempt, and only then is
 * the failure surfaced. No authorization granted for a failed forward
 * survives it.
 */

import {
  ReserveMintError,
  type Address,
  type IBridgeGateway,
  type IReserveToken,
  type LiquidityPolicy,
} from '@reservemint/core';

export interface ForwardInstruction {
  amount: bigint;
}

export interface ForwardResult {
  amount: bigint;
  /** false when the bridge allowance could not be put back to its prior value. */
  allowanceRestored: boolean;
}

export interface ForwardTargets {
  token: IReserveToken;
  bridge: IBridgeGateway;
  /** Account holding the buffer; grants the allowance. */
  custody: Address;
}

export class LiquidityController {
  /**
   * Forward `localBalance - bufferThreshold` iff
   * `localBalance > bufferThreshold + minBridgeAmount`.
   * Call with the balance left after queue draining.
   */
  static evaluateForwarding(localBalance: bigint, policy: LiquidityPolicy): ForwardInstruction | null {
    if (localBalance > policy.bufferThreshold + policy.minBridgeAmount) {
      return { amount: localBalance - policy.bufferThreshold };
    }
    return null;
  }

  async forward(instruction: ForwardInstruction, targets: ForwardTargets): Promise<ForwardResult> {
    const { token, bridge, custody } = targets;
    if (instruction.amount <= 0n) {
      throw new ReserveMintError('INVALID_AMOUNT', {
        details: { amount: instruction.amount.toString() },
      });
    }

    const previous = await token.allowance(custody, bridge.address);

    try {
      await token.approve(custody, bridge.address, instruction.amount);
      await bridge.sendStable({ asset: token.address, from: custody, amount: instruction.amount });
    } catch (err) {
      const details: Record<string, unknown> = { amount: instruction.amount.toString() };
      try {
        await token.approve(custody, bridge.address, previous);
      } catch (revokeErr) {
        console.error(
          `LiquidityController: failed to restore bridge allowance to ${previous}:`,
          revokeErr,
        );
        details['allowanceRestored'] = false;
      }
      throw new ReserveMintError('BRIDGE_TRANSFER_FAILED', {
        message: `Bridge transfer failed: ${err instanceof Error ? err.message : String(err)}`,
        details,
        cause: err,
      });
    }

    console.log(`LiquidityController: forwarded ${instruction.amount} to bridge ${bridge.address}`);

    // A bridge that pulled less than approved must not keep the remainder.
    // The funds have moved either way, so a failed reset is reported, not thrown.
    let allowanceRestored = true;
    const residual = await token.allowance(custody, bridge.address);
    if (residual !== previous) {
      console.warn(
        `LiquidityController: bridge left allowance ${residual}, resetting to ${previous}`,
      );
      try {
        await token.approve(custody, bridge.address, previous);
      } catch (resetErr) {
        console.error(
          `LiquidityController: failed to restore bridge allowance to ${previous}:`,
          resetErr,
        );
        allowanceRestored = false;
      }
    }
    return { amount: instruction.amount, allowanceRestored };
  }
}
