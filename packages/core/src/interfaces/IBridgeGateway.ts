import type { Address, Hex } from '../utils/address.js';

export interface SendStableParams {
  /** Reserve asset being moved. */
  asset: Address;
  /** Account that granted the bridge an allowance for `amount`. */
  from: Address;
  amount: bigint;
}

/**
 * External settlement bridge to another execution domain.
 *
 * sendStable is atomic: either the transfer happens and the allowance is
 * consumed, or neither. sendMessage is fire-and-forget; its delivery is the
 * bridge's concern.
 */
export interface IBridgeGateway {
  /** Account the reserve asset is authorized to (the spender). */
  readonly address: Address;

  sendStable(params: SendStableParams): Promise<void>;

  sendMessage(payload: Hex): Promise<void>;
}
