/**
 * Settlement record wire format (v1), delivered through IBridgeGateway.sendMessage.
 *
 *   offset  size  field
 *   0       1     action tag (BUY=0, REDEEM=1)
 *   1       20    participant address
 *   21      32    amount, big-endian uint256
 *
 * Off-chain consumers depend on field order and widths; any layout change
 * needs a new version.
 */

import { encodePacked, getAddress, hexToBigInt, hexToNumber, isHex, size, slice } from 'viem';
import {
  ReserveMintError,
  SETTLEMENT_ACTIONS,
  SETTLEMENT_ACTION_TAGS,
  isAddress,
  type Hex,
  type SettlementRecord,
} from '@reservemint/core';

export const SETTLEMENT_RECORD_VERSION = 1;
export const SETTLEMENT_RECORD_BYTES = 53;

const MAX_UINT256 = 2n ** 256n - 1n;

export function encodeSettlementRecord(record: SettlementRecord): Hex {
  if (!isAddress(record.participant)) {
    throw new ReserveMintError('INVALID_ADDRESS', { details: { participant: record.participant } });
  }
  if (record.amount < 0n || record.amount > MAX_UINT256) {
    throw new ReserveMintError('INVALID_AMOUNT', {
      message: 'Settlement amount does not fit in uint256',
      details: { amount: record.amount.toString() },
    });
  }
  return encodePacked(
    ['uint8', 'address', 'uint256'],
    [SETTLEMENT_ACTION_TAGS[record.action], record.participant, record.amount],
  );
}

/**
 * @throws ReserveMintError INVALID_RECORD on wrong length or unknown action tag
 */
export function decodeSettlementRecord(payload: Hex): SettlementRecord {
  const wellFormed =
    isHex(payload, { strict: true }) &&
    payload.length % 2 === 0 &&
    size(payload) === SETTLEMENT_RECORD_BYTES;
  if (!wellFormed) {
    throw new ReserveMintError('INVALID_RECORD', {
      message: `Settlement record must be ${SETTLEMENT_RECORD_BYTES} bytes`,
      details: { payload },
    });
  }
  const tag = hexToNumber(slice(payload, 0, 1));
  const action = SETTLEMENT_ACTIONS.find((a) => SETTLEMENT_ACTION_TAGS[a] === tag);
  if (!action) {
    throw new ReserveMintError('INVALID_RECORD', {
      message: `Unknown settlement action tag ${tag}`,
      details: { tag },
    });
  }
  return {
    action,
    participant: getAddress(slice(payload, 1, 21)),
    amount: hexToBigInt(slice(payload, 21, SETTLEMENT_RECORD_BYTES)),
  };
}
