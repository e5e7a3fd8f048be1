/**
 * Settlement record codec: byte layout and malformed-payload rejection.
 */

import { describe, it, expect } from 'vitest';
import { size } from 'viem';
import { testAddress } from '@reservemint/core/testing';
import {
  SETTLEMENT_RECORD_BYTES,
  decodeSettlementRecord,
  encodeSettlementRecord,
} from '../workflow/settlement-record.js';

const PARTICIPANT = testAddress(0x11);

describe('encodeSettlementRecord', () => {
  it('packs tag, address and uint256 amount into 53 bytes', () => {
    const payload = encodeSettlementRecord({ action: 'REDEEM', participant: PARTICIPANT, amount: 255n });

    expect(size(payload)).toBe(SETTLEMENT_RECORD_BYTES);
    expect(payload).toBe(
      '0x01' + '0000000000000000000000000000000000000011' + '00'.repeat(31) + 'ff',
    );
  });

  it('uses tag 0 for BUY', () => {
    const payload = encodeSettlementRecord({ action: 'BUY', participant: PARTICIPANT, amount: 1n });
    expect(payload.slice(0, 4)).toBe('0x00');
  });

  it('rejects an amount above uint256', () => {
    expect(() =>
      encodeSettlementRecord({ action: 'BUY', participant: PARTICIPANT, amount: 2n ** 256n }),
    ).toThrow(expect.objectContaining({ code: 'INVALID_AMOUNT' }));
  });

  it('rejects a malformed participant', () => {
    expect(() => encodeSettlementRecord({ action: 'BUY', participant: '0x12', amount: 1n })).toThrow(
      expect.objectContaining({ code: 'INVALID_ADDRESS' }),
    );
  });
});

describe('decodeSettlementRecord', () => {
  it('reads back what was encoded, with a checksummed address', () => {
    const participant = '0xabcdefabcdefabcdefabcdefabcdefabcdefabcd';
    const amount = 2n ** 255n + 1n;
    const decoded = decodeSettlementRecord(
      encodeSettlementRecord({ action: 'BUY', participant, amount }),
    );

    expect(decoded.action).toBe('BUY');
    expect(decoded.participant.toLowerCase()).toBe(participant);
    expect(decoded.participant).not.toBe(participant);
    expect(decoded.amount).toBe(amount);
  });

  it('rejects a payload of the wrong length', () => {
    expect(() => decodeSettlementRecord('0x0011')).toThrow(
      expect.objectContaining({ code: 'INVALID_RECORD' }),
    );
  });

  it('rejects an odd-length payload', () => {
    const good = encodeSettlementRecord({ action: 'BUY', participant: PARTICIPANT, amount: 1n });
    expect(() => decodeSettlementRecord(`${good}0`)).toThrow(
      expect.objectContaining({ code: 'INVALID_RECORD' }),
    );
  });

  it('rejects an unknown action tag', () => {
    const good = encodeSettlementRecord({ action: 'BUY', participant: PARTICIPANT, amount: 1n });
    expect(() => decodeSettlementRecord(`0x07${good.slice(4)}`)).toThrow(
      expect.objectContaining({ code: 'INVALID_RECORD', message: 'Unknown settlement action tag 7' }),
    );
  });
});
