/**
 * IssuerConfigAuthority: owner-only setters, validation, frozen snapshots.
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { EventBus, PRICE_SCALE, ZERO_ADDRESS } from '@reservemint/core';
import {
  FixedPriceOracle,
  InMemoryReserveToken,
  MockBridgeGateway,
  testAddress,
} from '@reservemint/core/testing';
import { IssuerConfigAuthority } from '../services/issuer-config-authority.js';

const OWNER = testAddress(0x01);
const OPERATOR = testAddress(0x02);
const STRANGER = testAddress(0x99);

let eventBus: EventBus;
let authority: IssuerConfigAuthority;

function build(): IssuerConfigAuthority {
  return new IssuerConfigAuthority({
    owner: OWNER,
    operator: OPERATOR,
    feeCollector: testAddress(0xfe),
    maxBatch: 10,
    autoSettle: true,
    pricing: { buySpread: 0n, redeemSpread: 0n, buyFee: 0n, redeemFee: 0n },
    liquidity: { bufferThreshold: 0n, minBridgeAmount: 0n },
    oracle: new FixedPriceOracle(),
    bridge: new MockBridgeGateway(new InMemoryReserveToken()),
    eventBus,
  });
}

beforeEach(() => {
  eventBus = new EventBus();
  authority = build();
});

describe('IssuerConfigAuthority', () => {
  it('lets the owner change a field and emits config:changed', () => {
    const listener = vi.fn();
    eventBus.on('config:changed', listener);

    authority.setBufferThreshold(OWNER, 500n);

    expect(authority.snapshot().liquidity.bufferThreshold).toBe(500n);
    expect(listener).toHaveBeenCalledWith(
      expect.objectContaining({ field: 'liquidity', changedBy: OWNER }),
    );
  });

  it('rejects non-owners before looking at the value', () => {
    expect(() => authority.setMaxBatch(OPERATOR, 0)).toThrow(
      expect.objectContaining({ code: 'UNAUTHORIZED' }),
    );
    expect(() => authority.setPricing(STRANGER, {
      buySpread: 0n,
      redeemSpread: PRICE_SCALE,
      buyFee: 0n,
      redeemFee: 0n,
    })).toThrow(expect.objectContaining({ code: 'UNAUTHORIZED' }));
  });

  it('rejects a redeem spread of 100% with INVALID_SPREAD', () => {
    expect(() =>
      authority.setPricing(OWNER, {
        buySpread: 0n,
        redeemSpread: PRICE_SCALE,
        buyFee: 0n,
        redeemFee: 0n,
      }),
    ).toThrow(expect.objectContaining({ code: 'INVALID_SPREAD' }));
    expect(authority.snapshot().pricing.redeemSpread).toBe(0n);
  });

  it('rejects the zero address for accounts', () => {
    expect(() => authority.setFeeCollector(OWNER, ZERO_ADDRESS)).toThrow(
      expect.objectContaining({ code: 'INVALID_ADDRESS' }),
    );
  });

  it('rejects a batch size below 1', () => {
    expect(() => authority.setMaxBatch(OWNER, 0)).toThrow(
      expect.objectContaining({ code: 'INVALID_BATCH_SIZE' }),
    );
  });

  it('hands out frozen snapshots that later updates do not touch', () => {
    const before = authority.snapshot();
    authority.setMaxBatch(OWNER, 3);
    const after = authority.snapshot();

    expect(Object.isFrozen(before)).toBe(true);
    expect(Object.isFrozen(before.pricing)).toBe(true);
    expect(before.maxBatch).toBe(10);
    expect(after.maxBatch).toBe(3);
    expect(authority.snapshot()).toBe(after);
  });

  it('moves the operator role', () => {
    authority.setOperator(OWNER, STRANGER);
    expect(authority.isOperator(STRANGER)).toBe(true);
    expect(authority.isOperator(OPERATOR)).toBe(false);
    expect(() => authority.assertOwnerOrOperator(OPERATOR, 'settle')).toThrow(
      expect.objectContaining({ code: 'UNAUTHORIZED' }),
    );
  });

  it('compares callers case-insensitively', () => {
    const mixed = '0x00000000000000000000000000000000000000AB';
    authority.setOperator(OWNER, mixed);
    expect(authority.isOperator(testAddress(0xab))).toBe(true);
  });
});
