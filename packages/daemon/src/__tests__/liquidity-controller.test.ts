/**
 * LiquidityController tests: forwarding rule and approve-then-revoke atomicity.
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import type { IBridgeGateway } from '@reservemint/core';
import { InMemoryReserveToken, MockBridgeGateway, testAddress } from '@reservemint/core/testing';
import { LiquidityController } from '../services/liquidity-controller.js';

const CUSTODY = testAddress(0xc0);

describe('LiquidityController.evaluateForwarding', () => {
  const policy = { bufferThreshold: 40n, minBridgeAmount: 30n };

  it('forwards balance minus threshold when the margin is exceeded', () => {
    expect(LiquidityController.evaluateForwarding(80n, policy)).toEqual({ amount: 40n });
  });

  it('does nothing at exactly threshold + minBridgeAmount', () => {
    expect(LiquidityController.evaluateForwarding(70n, policy)).toBeNull();
  });

  it('does nothing below the threshold', () => {
    expect(LiquidityController.evaluateForwarding(10n, policy)).toBeNull();
  });

  it('forwards any excess with a zero minimum', () => {
    expect(
      LiquidityController.evaluateForwarding(51n, { bufferThreshold: 50n, minBridgeAmount: 0n }),
    ).toEqual({ amount: 1n });
  });
});

describe('LiquidityController.forward', () => {
  let token: InMemoryReserveToken;
  let bridge: MockBridgeGateway;
  const controller = new LiquidityController();

  beforeEach(() => {
    token = new InMemoryReserveToken();
    bridge = new MockBridgeGateway(token);
    token.mint(CUSTODY, 100n);
  });

  it('moves the amount to the bridge and leaves no allowance', async () => {
    const result = await controller.forward({ amount: 60n }, { token, bridge, custody: CUSTODY });

    expect(result).toEqual({ amount: 60n, allowanceRestored: true });
    expect(await token.balanceOf(CUSTODY)).toBe(40n);
    expect(await token.balanceOf(bridge.address)).toBe(60n);
    expect(await token.allowance(CUSTODY, bridge.address)).toBe(0n);
    expect(bridge.transfers).toEqual([{ asset: token.address, from: CUSTODY, amount: 60n }]);
  });

  it('revokes the allowance and raises BRIDGE_TRANSFER_FAILED when the bridge rejects', async () => {
    bridge.setFailSends(true);

    await expect(
      controller.forward({ amount: 60n }, { token, bridge, custody: CUSTODY }),
    ).rejects.toMatchObject({
      code: 'BRIDGE_TRANSFER_FAILED',
      message: 'Bridge transfer failed: bridge: sendStable rejected',
    });
    expect(await token.allowance(CUSTODY, bridge.address)).toBe(0n);
    expect(await token.balanceOf(CUSTODY)).toBe(100n);
  });

  it('restores a pre-existing allowance instead of zeroing it', async () => {
    await token.approve(CUSTODY, bridge.address, 7n);
    bridge.setFailSends(true);

    await expect(
      controller.forward({ amount: 60n }, { token, bridge, custody: CUSTODY }),
    ).rejects.toMatchObject({ code: 'BRIDGE_TRANSFER_FAILED' });
    expect(await token.allowance(CUSTODY, bridge.address)).toBe(7n);
  });

  it('resets an allowance the bridge did not fully consume', async () => {
    const lazyBridge: IBridgeGateway = {
      address: testAddress(0xb0),
      sendStable: async ({ from, amount }) => {
        await token.transferFrom(testAddress(0xb0), from, testAddress(0xb0), amount / 2n);
      },
      sendMessage: async () => undefined,
    };
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);

    await controller.forward({ amount: 60n }, { token, bridge: lazyBridge, custody: CUSTODY });

    expect(await token.allowance(CUSTODY, lazyBridge.address)).toBe(0n);
    expect(warn).toHaveBeenCalledWith(
      `LiquidityController: bridge left allowance 30, resetting to 0`,
    );
    warn.mockRestore();
  });

  it('reports a failed allowance reset after the funds already moved', async () => {
    const lazyBridge: IBridgeGateway = {
      address: testAddress(0xb0),
      sendStable: async ({ from, amount }) => {
        await token.transferFrom(testAddress(0xb0), from, testAddress(0xb0), amount / 2n);
      },
      sendMessage: async () => undefined,
    };
    const approve = token.approve.bind(token);
    vi.spyOn(token, 'approve')
      .mockImplementationOnce(approve)
      .mockRejectedValueOnce(new Error('approve reverted'));
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);

    const result = await controller.forward(
      { amount: 60n },
      { token, bridge: lazyBridge, custody: CUSTODY },
    );

    expect(result).toEqual({ amount: 60n, allowanceRestored: false });
    expect(await token.balanceOf(lazyBridge.address)).toBe(30n);
    expect(await token.allowance(CUSTODY, lazyBridge.address)).toBe(30n);
    expect(error).toHaveBeenCalledTimes(1);
    warn.mockRestore();
    error.mockRestore();
  });

  it('rejects a non-positive amount', async () => {
    await expect(
      controller.forward({ amount: 0n }, { token, bridge, custody: CUSTODY }),
    ).rejects.toMatchObject({ code: 'INVALID_AMOUNT' });
  });
});
