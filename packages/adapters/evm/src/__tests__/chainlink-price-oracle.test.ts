/**
 * ChainlinkPriceOracle unit tests with viem mocking.
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { PRICE_SCALE, isReserveMintError } from '@reservemint/core';
import { ChainlinkPriceOracle } from '../chainlink-price-oracle.js';

// ---- viem mock setup ----

const mockClient = {
  readContract: vi.fn<(args: { functionName: string }) => Promise<unknown>>(),
};

vi.mock('viem', async () => {
  const actual = await vi.importActual<typeof import('viem')>('viem');
  return {
    ...actual,
    createPublicClient: vi.fn(() => mockClient),
  };
});

// ---- Helpers ----

const FEED = '0x5f4eC3Df9cbd43714FE2740f5E3616155c5b8419';
const NOW = 1_700_000_000;

function mockFeed(opts: {
  decimals?: number;
  answer?: bigint;
  updatedAt?: number;
  roundId?: bigint;
  answeredInRound?: bigint;
}): void {
  mockClient.readContract.mockImplementation(async ({ functionName }: { functionName: string }) => {
    if (functionName === 'decimals') return opts.decimals ?? 8;
    return [
      opts.roundId ?? 10n,
      opts.answer ?? 200_000_000n,
      0n,
      BigInt(opts.updatedAt ?? NOW - 60),
      opts.answeredInRound ?? 10n,
    ] as const;
  });
}

function createOracle(maxStaleness = 3600): ChainlinkPriceOracle {
  return new ChainlinkPriceOracle({
    rpcUrl: 'http://127.0.0.1:8545',
    feed: FEED,
    maxStaleness,
    now: () => NOW,
  });
}

// ---- Tests ----

describe('ChainlinkPriceOracle', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('rescales an 8-decimal answer to 18 decimals', async () => {
    mockFeed({ decimals: 8, answer: 200_000_000n });
    await expect(createOracle().getPrice()).resolves.toBe(2n * PRICE_SCALE);
  });

  it('truncates when the feed has more than 18 decimals', async () => {
    mockFeed({ decimals: 20, answer: 123n });
    await expect(createOracle().getPrice()).resolves.toBe(1n);
  });

  it('reads decimals only once', async () => {
    mockFeed({});
    const oracle = createOracle();
    await oracle.getPrice();
    await oracle.getPrice();

    const decimalsCalls = mockClient.readContract.mock.calls.filter(
      ([args]: [{ functionName: string }]) => args.functionName === 'decimals',
    );
    expect(decimalsCalls).toHaveLength(1);
  });

  it('rejects a non-positive answer with INVALID_PRICE', async () => {
    mockFeed({ answer: 0n });
    const err = await createOracle().getPrice().catch((e: unknown) => e);
    expect(isReserveMintError(err, 'INVALID_PRICE')).toBe(true);
  });

  it('wraps RPC failures as ORACLE_UNAVAILABLE', async () => {
    mockClient.readContract.mockRejectedValue(new Error('connection refused'));
    const err = await createOracle().getPrice().catch((e: unknown) => e);
    expect(isReserveMintError(err, 'ORACLE_UNAVAILABLE')).toBe(true);
    expect(err instanceof Error && err.message).toBe(
      `Chainlink feed ${FEED} unreachable: connection refused`,
    );
  });

  it('rejects a round older than maxStaleness', async () => {
    mockFeed({ updatedAt: NOW - 3601 });
    const err = await createOracle().getPrice().catch((e: unknown) => e);
    expect(isReserveMintError(err, 'ORACLE_UNAVAILABLE')).toBe(true);
  });

  it('accepts any age when maxStaleness is 0', async () => {
    mockFeed({ updatedAt: 1 });
    await expect(createOracle(0).getPrice()).resolves.toBe(2n * PRICE_SCALE);
  });

  it('rejects an answer carried over from an earlier round', async () => {
    mockFeed({ roundId: 11n, answeredInRound: 10n });
    const err = await createOracle().getPrice().catch((e: unknown) => e);
    expect(isReserveMintError(err, 'ORACLE_UNAVAILABLE')).toBe(true);
  });
});
