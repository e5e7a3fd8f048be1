/**
 * ChainlinkPriceOracle: IPriceOracle backed by an AggregatorV3 feed, read via viem 2.x.
 *
 * Design decisions:
 * - decimals() is read once and cached; feeds never change their scale.
 * - The answer is rescaled from the feed's decimals to PRICE_DECIMALS (18).
 * - A round older than maxStaleness seconds, or one answered in an earlier
 *   round, counts as "no price available".
 */

import { createPublicClient, http, type Chain, type PublicClient } from 'viem';
import {
  PRICE_DECIMALS,
  ReserveMintError,
  rescale,
  type Address,
  type IPriceOracle,
} from '@reservemint/core';
import { AGGREGATOR_V3_ABI } from './abi/aggregator-v3.js';

export interface ChainlinkPriceOracleOptions {
  rpcUrl: string;
  /** Aggregator (feed proxy) contract address. */
  feed: Address;
  /** Max age of the latest round in seconds; 0 disables the check. Default 3600. */
  maxStaleness?: number;
  chain?: Chain;
  /** Clock in unix seconds (tests). */
  now?: () => number;
}

export class ChainlinkPriceOracle implements IPriceOracle {
  readonly feed: Address;
  private readonly client: PublicClient;
  private readonly maxStaleness: number;
  private readonly now: () => number;
  private feedDecimals: number | null = null;

  constructor(options: ChainlinkPriceOracleOptions) {
    this.feed = options.feed;
    this.client = createPublicClient({
      transport: http(options.rpcUrl),
      chain: options.chain,
    });
    this.maxStaleness = options.maxStaleness ?? 3600;
    this.now = options.now ?? (() => Math.floor(Date.now() / 1000));
  }

  /**
   * @throws ReserveMintError ORACLE_UNAVAILABLE on RPC failure or a stale round
   * @throws ReserveMintError INVALID_PRICE if the feed answers zero or less
   */
  async getPrice(): Promise<bigint> {
    let decimals: number;
    let round: readonly [bigint, bigint, bigint, bigint, bigint];
    try {
      decimals = await this.readDecimals();
      round = await this.client.readContract({
        address: this.feed,
        abi: AGGREGATOR_V3_ABI,
        functionName: 'latestRoundData',
      });
    } catch (err) {
      throw new ReserveMintError('ORACLE_UNAVAILABLE', {
        message: `Chainlink feed ${this.feed} unreachable: ${err instanceof Error ? err.message : String(err)}`,
        cause: err,
      });
    }

    const [roundId, answer, , updatedAt, answeredInRound] = round;

    if (answer <= 0n) {
      throw new ReserveMintError('INVALID_PRICE', {
        details: { feed: this.feed, answer: answer.toString() },
      });
    }
    if (answeredInRound < roundId) {
      throw new ReserveMintError('ORACLE_UNAVAILABLE', {
        message: `Chainlink feed ${this.feed} round ${roundId} carries a stale answer`,
        details: { roundId: roundId.toString(), answeredInRound: answeredInRound.toString() },
      });
    }
    if (this.maxStaleness > 0) {
      const age = this.now() - Number(updatedAt);
      if (age > this.maxStaleness) {
        throw new ReserveMintError('ORACLE_UNAVAILABLE', {
          message: `Chainlink feed ${this.feed} last updated ${age}s ago`,
          details: { updatedAt: Number(updatedAt), maxStaleness: this.maxStaleness },
        });
      }
    }

    return rescale(answer, decimals, PRICE_DECIMALS);
  }

  private async readDecimals(): Promise<number> {
    if (this.feedDecimals === null) {
      this.feedDecimals = await this.client.readContract({
        address: this.feed,
        abi: AGGREGATOR_V3_ABI,
        functionName: 'decimals',
      });
    }
    return this.feedDecimals;
  }
}
