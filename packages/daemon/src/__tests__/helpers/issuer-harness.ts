/**
 * Shared wiring for settlement tests: in-process reserve token, bridge,
 * oracle and synthetic ledger around one SettlementOrchestrator.
 */

import {
  EventBus,
  PRICE_SCALE,
  type Address,
  type IRedemptionQueueStore,
  type IssuerEventMap,
  type LiquidityPolicy,
  type PricingParameters,
} from '@reservemint/core';
import {
  FixedPriceOracle,
  InMemoryReserveToken,
  MockBridgeGateway,
  testAddress,
} from '@reservemint/core/testing';
import { IndexedQueueStore } from '../../infrastructure/queue-store/index.js';
import { IssuerConfigAuthority } from '../../services/issuer-config-authority.js';
import { InMemorySyntheticLedger } from '../../services/synthetic-ledger.js';
import type { ISettlementJournal } from '../../services/settlement-journal.js';
import { RedemptionQueue } from '../../workflow/redemption-queue.js';
import { SettlementOrchestrator } from '../../workflow/settlement-orchestrator.js';

export const OWNER = testAddress(0x01);
export const OPERATOR = testAddress(0x02);
export const CUSTODY = testAddress(0xc0);
export const FEES = testAddress(0xfe);
export const ALICE = testAddress(0x11);
export const BOB = testAddress(0x12);

export interface HarnessOptions {
  price?: bigint;
  pricing?: Partial<PricingParameters>;
  liquidity?: Partial<LiquidityPolicy>;
  maxBatch?: number;
  autoSettle?: boolean;
  store?: IRedemptionQueueStore;
  journal?: ISettlementJournal;
}

export interface Harness {
  reserve: InMemoryReserveToken;
  bridge: MockBridgeGateway;
  oracle: FixedPriceOracle;
  ledger: InMemorySyntheticLedger;
  eventBus: EventBus;
  authority: IssuerConfigAuthority;
  queue: RedemptionQueue;
  orchestrator: SettlementOrchestrator;
  /** Give `account` reserve and let the custody account pull it. */
  fund(account: Address, amount: bigint): Promise<void>;
  /** Collect every payload emitted for `event`. */
  record<K extends keyof IssuerEventMap>(event: K): IssuerEventMap[K][];
}

export function createHarness(options: HarnessOptions = {}): Harness {
  const reserve = new InMemoryReserveToken();
  const bridge = new MockBridgeGateway(reserve);
  const oracle = new FixedPriceOracle(options.price ?? PRICE_SCALE);
  const ledger = new InMemorySyntheticLedger();
  const eventBus = new EventBus();

  const authority = new IssuerConfigAuthority({
    owner: OWNER,
    operator: OPERATOR,
    feeCollector: FEES,
    maxBatch: options.maxBatch ?? 50,
    autoSettle: options.autoSettle ?? true,
    pricing: {
      buySpread: 0n,
      redeemSpread: 0n,
      buyFee: 0n,
      redeemFee: 0n,
      ...options.pricing,
    },
    liquidity: {
      bufferThreshold: 0n,
      minBridgeAmount: 0n,
      ...options.liquidity,
    },
    oracle,
    bridge,
    eventBus,
  });

  const queue = new RedemptionQueue(options.store ?? new IndexedQueueStore());
  const orchestrator = new SettlementOrchestrator({
    config: authority,
    reserve,
    ledger,
    queue,
    custodyAccount: CUSTODY,
    eventBus,
    journal: options.journal,
  });

  return {
    reserve,
    bridge,
    oracle,
    ledger,
    eventBus,
    authority,
    queue,
    orchestrator,
    async fund(account, amount) {
      reserve.mint(account, amount);
      const allowed = await reserve.allowance(account, CUSTODY);
      await reserve.approve(account, CUSTODY, allowed + amount);
    },
    record<K extends keyof IssuerEventMap>(event: K) {
      const seen: IssuerEventMap[K][] = [];
      eventBus.on(event, (data) => {
        seen.push(data);
      });
      return seen;
    },
  };
}
