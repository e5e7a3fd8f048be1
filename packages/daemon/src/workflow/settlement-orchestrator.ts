/**
 * SettlementOrchestrator - buy, redeem and settle against one custody account.
 *
 * Every mutating call runs under one Mutex (the single writer of the
 * redemption queue and the custody balance) and reads one configuration
 * snapshot at entry. Local effects are recorded on a CompensationStack and
 * unwound newest-first if a later step fails before the call commits.
 *
 * buy:     price -> pull reserve -> verify received -> mint -> fee -> record -> [settle]
 * redeem:  price -> check balance -> burn -> fee -> record -> queue.plan -> payouts -> commit
 * deposit: pull reserve -> verify received -> [drain]
 * settle:  drain queue (bounded by maxBatch) -> forward excess if the queue is empty
 */

import {
  ReserveMintError,
  isAddress,
  isReserveMintError,
  isZeroAddress,
  sumAmounts,
  type Address,
  type EventBus,
  type IPriceOracle,
  type IReserveToken,
  type ISyntheticLedger,
  type QueuedRedemption,
  type SettlementAction,
} from '@reservemint/core';
import { PricingEngine } from '../services/pricing-engine.js';
import { LiquidityController, type ForwardResult } from '../services/liquidity-controller.js';
import type {
  IssuerConfigAuthority,
  IssuerConfigSnapshot,
} from '../services/issuer-config-authority.js';
import type { ISettlementJournal } from '../services/settlement-journal.js';
import { RedemptionQueue, type Payout, type RedemptionPlan } from './redemption-queue.js';
import { encodeSettlementRecord } from './settlement-record.js';
import { CompensationStack } from './compensation.js';
import { Mutex } from './mutex.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface SettlementOrchestratorDeps {
  config: IssuerConfigAuthority;
  reserve: IReserveToken;
  ledger: ISyntheticLedger;
  queue: RedemptionQueue;
  /** Account holding the local reserve buffer. */
  custodyAccount: Address;
  liquidity?: LiquidityController;
  eventBus?: EventBus;
  journal?: ISettlementJournal;
}

export interface SettleReport {
  payouts: Payout[];
  /** Amount sent to the bridge, 0n if nothing was forwarded. */
  forwarded: bigint;
  queueLength: number;
  /** Custody balance after payouts and forwarding. */
  localBalance: bigint;
  /** Set when payouts went through but the forward step failed. */
  forwardError?: string;
}

export interface BuyResult {
  participant: Address;
  reserveAmount: bigint;
  fee: bigint;
  netAmount: bigint;
  tokenAmount: bigint;
  execPrice: bigint;
  /**
   * null when auto-settle is off or the queue drain failed. A failed forward
   * still yields the report, with `forwardError` set.
   */
  settlement: SettleReport | null;
}

export interface RedeemResult {
  participant: Address;
  tokenAmount: bigint;
  grossAmount: bigint;
  fee: bigint;
  netAmount: bigint;
  execPrice: bigint;
  paidImmediately: boolean;
  /** Queue index when the payout was queued instead of paid. */
  queueIndex: number | null;
  /** Everything paid during this call, queued requests first. */
  payouts: Payout[];
}

export interface DepositResult {
  amount: bigint;
  settlement: SettleReport | null;
}

interface SettleOptions {
  forward: boolean;
}

interface LockedSettle {
  report: SettleReport;
  /** The forward step's error; payouts in `report` are already committed. */
  forwardFailure: unknown;
}

type SettleTrigger = 'buy' | 'deposit';

const now = () => Math.floor(Date.now() / 1000);

const errorMessage = (err: unknown) => (err instanceof Error ? err.message : String(err));

// ---------------------------------------------------------------------------
// SettlementOrchestrator
// ---------------------------------------------------------------------------

export class SettlementOrchestrator {
  private readonly config: IssuerConfigAuthority;
  private readonly reserve: IReserveToken;
  private readonly ledger: ISyntheticLedger;
  private readonly queue: RedemptionQueue;
  private readonly custody: Address;
  private readonly liquidity: LiquidityController;
  private readonly eventBus?: EventBus;
  private readonly journal?: ISettlementJournal;
  private readonly mutex = new Mutex();
  private closed = false;

  constructor(deps: SettlementOrchestratorDeps) {
    if (!isAddress(deps.custodyAccount) || isZeroAddress(deps.custodyAccount)) {
      throw new ReserveMintError('INVALID_ADDRESS', {
        message: 'custodyAccount must be a non-zero address',
      });
    }
    this.config = deps.config;
    this.reserve = deps.reserve;
    this.ledger = deps.ledger;
    this.queue = deps.queue;
    this.custody = deps.custodyAccount;
    this.liquidity = deps.liquidity ?? new LiquidityController();
    this.eventBus = deps.eventBus;
    this.journal = deps.journal;
  }

  // -------------------------------------------------------------------------
  // buy
  // -------------------------------------------------------------------------

  async buy(spender: Address, reserveAmount: bigint): Promise<BuyResult> {
    this.assertOpen();
    assertParticipant(spender);

    return this.mutex.runExclusive(async () => {
      const cfg = this.config.snapshot();
      const price = await readPrice(cfg.oracle);
      const quote = new PricingEngine(cfg.pricing).quoteBuy(reserveAmount, price);

      const undo = new CompensationStack();
      try {
        await this.pullReserve(spender, reserveAmount, undo);

        await this.ledger.mint(spender, quote.tokenAmount);
        undo.push('burn minted tokens', () => this.ledger.burn(spender, quote.tokenAmount));

        await this.payFee(cfg.feeCollector, quote.fee);
        undo.clear();
      } catch (err) {
        await undo.unwind();
        throw err;
      }

      await this.emitRecord(cfg, 'BUY', spender, quote.netAmount);
      this.eventBus?.emit('settlement:buy', {
        participant: spender,
        reserveAmount,
        netAmount: quote.netAmount,
        fee: quote.fee,
        tokenAmount: quote.tokenAmount,
        execPrice: quote.execPrice,
        timestamp: now(),
      });

      const settlement = cfg.autoSettle
        ? await this.settleAfter('buy', cfg, { forward: true })
        : null;

      return {
        participant: spender,
        reserveAmount,
        fee: quote.fee,
        netAmount: quote.netAmount,
        tokenAmount: quote.tokenAmount,
        execPrice: quote.execPrice,
        settlement,
      };
    });
  }

  // -------------------------------------------------------------------------
  // redeem
  // -------------------------------------------------------------------------

  async redeem(holder: Address, tokenAmount: bigint): Promise<RedeemResult> {
    this.assertOpen();
    assertParticipant(holder);

    return this.mutex.runExclusive(async () => {
      const cfg = this.config.snapshot();
      const price = await readPrice(cfg.oracle);
      const quote = new PricingEngine(cfg.pricing).quoteRedeem(tokenAmount, price);

      const held = await this.ledger.balanceOf(holder);
      if (held < tokenAmount) {
        throw new ReserveMintError('INSUFFICIENT_TOKEN_BALANCE', {
          details: { holder, balance: held.toString(), amount: tokenAmount.toString() },
        });
      }
      if (quote.fee > 0n) {
        const buffer = await this.reserve.balanceOf(this.custody);
        if (buffer < quote.fee) {
          throw new ReserveMintError('INSUFFICIENT_BUFFER', {
            message: 'Local reserve buffer cannot cover the redemption fee',
            details: { buffer: buffer.toString(), fee: quote.fee.toString() },
          });
        }
      }

      const undo = new CompensationStack();
      try {
        await this.ledger.burn(holder, tokenAmount);
        undo.push('re-mint burned tokens', () => this.ledger.mint(holder, tokenAmount));

        await this.payFee(cfg.feeCollector, quote.fee);
        undo.clear();
      } catch (err) {
        await undo.unwind();
        throw err;
      }

      await this.emitRecord(cfg, 'REDEEM', holder, quote.netAmount);

      // The burn is final from here: an unpaid obligation stays queued.
      const available = await this.reserve.balanceOf(this.custody);
      const plan = this.queue.plan(
        { beneficiary: holder, amount: quote.netAmount },
        available,
        cfg.maxBatch,
      );

      let payouts: Payout[] = [];
      let queueIndex: number | null = null;
      let payoutError: unknown = null;
      try {
        const result = await this.executePlan(plan);
        payouts = result.payouts;
        queueIndex = result.enqueuedIndex;
      } catch (err) {
        payoutError = err;
      }

      const paidImmediately = payouts.some((p) => p.index === null);
      this.eventBus?.emit('settlement:redeem', {
        participant: holder,
        tokenAmount,
        netAmount: quote.netAmount,
        fee: quote.fee,
        execPrice: quote.execPrice,
        paidImmediately,
        timestamp: now(),
      });
      if (payoutError !== null) throw payoutError;

      return {
        participant: holder,
        tokenAmount,
        grossAmount: quote.grossAmount,
        fee: quote.fee,
        netAmount: quote.netAmount,
        execPrice: quote.execPrice,
        paidImmediately,
        queueIndex,
        payouts,
      };
    });
  }

  // -------------------------------------------------------------------------
  // settle / buffer management
  // -------------------------------------------------------------------------

  /**
   * Drain the queue against current liquidity, then forward the excess if
   * nothing is left queued. Deep queues need repeated calls (maxBatch).
   */
  async settle(caller: Address): Promise<SettleReport> {
    this.assertOpen();
    this.config.assertOwnerOrOperator(caller, 'settle');
    return this.mutex.runExclusive(async () => {
      const { report, forwardFailure } = await this.settleLocked(this.config.snapshot(), {
        forward: true,
      });
      if (forwardFailure !== null) throw forwardFailure;
      return report;
    });
  }

  /** Add liquidity from `from` (owner or operator), then drain if auto-settle is on. */
  async depositBuffer(from: Address, amount: bigint): Promise<DepositResult> {
    this.assertOpen();
    this.config.assertOwnerOrOperator(from, 'depositBuffer');
    assertPositive(amount);

    return this.mutex.runExclusive(async () => {
      const cfg = this.config.snapshot();
      const undo = new CompensationStack();
      try {
        await this.pullReserve(from, amount, undo);
        undo.clear();
      } catch (err) {
        await undo.unwind();
        throw err;
      }
      console.log(`SettlementOrchestrator: buffer deposit ${amount} from ${from}`);

      // Deposits are meant to stay local, so the automatic path only drains.
      const settlement = cfg.autoSettle
        ? await this.settleAfter('deposit', cfg, { forward: false })
        : null;
      return { amount, settlement };
    });
  }

  /** Owner-only withdrawal of buffer liquidity to `to`. */
  async withdrawBuffer(caller: Address, to: Address, amount: bigint): Promise<bigint> {
    this.assertOpen();
    this.config.assertOwner(caller, 'withdrawBuffer');
    assertParticipant(to);
    assertPositive(amount);

    return this.mutex.runExclusive(async () => {
      const buffer = await this.reserve.balanceOf(this.custody);
      if (amount > buffer) {
        throw new ReserveMintError('INSUFFICIENT_BUFFER', {
          details: { buffer: buffer.toString(), amount: amount.toString() },
        });
      }
      try {
        await this.reserve.transfer(this.custody, to, amount);
      } catch (err) {
        throw new ReserveMintError('RESERVE_TRANSFER_FAILED', {
          message: `Buffer withdrawal failed: ${errorMessage(err)}`,
          cause: err,
        });
      }
      console.log(`SettlementOrchestrator: buffer withdrawal ${amount} to ${to}`);
      return buffer - amount;
    });
  }

  // -------------------------------------------------------------------------
  // Views
  // -------------------------------------------------------------------------

  queueLength(): number {
    return this.queue.length();
  }

  pendingRedemptions(limit?: number): QueuedRedemption[] {
    return this.queue.list(limit);
  }

  localBalance(): Promise<bigint> {
    return this.reserve.balanceOf(this.custody);
  }

  /** Reject new calls and wait for the running one to finish. */
  async close(): Promise<void> {
    this.closed = true;
    await this.mutex.runExclusive(async () => undefined);
  }

  // -------------------------------------------------------------------------
  // Internals (caller holds the mutex)
  // -------------------------------------------------------------------------

  private async settleLocked(
    cfg: IssuerConfigSnapshot,
    options: SettleOptions,
  ): Promise<LockedSettle> {
    const balance = await this.reserve.balanceOf(this.custody);
    const plan = this.queue.plan(null, balance, cfg.maxBatch);
    const { payouts } = await this.executePlan(plan);

    // Payouts are external transfers; re-read instead of trusting arithmetic.
    const afterPayouts = await this.reserve.balanceOf(this.custody);
    const queueLength = this.queue.length();
    const report: SettleReport = { payouts, forwarded: 0n, queueLength, localBalance: afterPayouts };

    if (!options.forward) return { report, forwardFailure: null };
    if (queueLength > 0) {
      console.log(
        `SettlementOrchestrator: ${queueLength} redemption(s) still queued, forwarding skipped`,
      );
      return { report, forwardFailure: null };
    }

    const instruction = LiquidityController.evaluateForwarding(afterPayouts, cfg.liquidity);
    if (!instruction) return { report, forwardFailure: null };

    let forwarded: ForwardResult;
    try {
      forwarded = await this.liquidity.forward(instruction, {
        token: this.reserve,
        bridge: cfg.bridge,
        custody: this.custody,
      });
    } catch (err) {
      const error = errorMessage(err);
      this.eventBus?.emit('liquidity:forward-failed', {
        amount: instruction.amount,
        error,
        timestamp: now(),
      });
      return { report: { ...report, forwardError: error }, forwardFailure: err };
    }

    this.eventBus?.emit('liquidity:forwarded', {
      amount: forwarded.amount,
      retained: afterPayouts - forwarded.amount,
      timestamp: now(),
    });
    return {
      report: {
        ...report,
        forwarded: forwarded.amount,
        localBalance: afterPayouts - forwarded.amount,
      },
      forwardFailure: null,
    };
  }

  /**
   * Automatic settle after a committed buy/deposit. The triggering call has
   * already succeeded, so a failure here is reported, not thrown. Payouts
   * made before a failed forward stay in the returned report.
   */
  private async settleAfter(
    trigger: SettleTrigger,
    cfg: IssuerConfigSnapshot,
    options: SettleOptions,
  ): Promise<SettleReport | null> {
    let settled: LockedSettle;
    try {
      settled = await this.settleLocked(cfg, options);
    } catch (err) {
      this.reportAutoSettleFailure(trigger, errorMessage(err));
      return null;
    }
    if (settled.report.forwardError !== undefined) {
      this.reportAutoSettleFailure(trigger, settled.report.forwardError);
    }
    return settled.report;
  }

  private reportAutoSettleFailure(trigger: SettleTrigger, error: string): void {
    console.warn(`SettlementOrchestrator: automatic settle after ${trigger} failed: ${error}`);
    this.eventBus?.emit('settlement:failed', { trigger, error, timestamp: now() });
  }

  /**
   * Transfer each payout in order, then commit the paid prefix. If a transfer
   * fails, the prefix paid so far is committed, an unpaid new request is
   * queued, and PAYOUT_FAILED is thrown.
   */
  private async executePlan(
    plan: RedemptionPlan,
  ): Promise<{ payouts: Payout[]; enqueuedIndex: number | null }> {
    let paid = 0;
    let failure: unknown = null;
    for (const payout of plan.payouts) {
      try {
        await this.reserve.transfer(this.custody, payout.beneficiary, payout.amount);
      } catch (err) {
        failure = err;
        break;
      }
      paid++;
    }

    const result = this.queue.commit(plan, paid);
    for (const payout of result.payouts) {
      this.eventBus?.emit('queue:paid', { ...payout, timestamp: now() });
    }
    if (result.enqueuedIndex !== null && plan.newRequest) {
      this.eventBus?.emit('queue:enqueued', {
        index: result.enqueuedIndex,
        beneficiary: plan.newRequest.beneficiary,
        amount: plan.newRequest.amount,
        queueLength: result.queueLength,
        timestamp: now(),
      });
    }
    if (result.payouts.length > 0) {
      const total = sumAmounts(result.payouts.map((p) => p.amount));
      console.log(`SettlementOrchestrator: paid ${result.payouts.length} redemption(s), ${total} total`);
    }

    if (failure !== null) {
      const failed = plan.payouts[paid];
      throw new ReserveMintError('PAYOUT_FAILED', {
        message: `Payout to ${failed?.beneficiary ?? 'unknown'} failed: ${errorMessage(failure)}`,
        details: {
          paid,
          index: failed?.index ?? null,
          enqueuedIndex: result.enqueuedIndex,
          queueLength: result.queueLength,
        },
        cause: failure,
      });
    }
    return { payouts: result.payouts, enqueuedIndex: result.enqueuedIndex };
  }

  /**
   * Pull `amount` from `from` into custody and verify it all arrived. Whatever
   * did arrive is refunded if the call later fails.
   */
  private async pullReserve(from: Address, amount: bigint, undo: CompensationStack): Promise<void> {
    const before = await this.reserve.balanceOf(this.custody);
    try {
      await this.reserve.transferFrom(this.custody, from, this.custody, amount);
    } catch (err) {
      throw new ReserveMintError('RESERVE_TRANSFER_FAILED', {
        message: `Could not pull ${amount} from ${from}: ${errorMessage(err)}`,
        cause: err,
      });
    }

    const received = (await this.reserve.balanceOf(this.custody)) - before;
    if (received > 0n) {
      undo.push('refund pulled reserve', () => this.reserve.transfer(this.custody, from, received));
    }
    if (received < amount) {
      throw new ReserveMintError('SHORT_TRANSFER', {
        details: { requested: amount.toString(), received: received.toString() },
      });
    }
  }

  private async payFee(feeCollector: Address, fee: bigint): Promise<void> {
    if (fee === 0n) return;
    try {
      await this.reserve.transfer(this.custody, feeCollector, fee);
    } catch (err) {
      throw new ReserveMintError('RESERVE_TRANSFER_FAILED', {
        message: `Fee transfer to ${feeCollector} failed: ${errorMessage(err)}`,
        cause: err,
      });
    }
  }

  /** Fire-and-forget: a delivery failure is logged and journaled, never thrown. */
  private async emitRecord(
    cfg: IssuerConfigSnapshot,
    action: SettlementAction,
    participant: Address,
    amount: bigint,
  ): Promise<void> {
    const payload = encodeSettlementRecord({ action, participant, amount });
    let delivered = true;
    try {
      await cfg.bridge.sendMessage(payload);
    } catch (err) {
      delivered = false;
      console.warn(
        `SettlementOrchestrator: settlement record ${action} not delivered: ${errorMessage(err)}`,
      );
    }
    try {
      this.journal?.append({ action, participant, amount, payload, delivered });
    } catch (err) {
      console.error('SettlementOrchestrator: failed to journal settlement record:', err);
    }
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new ReserveMintError('ENGINE_SHUT_DOWN');
    }
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

async function readPrice(oracle: IPriceOracle): Promise<bigint> {
  try {
    return await oracle.getPrice();
  } catch (err) {
    if (isReserveMintError(err)) throw err;
    throw new ReserveMintError('ORACLE_UNAVAILABLE', {
      message: `Price oracle failed: ${errorMessage(err)}`,
      cause: err,
    });
  }
}

function assertParticipant(account: string): void {
  if (!isAddress(account) || isZeroAddress(account)) {
    throw new ReserveMintError('INVALID_ADDRESS', { details: { account } });
  }
}

function assertPositive(amount: bigint): void {
  if (amount <= 0n) {
    throw new ReserveMintError('INVALID_AMOUNT', { details: { amount: amount.toString() } });
  }
}
