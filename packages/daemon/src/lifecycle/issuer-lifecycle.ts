/**
 * IssuerLifecycle - orchestrates issuer startup (5 steps) and shutdown (5 steps).
 *
 * Startup sequence:
 *   1. Data directory + config + daemon lock (fail-fast)
 *   2. Database open + schema push (fail-fast)
 *   3. Collaborators: reserve asset check, oracle (injected or Chainlink feed), ledger
 *   4. Engine: config authority, redemption queue, orchestrator
 *   5. Background workers (fail-soft)
 *
 * Shutdown sequence:
 *   1. Set isShuttingDown, log signal
 *   2. Stop background workers
 *   3. Close the orchestrator (waits for the running settlement call)
 *   4. Remove EventBus listeners
 *   5. WAL checkpoint + close DB, release daemon lock
 */

import { existsSync, mkdirSync, writeFileSync } from 'node:fs';
import { dirname, isAbsolute, join } from 'node:path';
import lockfile from 'proper-lockfile';
import {
  EventBus,
  ReserveMintError,
  sameAddress,
  type IBridgeGateway,
  type IPriceOracle,
  type IReserveToken,
  type ISyntheticLedger,
} from '@reservemint/core';
import { ChainlinkPriceOracle } from '@reservemint/adapter-evm';
import {
  loadConfig,
  toIssuerParameters,
  type IssuerDaemonConfig,
} from '../infrastructure/config/index.js';
import {
  closeDatabase,
  createDatabase,
  pushSchema,
  type DatabaseConnection,
} from '../infrastructure/database/index.js';
import { createQueueStore } from '../infrastructure/queue-store/index.js';
import { IssuerConfigAuthority } from '../services/issuer-config-authority.js';
import { InMemorySyntheticLedger } from '../services/synthetic-ledger.js';
import { SqliteSettlementJournal } from '../services/settlement-journal.js';
import { RedemptionQueue } from '../workflow/redemption-queue.js';
import { SettlementOrchestrator } from '../workflow/settlement-orchestrator.js';
import { BackgroundWorkers } from './workers.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** External systems the engine talks to; only reserve and bridge are mandatory. */
export interface IssuerCollaborators {
  reserve: IReserveToken;
  bridge: IBridgeGateway;
  /** Defaults to a ChainlinkPriceOracle built from [oracle]. */
  oracle?: IPriceOracle;
  /** Defaults to an InMemorySyntheticLedger. */
  ledger?: ISyntheticLedger;
}

export interface IssuerLifecycleOptions {
  env?: NodeJS.ProcessEnv;
  /** Skip the data-directory lock (embedding several engines in one process). */
  skipLock?: boolean;
}

const WAL_CHECKPOINT_INTERVAL = 300_000;

// ---------------------------------------------------------------------------
// IssuerLifecycle
// ---------------------------------------------------------------------------

export class IssuerLifecycle {
  private _isShuttingDown = false;
  private _config: IssuerDaemonConfig | null = null;
  private connection: DatabaseConnection | null = null;
  private releaseLock: (() => Promise<void>) | null = null;
  private workers: BackgroundWorkers | null = null;
  private _authority: IssuerConfigAuthority | null = null;
  private _orchestrator: SettlementOrchestrator | null = null;
  private _journal: SqliteSettlementJournal | null = null;
  readonly eventBus = new EventBus();

  get isShuttingDown(): boolean {
    return this._isShuttingDown;
  }

  get config(): IssuerDaemonConfig | null {
    return this._config;
  }

  /** @throws Error if called before start() */
  get orchestrator(): SettlementOrchestrator {
    if (!this._orchestrator) throw new Error('IssuerLifecycle: not started');
    return this._orchestrator;
  }

  /** @throws Error if called before start() */
  get authority(): IssuerConfigAuthority {
    if (!this._authority) throw new Error('IssuerLifecycle: not started');
    return this._authority;
  }

  get journal(): SqliteSettlementJournal | null {
    return this._journal;
  }

  async start(
    dataDir: string,
    collaborators: IssuerCollaborators,
    options: IssuerLifecycleOptions = {},
  ): Promise<void> {
    // ------------------------------------------------------------------
    // Step 1: Data directory + config + lock
    // ------------------------------------------------------------------
    if (!existsSync(dataDir)) {
      mkdirSync(dataDir, { recursive: true });
    }
    const config = loadConfig(dataDir, options.env);
    this._config = config;
    if (!options.skipLock) {
      await this.acquireLock(dataDir);
    }
    console.log('Step 1: Config loaded, data directory locked');

    try {
      // ----------------------------------------------------------------
      // Step 2: Database
      // ----------------------------------------------------------------
      const dbPath = isAbsolute(config.database.path)
        ? config.database.path
        : join(dataDir, config.database.path);
      const dbDir = dirname(dbPath);
      if (!existsSync(dbDir)) {
        mkdirSync(dbDir, { recursive: true });
      }
      this.connection = createDatabase(dbPath, { busyTimeout: config.database.busy_timeout });
      pushSchema(this.connection.sqlite);
      this._journal = new SqliteSettlementJournal(this.connection.db);
      console.log('Step 2: Database initialized');

      // ----------------------------------------------------------------
      // Step 3: Collaborators
      // ----------------------------------------------------------------
      if (!sameAddress(collaborators.reserve.address, config.issuer.reserve_asset)) {
        throw new ReserveMintError('INVALID_CONFIG', {
          message: `Reserve token ${collaborators.reserve.address} does not match issuer.reserve_asset ${config.issuer.reserve_asset}`,
        });
      }
      const oracle = collaborators.oracle ?? this.buildOracle(config);
      const ledger = collaborators.ledger ?? new InMemorySyntheticLedger();
      console.log('Step 3: Collaborators ready');

      // ----------------------------------------------------------------
      // Step 4: Engine
      // ----------------------------------------------------------------
      const params = toIssuerParameters(config);
      this._authority = new IssuerConfigAuthority({
        owner: params.owner,
        operator: params.operator,
        feeCollector: params.feeCollector,
        maxBatch: params.maxBatch,
        autoSettle: params.autoSettle,
        pricing: params.pricing,
        liquidity: params.liquidity,
        oracle,
        bridge: collaborators.bridge,
        eventBus: this.eventBus,
      });

      const queue = new RedemptionQueue(createQueueStore(config.queue.storage, this.connection));
      this._orchestrator = new SettlementOrchestrator({
        config: this._authority,
        reserve: collaborators.reserve,
        ledger,
        queue,
        custodyAccount: params.custodyAccount,
        eventBus: this.eventBus,
        journal: this._journal,
      });
      console.log(
        `Step 4: Engine ready (queue storage: ${queue.storage}, pending: ${queue.length()})`,
      );
    } catch (err) {
      await this.releaseResources();
      throw err;
    }

    // ------------------------------------------------------------------
    // Step 5: Background workers (fail-soft)
    // ------------------------------------------------------------------
    try {
      this.registerWorkers(config);
    } catch (err) {
      console.warn('Step 5: Background workers not started:', err);
    }
  }

  /**
   * Graceful shutdown. Safe to call more than once.
   */
  async shutdown(signal: string): Promise<void> {
    if (this._isShuttingDown) return;
    this._isShuttingDown = true;
    console.log(`Shutdown initiated by ${signal}`);

    if (this.workers) {
      await this.workers.stopAll();
      this.workers = null;
      console.log('Step 2: Workers stopped');
    }

    if (this._orchestrator) {
      await this._orchestrator.close();
      console.log('Step 3: Settlement engine closed');
    }

    this.eventBus.removeAllListeners();

    await this.releaseResources();
    console.log('Shutdown complete');
  }

  /** Trigger the settle worker now (no-op when the worker is disabled). */
  async runSettleWorker(): Promise<boolean> {
    return this.workers ? this.workers.runNow('settle') : false;
  }

  // -------------------------------------------------------------------------
  // Internals
  // -------------------------------------------------------------------------

  private buildOracle(config: IssuerDaemonConfig): IPriceOracle {
    const { rpc_url: rpcUrl, feed, max_staleness: maxStaleness } = config.oracle;
    if (!rpcUrl || !feed) {
      throw new ReserveMintError('INVALID_CONFIG', {
        message: 'No price oracle: inject one or set oracle.rpc_url and oracle.feed',
      });
    }
    return new ChainlinkPriceOracle({ rpcUrl, feed, maxStaleness });
  }

  private registerWorkers(config: IssuerDaemonConfig): void {
    const workers = new BackgroundWorkers({
      onError: (name, err) => {
        console.error(`Worker ${name} error:`, err);
        if (name === 'settle') {
          this.eventBus.emit('settlement:failed', {
            trigger: 'worker',
            error: err instanceof Error ? err.message : String(err),
            timestamp: Math.floor(Date.now() / 1000),
          });
        }
      },
    });

    if (config.workers.settle_interval > 0) {
      const operator = config.issuer.operator;
      workers.register('settle', {
        interval: config.workers.settle_interval,
        handler: async () => {
          if (this._isShuttingDown || !this._orchestrator) return;
          await this._orchestrator.settle(operator);
        },
      });
    }

    workers.register('wal-checkpoint', {
      interval: WAL_CHECKPOINT_INTERVAL,
      handler: () => {
        if (this.connection && !this._isShuttingDown) {
          this.connection.sqlite.pragma('wal_checkpoint(PASSIVE)');
        }
      },
    });

    workers.startAll();
    this.workers = workers;
    console.log(`Step 5: ${workers.size} background worker(s) started`);
  }

  private async acquireLock(dataDir: string): Promise<void> {
    const lockPath = join(dataDir, 'issuer.lock');
    if (!existsSync(lockPath)) {
      writeFileSync(lockPath, '', 'utf-8');
    }
    try {
      this.releaseLock = await lockfile.lock(lockPath, {
        stale: 10_000,
        update: 5_000,
        retries: 0,
      });
    } catch (err) {
      const errMsg = err instanceof Error ? err.message : String(err);
      throw new ReserveMintError('INVALID_CONFIG', {
        message: `Data directory ${dataDir} is in use by another issuer process: ${errMsg}`,
        cause: err,
      });
    }
  }

  private async releaseResources(): Promise<void> {
    if (this.connection) {
      try {
        closeDatabase(this.connection.sqlite);
        console.log('Database closed');
      } catch (err) {
        console.warn('Database close warning:', err);
      }
      this.connection = null;
    }
    if (this.releaseLock) {
      try {
        await this.releaseLock();
      } catch (err) {
        console.warn('Lock release warning:', err);
      }
      this.releaseLock = null;
    }
  }
}
