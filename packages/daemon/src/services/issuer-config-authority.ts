/**
 * IssuerConfigAuthority - single-writer holder of issuer configuration.
 *
 * Every setter requires the owner. Settlement calls read a frozen snapshot
 * once at entry and use it for the whole call.
 */

import {
  LiquidityPolicySchema,
  ReserveMintError,
  isAddress,
  isZeroAddress,
  sameAddress,
  type Address,
  type EventBus,
  type IBridgeGateway,
  type IPriceOracle,
  type LiquidityPolicy,
  type PricingParameters,
  validatePricingParameters,
} from '@reservemint/core';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface IssuerConfig {
  pricing: PricingParameters;
  liquidity: LiquidityPolicy;
  oracle: IPriceOracle;
  bridge: IBridgeGateway;
  feeCollector: Address;
  operator: Address;
  maxBatch: number;
  autoSettle: boolean;
}

export type IssuerConfigSnapshot = Readonly<
  Omit<IssuerConfig, 'pricing' | 'liquidity'> & {
    pricing: Readonly<PricingParameters>;
    liquidity: Readonly<LiquidityPolicy>;
  }
>;

export interface IssuerConfigAuthorityOptions extends IssuerConfig {
  owner: Address;
  eventBus?: EventBus;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function parseLiquidity(input: LiquidityPolicy): LiquidityPolicy {
  const result = LiquidityPolicySchema.safeParse(input);
  if (!result.success) {
    throw new ReserveMintError('INVALID_CONFIG', {
      message: result.error.issues
        .map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`)
        .join('; '),
      cause: result.error,
    });
  }
  return result.data;
}

function requireAccount(field: string, value: string): Address {
  if (!isAddress(value) || isZeroAddress(value)) {
    throw new ReserveMintError('INVALID_ADDRESS', {
      message: `${field} must be a non-zero address`,
      details: { field, value },
    });
  }
  return value;
}

function requireBatchSize(value: number): number {
  if (!Number.isSafeInteger(value) || value < 1) {
    throw new ReserveMintError('INVALID_BATCH_SIZE', { details: { maxBatch: value } });
  }
  return value;
}

// ---------------------------------------------------------------------------
// IssuerConfigAuthority
// ---------------------------------------------------------------------------

export class IssuerConfigAuthority {
  readonly owner: Address;
  private config: IssuerConfig;
  private current: IssuerConfigSnapshot | null = null;
  private readonly eventBus?: EventBus;

  constructor(options: IssuerConfigAuthorityOptions) {
    this.owner = requireAccount('owner', options.owner);
    this.eventBus = options.eventBus;
    this.config = {
      pricing: validatePricingParameters(options.pricing),
      liquidity: parseLiquidity(options.liquidity),
      oracle: options.oracle,
      bridge: options.bridge,
      feeCollector: requireAccount('feeCollector', options.feeCollector),
      operator: requireAccount('operator', options.operator),
      maxBatch: requireBatchSize(options.maxBatch),
      autoSettle: options.autoSettle,
    };
  }

  /** Frozen, internally consistent copy of the current configuration. */
  snapshot(): IssuerConfigSnapshot {
    if (!this.current) {
      this.current = Object.freeze({
        ...this.config,
        pricing: Object.freeze({ ...this.config.pricing }),
        liquidity: Object.freeze({ ...this.config.liquidity }),
      });
    }
    return this.current;
  }

  isOwner(caller: Address): boolean {
    return sameAddress(caller, this.owner);
  }

  isOperator(caller: Address): boolean {
    return sameAddress(caller, this.config.operator);
  }

  /** @throws ReserveMintError UNAUTHORIZED unless caller is owner or operator */
  assertOwnerOrOperator(caller: Address, operation: string): void {
    if (!this.isOwner(caller) && !this.isOperator(caller)) {
      throw new ReserveMintError('UNAUTHORIZED', { details: { caller, operation } });
    }
  }

  /** @throws ReserveMintError UNAUTHORIZED unless caller is owner */
  assertOwner(caller: Address, operation: string): void {
    if (!this.isOwner(caller)) {
      throw new ReserveMintError('UNAUTHORIZED', { details: { caller, operation } });
    }
  }

  // -------------------------------------------------------------------------
  // Setters (owner only)
  // -------------------------------------------------------------------------

  setPricing(caller: Address, pricing: PricingParameters): void {
    this.update(caller, 'pricing', () => validatePricingParameters(pricing));
  }

  setLiquidityPolicy(caller: Address, policy: LiquidityPolicy): void {
    this.update(caller, 'liquidity', () => parseLiquidity(policy));
  }

  setBufferThreshold(caller: Address, bufferThreshold: bigint): void {
    this.update(caller, 'liquidity', () =>
      parseLiquidity({ ...this.config.liquidity, bufferThreshold }),
    );
  }

  setMinBridgeAmount(caller: Address, minBridgeAmount: bigint): void {
    this.update(caller, 'liquidity', () =>
      parseLiquidity({ ...this.config.liquidity, minBridgeAmount }),
    );
  }

  setOracle(caller: Address, oracle: IPriceOracle): void {
    this.update(caller, 'oracle', () => oracle);
  }

  setBridge(caller: Address, bridge: IBridgeGateway): void {
    this.update(caller, 'bridge', () => bridge);
  }

  setFeeCollector(caller: Address, feeCollector: Address): void {
    this.update(caller, 'feeCollector', () => requireAccount('feeCollector', feeCollector));
  }

  setOperator(caller: Address, operator: Address): void {
    this.update(caller, 'operator', () => requireAccount('operator', operator));
  }

  setMaxBatch(caller: Address, maxBatch: number): void {
    this.update(caller, 'maxBatch', () => requireBatchSize(maxBatch));
  }

  setAutoSettle(caller: Address, autoSettle: boolean): void {
    this.update(caller, 'autoSettle', () => autoSettle);
  }

  /** Authorization runs before validation: a non-owner always gets UNAUTHORIZED. */
  private update<K extends keyof IssuerConfig>(
    caller: Address,
    field: K,
    build: () => IssuerConfig[K],
  ): void {
    this.assertOwner(caller, `set:${field}`);
    const next = { ...this.config };
    next[field] = build();
    this.config = next;
    this.current = null;
    this.eventBus?.emit('config:changed', {
      field,
      changedBy: caller,
      timestamp: Math.floor(Date.now() / 1000),
    });
  }
}
