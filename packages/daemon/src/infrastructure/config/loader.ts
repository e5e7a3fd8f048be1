/**
 * Config loader: smol-toml parsing, nested section detection, env override, Zod validation.
 *
 * Pipeline: read config.toml -> parse with smol-toml -> detectNestedSections ->
 *           applyEnvOverrides -> IssuerDaemonConfigSchema.parse (Zod defaults + validation).
 *
 * Amounts and spreads accept integers or integer strings. Values above 2^53
 * must be quoted in TOML; env overrides keep them as strings automatically.
 */

import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import { parse } from 'smol-toml';
import { z } from 'zod';
import {
  AddressSchema,
  AmountSchema,
  IssuerAccountsSchema,
  IssuerParametersSchema,
  QueueStorageTypeEnum,
  SettlementKnobsSchema,
  isReserveMintError,
  validatePricingParameters,
  type IssuerParameters,
} from '@reservemint/core';

// ---------------------------------------------------------------------------
// Zod Schema: 7 sections, flat keys, with defaults
// ---------------------------------------------------------------------------

const accounts = IssuerAccountsSchema.shape;
const knobs = SettlementKnobsSchema.shape;

export const IssuerDaemonConfigSchema = z.object({
  issuer: z.object({
    owner: accounts.owner,
    operator: accounts.operator,
    custody_account: accounts.custodyAccount,
    fee_collector: accounts.feeCollector,
    reserve_asset: AddressSchema,
    auto_settle: knobs.autoSettle,
    max_batch: knobs.maxBatch,
  }),
  pricing: z
    .object({
      buy_spread: AmountSchema.default(0),
      redeem_spread: AmountSchema.default(0),
      buy_fee: AmountSchema.default(0),
      redeem_fee: AmountSchema.default(0),
    })
    .default({})
    .superRefine((pricing, ctx) => {
      try {
        validatePricingParameters({
          buySpread: pricing.buy_spread,
          redeemSpread: pricing.redeem_spread,
          buyFee: pricing.buy_fee,
          redeemFee: pricing.redeem_fee,
        });
      } catch (err) {
        if (!isReserveMintError(err)) throw err;
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: err.code === 'INVALID_SPREAD' ? ['redeem_spread'] : [],
          message: err.message,
        });
      }
    }),
  liquidity: z
    .object({
      buffer_threshold: AmountSchema.default(0),
      min_bridge_amount: AmountSchema.default(0),
    })
    .default({}),
  queue: z
    .object({
      storage: QueueStorageTypeEnum.default('indexed'),
    })
    .default({}),
  database: z
    .object({
      path: z.string().default('data/reservemint.db'),
      busy_timeout: z.number().int().min(1000).max(30000).default(5000),
    })
    .default({}),
  workers: z
    .object({
      /** Periodic settle trigger in ms; 0 disables it. */
      settle_interval: z.number().int().min(0).max(86_400_000).default(0),
    })
    .default({}),
  oracle: z
    .object({
      rpc_url: z.string().default(''),
      feed: z.union([AddressSchema, z.literal('')]).default(''),
      max_staleness: z.number().int().min(0).max(604800).default(3600),
    })
    .default({}),
});

export type IssuerDaemonConfig = z.infer<typeof IssuerDaemonConfigSchema>;

// ---------------------------------------------------------------------------
// Known TOML sections
// ---------------------------------------------------------------------------

const KNOWN_SECTIONS = [
  'issuer',
  'pricing',
  'liquidity',
  'queue',
  'database',
  'workers',
  'oracle',
] as const;

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

// ---------------------------------------------------------------------------
// detectNestedSections: reject nested TOML sections
// ---------------------------------------------------------------------------

/**
 * Rejects unknown top-level sections and any `[section.sub]` table.
 */
export function detectNestedSections(parsed: Record<string, unknown>): void {
  for (const key of Object.keys(parsed)) {
    if (!(KNOWN_SECTIONS as readonly string[]).includes(key)) {
      throw new Error(
        `Unknown config section '[${key}]'. Allowed sections: ${KNOWN_SECTIONS.join(', ')}`,
      );
    }

    const value = parsed[key];
    if (isRecord(value)) {
      for (const [subKey, subValue] of Object.entries(value)) {
        if (isRecord(subValue)) {
          throw new Error(
            `Nested TOML section '[${key}.${subKey}]' detected. ` +
              `Config requires flattened keys. ` +
              `Use '${subKey}_<field>' inside [${key}] instead of nested sections.`,
          );
        }
      }
    }
  }
}

// ---------------------------------------------------------------------------
// parseEnvValue: coerce string env values to correct types
// ---------------------------------------------------------------------------

/**
 * - 'true'/'false' -> boolean
 * - integers within the safe range, decimals -> number
 * - everything else (including integers above 2^53) -> string
 */
export function parseEnvValue(value: string): string | number | boolean {
  if (value === 'true') return true;
  if (value === 'false') return false;

  if (/^-?\d+$/.test(value)) {
    const num = Number(value);
    return Number.isSafeInteger(num) ? num : value;
  }
  if (/^-?\d+\.\d+$/.test(value)) {
    const num = Number(value);
    if (Number.isFinite(num)) return num;
  }

  return value;
}

// ---------------------------------------------------------------------------
// applyEnvOverrides: RESERVEMINT_{SECTION}_{KEY} -> config override
// ---------------------------------------------------------------------------

const ENV_PREFIX = 'RESERVEMINT_';

/** Env keys to skip (not mapped to config sections). */
const SKIP_ENV_KEYS = new Set(['RESERVEMINT_DATA_DIR']);

/**
 * Pattern: RESERVEMINT_{SECTION}_{KEY}. The first segment after the prefix is
 * the section; the rest joined with '_' is the field.
 */
export function applyEnvOverrides(
  config: Record<string, unknown>,
  env: NodeJS.ProcessEnv = process.env,
): void {
  for (const [envKey, envValue] of Object.entries(env)) {
    if (!envKey.startsWith(ENV_PREFIX) || envValue === undefined) continue;
    if (SKIP_ENV_KEYS.has(envKey)) continue;

    const parts = envKey.slice(ENV_PREFIX.length).toLowerCase().split('_');
    const section = parts[0];
    if (!section || !(KNOWN_SECTIONS as readonly string[]).includes(section)) continue;

    const field = parts.slice(1).join('_');
    if (!field) continue;

    const existing = config[section];
    const target: Record<string, unknown> = isRecord(existing) ? existing : {};
    target[field] = parseEnvValue(envValue);
    config[section] = target;
  }
}

// ---------------------------------------------------------------------------
// loadConfig: main pipeline
// ---------------------------------------------------------------------------

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/**
 * Load issuer config from dataDir/config.toml with env override and Zod validation.
 * A missing file means "env and defaults only"; [issuer] accounts have no
 * defaults, so they must come from one of the two.
 */
export function loadConfig(dataDir: string, env: NodeJS.ProcessEnv = process.env): IssuerDaemonConfig {
  let raw: Record<string, unknown> = {};

  const configPath = join(dataDir, 'config.toml');
  try {
    const content = readFileSync(configPath, 'utf-8');
    if (content.trim().length > 0) {
      raw = parse(content);
    }
  } catch (err) {
    if (!isMissingFile(err)) {
      throw err;
    }
  }

  detectNestedSections(raw);
  applyEnvOverrides(raw, env);
  return IssuerDaemonConfigSchema.parse(raw);
}

/**
 * Map the [issuer], [pricing] and [liquidity] sections onto the parameters
 * the configuration authority starts from.
 */
export function toIssuerParameters(config: IssuerDaemonConfig): IssuerParameters {
  return IssuerParametersSchema.parse({
    owner: config.issuer.owner,
    operator: config.issuer.operator,
    custodyAccount: config.issuer.custody_account,
    feeCollector: config.issuer.fee_collector,
    maxBatch: config.issuer.max_batch,
    autoSettle: config.issuer.auto_settle,
    pricing: {
      buySpread: config.pricing.buy_spread,
      redeemSpread: config.pricing.redeem_spread,
      buyFee: config.pricing.buy_fee,
      redeemFee: config.pricing.redeem_fee,
    },
    liquidity: {
      bufferThreshold: config.liquidity.buffer_threshold,
      minBridgeAmount: config.liquidity.min_bridge_amount,
    },
  });
}
