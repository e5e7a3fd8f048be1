/**
 * Tests for config loader: TOML parsing, env overrides, nested section rejection, Zod validation.
 */

import { describe, it, expect, afterAll } from 'vitest';
import { mkdirSync, writeFileSync, rmSync, existsSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { randomUUID } from 'node:crypto';
import { PRICE_SCALE } from '@reservemint/core';
import {
  applyEnvOverrides,
  detectNestedSections,
  loadConfig,
  parseEnvValue,
  toIssuerParameters,
} from '../infrastructure/config/index.js';

// ---------------------------------------------------------------------------
// Test helpers
// ---------------------------------------------------------------------------

const tempDirs: string[] = [];

function createTempDir(): string {
  const dir = join(tmpdir(), `reservemint-config-test-${randomUUID()}`);
  mkdirSync(dir, { recursive: true });
  tempDirs.push(dir);
  return dir;
}

function writeConfig(dir: string, toml: string): void {
  writeFileSync(join(dir, 'config.toml'), toml, 'utf-8');
}

const ISSUER_SECTION = `[issuer]
owner = "0x0000000000000000000000000000000000000001"
operator = "0x0000000000000000000000000000000000000002"
custody_account = "0x00000000000000000000000000000000000000c0"
fee_collector = "0x00000000000000000000000000000000000000fe"
reserve_asset = "0x00000000000000000000000000000000000a55e7"
`;

afterAll(() => {
  for (const dir of tempDirs) {
    if (existsSync(dir)) rmSync(dir, { recursive: true, force: true });
  }
});

// ---------------------------------------------------------------------------
// loadConfig
// ---------------------------------------------------------------------------

describe('loadConfig', () => {
  it('applies defaults to every optional section', () => {
    const dir = createTempDir();
    writeConfig(dir, ISSUER_SECTION);

    const config = loadConfig(dir, {});

    expect(config.issuer.auto_settle).toBe(true);
    expect(config.issuer.max_batch).toBe(50);
    expect(config.pricing).toEqual({ buy_spread: 0n, redeem_spread: 0n, buy_fee: 0n, redeem_fee: 0n });
    expect(config.liquidity).toEqual({ buffer_threshold: 0n, min_bridge_amount: 0n });
    expect(config.queue.storage).toBe('indexed');
    expect(config.database).toEqual({ path: 'data/reservemint.db', busy_timeout: 5000 });
    expect(config.workers.settle_interval).toBe(0);
    expect(config.oracle).toEqual({ rpc_url: '', feed: '', max_staleness: 3600 });
  });

  it('parses amounts given as integers or quoted big integers', () => {
    const dir = createTempDir();
    writeConfig(
      dir,
      `${ISSUER_SECTION}
[pricing]
buy_spread = 5000000000000000
buy_fee = "100000000000000000000"

[liquidity]
buffer_threshold = 50
`,
    );

    const config = loadConfig(dir, {});

    expect(config.pricing.buy_spread).toBe(5_000_000_000_000_000n);
    expect(config.pricing.buy_fee).toBe(10n ** 20n);
    expect(config.liquidity.buffer_threshold).toBe(50n);
  });

  it('rejects a redeem spread of 100%', () => {
    const dir = createTempDir();
    writeConfig(dir, `${ISSUER_SECTION}\n[pricing]\nredeem_spread = "${PRICE_SCALE}"\n`);
    expect(() => loadConfig(dir, {})).toThrow('redeemSpread: must be below 100% (PRICE_SCALE)');
  });

  it('rejects a batch size outside 1..1000', () => {
    const dir = createTempDir();
    writeConfig(dir, ISSUER_SECTION.replace('[issuer]', '[issuer]\nmax_batch = 1001'));
    expect(() => loadConfig(dir, {})).toThrow();
  });

  it('maps sections onto issuer parameters', () => {
    const dir = createTempDir();
    writeConfig(
      dir,
      `${ISSUER_SECTION}\n[pricing]\nredeem_fee = 4\n\n[liquidity]\nmin_bridge_amount = 30\n`,
    );

    const params = toIssuerParameters(loadConfig(dir, {}));

    expect(params.custodyAccount).toBe('0x00000000000000000000000000000000000000c0');
    expect(params.maxBatch).toBe(50);
    expect(params.autoSettle).toBe(true);
    expect(params.pricing).toEqual({ buySpread: 0n, redeemSpread: 0n, buyFee: 0n, redeemFee: 4n });
    expect(params.liquidity).toEqual({ bufferThreshold: 0n, minBridgeAmount: 30n });
  });

  it('requires the issuer accounts', () => {
    const dir = createTempDir();
    writeConfig(dir, '[queue]\nstorage = "sqlite"\n');
    expect(() => loadConfig(dir, {})).toThrow();
  });

  it('falls back to env and defaults when config.toml is missing', () => {
    const dir = createTempDir();
    const config = loadConfig(dir, {
      RESERVEMINT_ISSUER_OWNER: '0x0000000000000000000000000000000000000001',
      RESERVEMINT_ISSUER_OPERATOR: '0x0000000000000000000000000000000000000002',
      RESERVEMINT_ISSUER_CUSTODY_ACCOUNT: '0x00000000000000000000000000000000000000c0',
      RESERVEMINT_ISSUER_FEE_COLLECTOR: '0x00000000000000000000000000000000000000fe',
      RESERVEMINT_ISSUER_RESERVE_ASSET: '0x00000000000000000000000000000000000a55e7',
    });
    expect(config.issuer.custody_account).toBe('0x00000000000000000000000000000000000000c0');
  });

  it('lets env vars override file values', () => {
    const dir = createTempDir();
    writeConfig(dir, `${ISSUER_SECTION}\n[queue]\nstorage = "compacting"\n`);

    const config = loadConfig(dir, {
      RESERVEMINT_QUEUE_STORAGE: 'sqlite',
      RESERVEMINT_ISSUER_MAX_BATCH: '7',
      RESERVEMINT_ISSUER_AUTO_SETTLE: 'false',
      RESERVEMINT_LIQUIDITY_BUFFER_THRESHOLD: '123456789012345678901234',
      RESERVEMINT_DATA_DIR: '/ignored',
    });

    expect(config.queue.storage).toBe('sqlite');
    expect(config.issuer.max_batch).toBe(7);
    expect(config.issuer.auto_settle).toBe(false);
    expect(config.liquidity.buffer_threshold).toBe(123456789012345678901234n);
  });

  it('rejects an unknown queue storage', () => {
    const dir = createTempDir();
    writeConfig(dir, `${ISSUER_SECTION}\n[queue]\nstorage = "ring"\n`);
    expect(() => loadConfig(dir, {})).toThrow();
  });
});

// ---------------------------------------------------------------------------
// detectNestedSections
// ---------------------------------------------------------------------------

describe('detectNestedSections', () => {
  it('rejects nested tables', () => {
    expect(() => detectNestedSections({ pricing: { fees: { buy: 1 } } })).toThrow(
      "Nested TOML section '[pricing.fees]' detected.",
    );
  });

  it('rejects unknown sections', () => {
    expect(() => detectNestedSections({ rpc: {} })).toThrow("Unknown config section '[rpc]'");
  });

  it('accepts flat known sections', () => {
    expect(() => detectNestedSections({ pricing: { buy_fee: 1 }, queue: {} })).not.toThrow();
  });
});

// ---------------------------------------------------------------------------
// Env helpers
// ---------------------------------------------------------------------------

describe('parseEnvValue', () => {
  it('coerces booleans and safe integers', () => {
    expect(parseEnvValue('true')).toBe(true);
    expect(parseEnvValue('false')).toBe(false);
    expect(parseEnvValue('42')).toBe(42);
    expect(parseEnvValue('0.5')).toBe(0.5);
  });

  it('keeps integers beyond 2^53 as strings', () => {
    expect(parseEnvValue('9007199254740993')).toBe('9007199254740993');
  });

  it('keeps other values as strings', () => {
    expect(parseEnvValue('0xabc')).toBe('0xabc');
    expect(parseEnvValue('data/issuer.db')).toBe('data/issuer.db');
  });
});

describe('applyEnvOverrides', () => {
  it('ignores unrelated and unknown-section variables', () => {
    const config: Record<string, unknown> = {};
    applyEnvOverrides(config, {
      HOME: '/root',
      RESERVEMINT_METRICS_PORT: '9090',
      RESERVEMINT_WORKERS_SETTLE_INTERVAL: '60000',
    });
    expect(config).toEqual({ workers: { settle_interval: 60000 } });
  });
});
