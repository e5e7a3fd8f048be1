/**
 * Config module barrel export.
 *
 * Re-exports config loader, schema, and type.
 */

export {
  loadConfig,
  IssuerDaemonConfigSchema,
  detectNestedSections,
  applyEnvOverrides,
  parseEnvValue,
  toIssuerParameters,
} from './loader.js';
export type { IssuerDaemonConfig } from './loader.js';
