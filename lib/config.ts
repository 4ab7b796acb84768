// Centralized runtime configuration for timeouts, concurrency, DNS defaults and cache TTLs.
// Values are read from env with sane defaults; callers build an explicit FqdnConfig from them.

import { DEFAULT_INTERFACE_MAP, InterfaceMap } from './interfaceMap';

function envInt(name: string, fallback: number): number {
  const v = process.env[name];
  if (!v) return fallback;
  const n = Number(v);
  return Number.isInteger(n) && n > 0 ? n : fallback;
}

function envBool(name: string, fallback: boolean): boolean {
  const v = process.env[name];
  if (!v) return fallback;
  return !['false', '0', 'no', 'off'].includes(v.trim().toLowerCase());
}

export const CONFIG = {
  DNS_TIMEOUT_MS: envInt('DNS_TIMEOUT_MS', 3000),
  DNS_TRIES: envInt('DNS_TRIES', 2),
  DEFAULT_DOMAIN: (process.env.DEFAULT_DOMAIN || 'example.com').trim().toLowerCase(),
  PREFER_INTERFACE_PTR: envBool('PREFER_INTERFACE_PTR', true),
  MAX_ROWS: envInt('MAX_ROWS', 1000),

  TTL: {
    LOOKUP_MS: envInt('LOOKUP_TTL_MS', 1000 * 60 * 5), // 5m
  },

  CONCURRENCY: {
    ENABLED: envBool('CONCURRENCY_ENABLED', true),
    DEFAULT: envInt('WORKER_POOL_SIZE', 20),
  },
} as const;

/**
 * Settings that shape normalization and DNS evaluation for one run.
 * Passed explicitly so each batch (and each test) can carry its own table and flags.
 */
export interface FqdnConfig {
  readonly defaultDomain: string;
  readonly interfaceMap: Readonly<InterfaceMap>;
  /** Accept a PTR pointing at `<hostname>-...` as already correct. */
  readonly preferInterfacePtr: boolean;
  readonly concurrencyEnabled: boolean;
  readonly workerPoolSize: number;
  readonly lookupTimeoutMs: number;
}

export type FqdnConfigOverrides = Partial<FqdnConfig>;

function positiveInt(value: number | undefined, fallback: number): number {
  return typeof value === 'number' && Number.isInteger(value) && value > 0 ? value : fallback;
}

export function createFqdnConfig(overrides: FqdnConfigOverrides = {}): FqdnConfig {
  const defaultDomain = (overrides.defaultDomain ?? CONFIG.DEFAULT_DOMAIN).trim().toLowerCase();
  if (!defaultDomain) {
    throw new Error('defaultDomain must not be empty');
  }

  const interfaceMap: InterfaceMap = {};
  for (const [longName, shortName] of Object.entries(overrides.interfaceMap ?? DEFAULT_INTERFACE_MAP)) {
    interfaceMap[longName.trim().toLowerCase()] = shortName;
  }

  return Object.freeze({
    defaultDomain,
    interfaceMap: Object.freeze(interfaceMap),
    preferInterfacePtr: overrides.preferInterfacePtr ?? CONFIG.PREFER_INTERFACE_PTR,
    concurrencyEnabled: overrides.concurrencyEnabled ?? CONFIG.CONCURRENCY.ENABLED,
    workerPoolSize: positiveInt(overrides.workerPoolSize, CONFIG.CONCURRENCY.DEFAULT),
    lookupTimeoutMs: positiveInt(overrides.lookupTimeoutMs, CONFIG.DNS_TIMEOUT_MS),
  });
}

export default CONFIG;
