import type { IPv4 } from 'ipaddr.js';
import type { FqdnConfig } from './config';
import { InvalidHostnameError, RowContext } from './errors';
import { parseIPv4, reversePointer } from './ipv4';
import logger from './logger';
import { DnsResolver, normalizeName } from './resolver';

export type ForwardStatus = 'NotFound' | 'MatchesExpected' | 'ExistsButDiffers';
export type ReverseStatus = ForwardStatus | 'MatchesPreferredAlternate';

export interface LookupResult<S extends string> {
  readonly status: S;
  /** What DNS currently holds, or null when nothing was found. */
  readonly existingValue: string | null;
  readonly exists: boolean;
  readonly needsUpdate: boolean;
}

export type ForwardLookup = LookupResult<ForwardStatus>;
export type ReverseLookup = LookupResult<ReverseStatus>;

/** Validated, canonical identity of a record before any DNS traffic. */
export interface PreparedRecord {
  readonly ipAddress: string;
  readonly hostname: string;
  readonly domain: string;
  readonly fullName: string;
  readonly ptrRecord: string;
}

export interface ResolutionRecord extends PreparedRecord {
  readonly forward: ForwardLookup;
  readonly reverse: ReverseLookup;
}

function lookupResult<S extends ForwardStatus | ReverseStatus>(status: S, existingValue: string | null): LookupResult<S> {
  return Object.freeze({
    status,
    existingValue,
    exists: status !== 'NotFound',
    needsUpdate: status === 'NotFound' || status === 'ExistsButDiffers',
  });
}

/**
 * Validate the address and hostname and settle the domain. Pure apart from the
 * informational log line for an empty domain.
 */
export function prepareRecord(
  ipAddress: string | IPv4,
  hostname: string,
  domain: string | null | undefined,
  config: Pick<FqdnConfig, 'defaultDomain'>,
): PreparedRecord {
  const context: RowContext = {
    hostname,
    ipAddress: typeof ipAddress === 'string' ? ipAddress : ipAddress.toString(),
  };
  const addr = typeof ipAddress === 'string' ? parseIPv4(ipAddress, context) : ipAddress;

  const host = typeof hostname === 'string' ? hostname.trim().toLowerCase() : '';
  if (!host) {
    throw new InvalidHostnameError('hostname must not be empty', context);
  }
  if (/[_\s]/.test(host)) {
    throw new InvalidHostnameError(`hostname '${host}' contains underscores or whitespace`, context);
  }

  let dom = typeof domain === 'string' ? domain.trim().toLowerCase().replace(/^\.+|\.+$/g, '') : '';
  if (!dom) {
    if (typeof domain === 'string') {
      logger.info({ hostname: host, defaultDomain: config.defaultDomain }, 'empty domain provided, using the default');
    }
    dom = config.defaultDomain;
  }

  return Object.freeze({
    ipAddress: addr.toString(),
    hostname: host,
    domain: dom,
    fullName: `${host}.${dom}`,
    ptrRecord: reversePointer(addr),
  });
}

/**
 * Compare forward answers with the expected address. Any matching address counts;
 * otherwise the first answer is reported as the existing value.
 */
export function classifyForward(addresses: readonly string[] | null, expected: string): ForwardLookup {
  if (!addresses || addresses.length === 0) return lookupResult('NotFound', null);
  if (addresses.includes(expected)) return lookupResult('MatchesExpected', expected);
  return lookupResult('ExistsButDiffers', addresses[0]);
}

export function classifyReverse(
  names: readonly string[] | null,
  expected: Pick<PreparedRecord, 'fullName' | 'hostname'>,
  preferInterfacePtr: boolean,
): ReverseLookup {
  if (!names || names.length === 0) return lookupResult('NotFound', null);
  const normalized = names.map(normalizeName);

  if (normalized.includes(expected.fullName)) {
    return lookupResult('MatchesExpected', expected.fullName);
  }
  if (preferInterfacePtr) {
    const alternate = normalized.find((n) => n.startsWith(`${expected.hostname}-`));
    if (alternate) return lookupResult('MatchesPreferredAlternate', alternate);
  }
  return lookupResult('ExistsButDiffers', normalized[0]);
}

async function settle(p: Promise<string[]>, query: string): Promise<string[] | null> {
  try {
    return await p;
  } catch (err) {
    logger.debug({ err, query }, 'lookup failed, recording as not found');
    return null;
  }
}

/**
 * Run the forward then the reverse lookup for a prepared record and freeze the
 * classified result. Lookup failures surface as NotFound, never as rejections.
 */
export async function resolveRecord(
  prepared: PreparedRecord,
  resolver: DnsResolver,
  config: Pick<FqdnConfig, 'preferInterfacePtr'>,
): Promise<ResolutionRecord> {
  const addresses = await settle(resolver.lookupName(prepared.fullName), prepared.fullName);
  const names = await settle(resolver.lookupAddress(prepared.ipAddress), prepared.ipAddress);

  return Object.freeze({
    ...prepared,
    forward: classifyForward(addresses, prepared.ipAddress),
    reverse: classifyReverse(names, prepared, config.preferInterfacePtr),
  });
}

export async function buildRecord(
  ipAddress: string | IPv4,
  hostname: string,
  domain: string | null | undefined,
  config: Pick<FqdnConfig, 'defaultDomain' | 'preferInterfacePtr'>,
  resolver: DnsResolver,
): Promise<ResolutionRecord> {
  return resolveRecord(prepareRecord(ipAddress, hostname, domain, config), resolver, config);
}
