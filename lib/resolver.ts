import { Resolver } from 'dns/promises';
import { CacheAdapter, createDefaultCache } from './cache';
import { CONFIG } from './config';
import logger from './logger';
import { incLookup, LookupDirection, observeLookupLatency } from './metrics';
import { withTimeout } from './net/timeout';

/**
 * Name resolution capability used to evaluate records. Both methods reject when
 * the lookup fails, times out or comes back empty.
 */
export interface DnsResolver {
  /** Forward lookup: FQDN → IPv4 addresses. */
  lookupName(fqdn: string): Promise<string[]>;
  /** Reverse lookup: IPv4 address → names from its PTR record. */
  lookupAddress(ip: string): Promise<string[]>;
}

type CachedAnswer = { ok: true; values: string[] } | { ok: false; message: string };

export interface SystemResolverOptions {
  timeoutMs?: number;
  /** Attempts per query; the timeout budget is split across them. */
  tries?: number;
  /** Memoizes answers (including failures); `null` disables caching. */
  cache?: CacheAdapter<string, CachedAnswer> | null;
  ttlMs?: number;
}

export function normalizeName(name: string): string {
  return name.trim().toLowerCase().replace(/\.+$/, '');
}

/**
 * Resolver that queries the system's configured DNS servers directly (A and PTR
 * records). The hosts file is not consulted. Queries run on c-ares, not the libuv
 * threadpool, so a hung name never delays the lookups queued behind it.
 */
export function createSystemResolver(opts?: SystemResolverOptions): DnsResolver {
  const timeoutMs = opts?.timeoutMs ?? CONFIG.DNS_TIMEOUT_MS;
  const ttlMs = opts?.ttlMs ?? CONFIG.TTL.LOOKUP_MS;
  const tries = Math.max(1, opts?.tries ?? CONFIG.DNS_TRIES);
  const cache = opts?.cache === undefined ? createDefaultCache<CachedAnswer>() : opts.cache;
  const resolver = new Resolver({ timeout: Math.max(1, Math.floor(timeoutMs / tries)), tries });

  async function run(
    direction: LookupDirection,
    query: string,
    exec: () => Promise<string[]>,
  ): Promise<string[]> {
    const key = `${direction}:${query}`;
    let answer: CachedAnswer | undefined;
    if (cache) {
      try {
        answer = await cache.get(key);
      } catch (err) {
        logger.debug({ err, key }, 'cache.get error');
      }
    }

    if (!answer) {
      const started = process.hrtime.bigint();
      try {
        const values = await withTimeout(exec(), timeoutMs, `${direction} lookup of ${query}`);
        if (values.length === 0) throw new Error(`no ${direction} records for ${query}`);
        answer = { ok: true, values };
        incLookup(direction, 'ok');
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        answer = { ok: false, message };
        incLookup(direction, 'error');
        logger.debug({ err, query, direction }, 'DNS lookup failed or timed out');
      } finally {
        observeLookupLatency(direction, Number(process.hrtime.bigint() - started) / 1e9);
      }

      if (cache) {
        try {
          await cache.set(key, answer, ttlMs);
        } catch (err) {
          logger.debug({ err, key }, 'cache.set error');
        }
      }
    }

    if (!answer.ok) throw new Error(answer.message);
    return answer.values;
  }

  return {
    lookupName(fqdn: string) {
      return run('forward', fqdn, async () => {
        const addresses = await resolver.resolve4(fqdn);
        return Array.from(new Set(addresses));
      });
    },
    lookupAddress(ip: string) {
      return run('reverse', ip, async () => {
        const names = await resolver.reverse(ip);
        return Array.from(new Set(names.map(normalizeName).filter((n) => n.length > 0)));
      });
    },
  };
}
