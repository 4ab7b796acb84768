/**
 * Prometheus metrics using `prom-client`.
 *
 * Metrics:
 * - `fqdn_checker_lookups_total` (Counter; labels: direction, status)
 * - `fqdn_checker_lookup_latency_seconds` (Histogram; label: direction)
 * - `fqdn_checker_row_failures_total` (Counter; label: kind)
 */

import { Counter, Histogram, register } from 'prom-client';

export type LookupDirection = 'forward' | 'reverse';

export const lookupsTotal = new Counter({
  name: 'fqdn_checker_lookups_total',
  help: 'DNS lookups performed, by direction and outcome',
  labelNames: ['direction', 'status'] as const,
});

export const lookupLatency = new Histogram({
  name: 'fqdn_checker_lookup_latency_seconds',
  help: 'Histogram of DNS lookup latency in seconds',
  labelNames: ['direction'] as const,
  buckets: [0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2, 5],
});

export const rowFailuresTotal = new Counter({
  name: 'fqdn_checker_row_failures_total',
  help: 'Input rows skipped, by failure kind',
  labelNames: ['kind'] as const,
});

export function incLookup(direction: LookupDirection, status: 'ok' | 'error'): void {
  lookupsTotal.inc({ direction, status });
}

export function observeLookupLatency(direction: LookupDirection, seconds: number): void {
  if (!isFinite(seconds) || seconds < 0) return;
  lookupLatency.observe({ direction }, seconds);
}

export function incRowFailure(kind: string): void {
  rowFailuresTotal.inc({ kind });
}

export { register };
