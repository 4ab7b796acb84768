import pLimit from 'p-limit';
import type { FqdnConfig } from './config';
import { isRowError, RowContext, RowErrorKind } from './errors';
import logger from './logger';
import { incRowFailure } from './metrics';
import { normalizeDeviceHostname, normalizeInterfaceHostname } from './normalize';
import { prepareRecord, resolveRecord, ResolutionRecord } from './record';
import { createSystemResolver, DnsResolver } from './resolver';

/** One input row as it arrives from a CSV sheet or an API body. */
export interface RawRow {
  ip_address: string;
  device_hostname: string;
  interface_name?: string | null;
  domain?: string | null;
}

export interface RowFailure {
  /** Position of the row in the input. */
  index: number;
  kind: RowErrorKind | 'Unexpected';
  message: string;
  context: RowContext;
}

export type RowOutcome =
  | { ok: true; record: ResolutionRecord }
  | { ok: false; failure: RowFailure };

export interface BatchResult {
  /** False only when the input held no rows at all. */
  status: boolean;
  /** Built records, in completion order. */
  records: ResolutionRecord[];
  failures: RowFailure[];
}

/**
 * Normalize, validate and resolve a single row. Never rejects: row-fatal errors
 * come back as a failure outcome.
 */
export async function evaluateRow(
  row: RawRow,
  index: number,
  config: FqdnConfig,
  resolver: DnsResolver,
): Promise<RowOutcome> {
  const context: RowContext = {
    hostname: row.device_hostname,
    ipAddress: row.ip_address,
    ...(row.interface_name ? { interfaceName: row.interface_name } : {}),
  };

  try {
    let hostname = normalizeDeviceHostname(row.device_hostname, context);
    if (typeof row.interface_name === 'string' && row.interface_name.trim().length > 0) {
      hostname = normalizeInterfaceHostname(hostname, row.interface_name, config, context);
    }

    const prepared = prepareRecord(row.ip_address, hostname, row.domain, config);
    logger.debug({ hostname: prepared.fullName, ipAddress: prepared.ipAddress }, 'resolving record');
    const record = await resolveRecord(prepared, resolver, config);
    return { ok: true, record };
  } catch (err) {
    if (isRowError(err)) {
      return { ok: false, failure: { index, kind: err.kind, message: err.message, context: { ...context, ...err.context } } };
    }
    const message = err instanceof Error ? err.message : String(err);
    return { ok: false, failure: { index, kind: 'Unexpected', message, context } };
  }
}

/**
 * Evaluate every row, either through a bounded pool (`workerPoolSize` rows in
 * flight) or one after another. A bad row is logged and skipped; an empty input
 * fails the whole batch.
 */
export async function runBatch(
  rows: readonly RawRow[],
  config: FqdnConfig,
  resolver: DnsResolver = createSystemResolver({ timeoutMs: config.lookupTimeoutMs }),
): Promise<BatchResult> {
  if (rows.length === 0) {
    logger.warn('No data was provided.');
    return { status: false, records: [], failures: [] };
  }

  const records: ResolutionRecord[] = [];
  const failures: RowFailure[] = [];

  const collect = (outcome: RowOutcome) => {
    if (outcome.ok) {
      records.push(outcome.record);
      return;
    }
    const { failure } = outcome;
    failures.push(failure);
    incRowFailure(failure.kind);
    logger.warn(
      { hostname: failure.context.hostname, ipAddress: failure.context.ipAddress, kind: failure.kind, err: failure.message },
      'row skipped',
    );
  };

  logger.info(
    { rows: rows.length, concurrent: config.concurrencyEnabled, workers: config.workerPoolSize },
    'batch started',
  );

  if (config.concurrencyEnabled) {
    const limit = pLimit(config.workerPoolSize);
    await Promise.all(
      rows.map((row, i) => limit(async () => collect(await evaluateRow(row, i, config, resolver)))),
    );
  } else {
    for (const [i, row] of rows.entries()) {
      collect(await evaluateRow(row, i, config, resolver));
    }
  }

  logger.info({ built: records.length, failed: failures.length }, 'batch finished');
  return { status: true, records, failures };
}
