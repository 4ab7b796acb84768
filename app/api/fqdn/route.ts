import { NextRequest, NextResponse } from 'next/server';
import { randomUUID } from 'crypto';
import { RawRow, runBatch } from '../../../lib/batch';
import { CONFIG, createFqdnConfig, FqdnConfigOverrides } from '../../../lib/config';
import logger from '../../../lib/logger';
import { recordToReportRow, REPORT_HEADER } from '../../../lib/report';

interface FqdnRequestOptions {
  defaultDomain?: unknown;
  preferInterfacePtr?: unknown;
  concurrency?: unknown;
  workers?: unknown;
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalString(value: unknown): value is string | undefined | null {
  return value === undefined || value === null || typeof value === 'string';
}

function toRawRow(value: unknown): RawRow | null {
  if (!isObject(value)) return null;
  const { ip_address, device_hostname, interface_name, domain } = value;
  if (typeof ip_address !== 'string' || typeof device_hostname !== 'string') return null;
  if (!optionalString(interface_name) || !optionalString(domain)) return null;
  return { ip_address, device_hostname, interface_name, domain };
}

function toOverrides(options: FqdnRequestOptions): FqdnConfigOverrides {
  const overrides: { -readonly [K in keyof FqdnConfigOverrides]: FqdnConfigOverrides[K] } = {};
  if (typeof options.defaultDomain === 'string' && options.defaultDomain.trim()) {
    overrides.defaultDomain = options.defaultDomain;
  }
  if (typeof options.preferInterfacePtr === 'boolean') overrides.preferInterfacePtr = options.preferInterfacePtr;
  if (typeof options.concurrency === 'boolean') overrides.concurrencyEnabled = options.concurrency;
  if (typeof options.workers === 'number') overrides.workerPoolSize = options.workers;
  return overrides;
}

export async function POST(request: NextRequest) {
  const requestId = randomUUID();

  let body: unknown;
  try {
    body = await request.json();
  } catch {
    return NextResponse.json({ error: 'Request body must be JSON' }, { status: 400 });
  }

  if (!isObject(body) || !Array.isArray(body.rows)) {
    return NextResponse.json({ error: '`rows` must be an array of rows' }, { status: 400 });
  }
  if (body.rows.length === 0) {
    return NextResponse.json({ error: 'No data was provided' }, { status: 400 });
  }
  if (body.rows.length > CONFIG.MAX_ROWS) {
    return NextResponse.json({ error: `At most ${CONFIG.MAX_ROWS} rows per request` }, { status: 400 });
  }

  const rows: RawRow[] = [];
  for (const [i, value] of body.rows.entries()) {
    const row = toRawRow(value);
    if (!row) {
      return NextResponse.json(
        { error: `rows[${i}] needs string ip_address and device_hostname fields` },
        { status: 400 },
      );
    }
    rows.push(row);
  }

  try {
    const config = createFqdnConfig(toOverrides(isObject(body.options) ? body.options : {}));
    logger.info({ requestId, rowCount: rows.length }, 'fqdn request started');
    const result = await runBatch(rows, config);

    return NextResponse.json({
      status: result.status,
      total: rows.length,
      built: result.records.length,
      failed: result.failures.length,
      header: REPORT_HEADER,
      records: result.records.map((record) => ({ ...record, row: recordToReportRow(record) })),
      failures: result.failures,
    });
  } catch (error) {
    logger.error({ requestId, err: error }, 'fqdn request failed');
    return NextResponse.json({ error: 'Internal server error' }, { status: 500 });
  }
}
