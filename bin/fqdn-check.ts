#!/usr/bin/env node
/**
 * fqdn-check: build standardized FQDNs from a CSV sheet and check them against DNS.
 */

import { Command, CommanderError, InvalidArgumentError } from 'commander';
import { readFile, writeFile } from 'fs/promises';
import { runBatch } from '../lib/batch';
import { createFqdnConfig } from '../lib/config';
import { parseCsv, tableToRows } from '../lib/csv';
import logger from '../lib/logger';
import { summarize, toCsv } from '../lib/report';
import type { DnsResolver } from '../lib/resolver';

interface CliOptions {
  output?: string;
  domain?: string;
  sequential?: boolean;
  workers?: number;
  preferInterfacePtr: boolean;
  logLevel?: string;
}

export interface CliDeps {
  resolver?: DnsResolver;
  out?: (text: string) => void;
}

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

function parseWorkers(value: string): number {
  const n = Number.parseInt(value, 10);
  if (!Number.isInteger(n) || n < 1) {
    throw new InvalidArgumentError('must be a positive integer');
  }
  return n;
}

function buildProgram(): Command {
  return new Command()
    .name('fqdn-check')
    .description('Build FQDNs for devices and interfaces from a CSV file and check forward/reverse DNS')
    .argument('<input>', 'CSV file with ip_address, device_hostname and optional interface_name, domain columns')
    .option('-o, --output <file>', 'write the report CSV here instead of stdout')
    .option('--domain <domain>', 'default domain for rows without one')
    .option('--sequential', 'evaluate rows one at a time')
    .option('--workers <n>', 'number of rows evaluated in parallel', parseWorkers)
    .option('--no-prefer-interface-ptr', 'flag PTRs pointing at an interface name as needing update')
    .option('--log-level <level>', `log level (${LOG_LEVELS.join(', ')})`)
    .exitOverride();
}

/**
 * Run the command line with the given arguments (without node and script path).
 * Resolves with the process exit code.
 */
export async function runCli(argv: string[], deps: CliDeps = {}): Promise<number> {
  const out = deps.out ?? ((text: string) => process.stdout.write(text.endsWith('\n') ? text : `${text}\n`));
  const program = buildProgram();

  try {
    await program.parseAsync(argv, { from: 'user' });
  } catch (err) {
    if (err instanceof CommanderError) return err.exitCode;
    throw err;
  }

  const [input] = program.args;
  const opts = program.opts<CliOptions>();
  if (opts.logLevel) {
    if (!LOG_LEVELS.includes(opts.logLevel)) {
      out(`Unknown log level '${opts.logLevel}'`);
      return 1;
    }
    logger.level = opts.logLevel;
  }

  const config = createFqdnConfig({
    ...(opts.domain ? { defaultDomain: opts.domain } : {}),
    ...(opts.workers ? { workerPoolSize: opts.workers } : {}),
    // Flags left unset keep the environment defaults from CONFIG.
    ...(opts.sequential ? { concurrencyEnabled: false } : {}),
    ...(program.getOptionValueSource('preferInterfacePtr') === 'cli'
      ? { preferInterfacePtr: opts.preferInterfacePtr }
      : {}),
  });

  const rows = tableToRows(parseCsv(await readFile(input, 'utf8')));
  const result = await runBatch(rows, config, deps.resolver);

  if (result.status) {
    const csv = toCsv(result.records);
    if (opts.output) {
      await writeFile(opts.output, csv, 'utf8');
      out(`Report written to ${opts.output}`);
    } else {
      out(csv);
    }
  }
  out(summarize(result));
  return result.status ? 0 : 1;
}

if (require.main === module) {
  runCli(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code;
    },
    (err: unknown) => {
      logger.error({ err }, 'fqdn-check failed');
      process.exitCode = 1;
    },
  );
}
