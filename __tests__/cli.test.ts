import { mkdtemp, readFile, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { runCli } from '../bin/fqdn-check';
import { createFakeResolver } from './helpers/fakeResolver';

type CliModule = typeof import('../bin/fqdn-check');

/** Load the CLI (and the CONFIG it reads) fresh, with the given env in place. */
function loadCliWithEnv(env: Record<string, string>): CliModule {
  const saved: Record<string, string | undefined> = {};
  for (const [key, value] of Object.entries(env)) {
    saved[key] = process.env[key];
    process.env[key] = value;
  }
  let loaded: CliModule | undefined;
  try {
    jest.isolateModules(() => {
      loaded = require('../bin/fqdn-check');
    });
  } finally {
    for (const [key, value] of Object.entries(saved)) {
      if (value === undefined) delete process.env[key];
      else process.env[key] = value;
    }
  }
  if (!loaded) throw new Error('fqdn-check module did not load');
  return loaded;
}

const HEADER =
  'FQDN,PTR,IP Address,FLU Exists,FLU Existing Value,FLU Needs Update,RLU Exists,RLU Existing Value,RLU Needs Update\n';

describe('fqdn-check CLI', () => {
  let dir: string;
  let lines: string[];
  const out = (text: string) => {
    lines.push(text);
  };

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'fqdn-check-'));
    lines = [];
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  test('writes the report for a CSV sheet', async () => {
    const input = join(dir, 'devices.csv');
    const output = join(dir, 'report.csv');
    await writeFile(
      input,
      'ip_address,device_hostname,interface_name\n10.0.0.1,SW1.old.test,\n10.0.0.2,sw1,Loopback0\n',
    );
    const resolver = createFakeResolver({
      forward: { 'sw1.corp.test': ['10.0.0.1'] },
      reverse: { '10.0.0.1': ['sw1.corp.test'] },
    });

    const code = await runCli([input, '--domain', 'corp.test', '--sequential', '-o', output], { resolver, out });

    expect(code).toBe(0);
    expect(await readFile(output, 'utf8')).toBe(
      HEADER +
        'sw1.corp.test,1.0.0.10.in-addr.arpa,10.0.0.1,True,10.0.0.1,False,True,sw1.corp.test,False\n' +
        'sw1-lo-0.corp.test,2.0.0.10.in-addr.arpa,10.0.0.2,False,,True,False,,True\n',
    );
    expect(lines).toEqual([
      `Report written to ${output}`,
      'Finished successfully: True\nRecords built: 2\nRows skipped: 0',
    ]);
  });

  test('fails when the sheet has no rows', async () => {
    const input = join(dir, 'empty.csv');
    await writeFile(input, 'ip_address,device_hostname\n');

    const code = await runCli([input], { resolver: createFakeResolver({}), out });

    expect(code).toBe(1);
    expect(lines).toEqual(['Finished successfully: False\nRecords built: 0\nRows skipped: 0']);
  });

  test('rejects an unknown log level', async () => {
    const input = join(dir, 'one.csv');
    await writeFile(input, 'ip_address,device_hostname\n10.0.0.1,sw1\n');

    expect(await runCli([input, '--log-level', 'loud'], { resolver: createFakeResolver({}), out })).toBe(1);
    expect(lines).toEqual(["Unknown log level 'loud'"]);
  });

  describe('environment defaults', () => {
    const interfacePtrResolver = () =>
      createFakeResolver({
        reverse: { '10.0.0.1': ['sw1-gi-0-1.corp.test'] },
        delayMs: (q) => (q === 'sw1.corp.test' ? 30 : 0),
      });

    async function writeSheet(): Promise<{ input: string; output: string }> {
      const input = join(dir, 'nodes.csv');
      await writeFile(input, 'ip_address,device_hostname\n10.0.0.1,sw1\n10.0.0.2,sw2\n');
      return { input, output: join(dir, 'report.csv') };
    }

    test('env settings apply when the flags are not given', async () => {
      const cli = loadCliWithEnv({ PREFER_INTERFACE_PTR: 'false', CONCURRENCY_ENABLED: 'false' });
      const { input, output } = await writeSheet();

      const code = await cli.runCli([input, '--domain', 'corp.test', '-o', output], {
        resolver: interfacePtrResolver(),
        out,
      });

      expect(code).toBe(0);
      // sequential: the slow first row still comes first; interface PTR is flagged for update
      expect(await readFile(output, 'utf8')).toBe(
        HEADER +
          'sw1.corp.test,1.0.0.10.in-addr.arpa,10.0.0.1,False,,True,True,sw1-gi-0-1.corp.test,True\n' +
          'sw2.corp.test,2.0.0.10.in-addr.arpa,10.0.0.2,False,,True,False,,True\n',
      );
    });

    test('--no-prefer-interface-ptr overrides an enabled env default', async () => {
      const cli = loadCliWithEnv({ PREFER_INTERFACE_PTR: 'true' });
      const { input, output } = await writeSheet();
      const firstLine = async () => (await readFile(output, 'utf8')).split('\n')[1];

      await cli.runCli([input, '--domain', 'corp.test', '--sequential', '-o', output], {
        resolver: interfacePtrResolver(),
        out,
      });
      expect(await firstLine()).toBe(
        'sw1.corp.test,1.0.0.10.in-addr.arpa,10.0.0.1,False,,True,True,sw1-gi-0-1.corp.test,False',
      );

      await cli.runCli([input, '--domain', 'corp.test', '--sequential', '--no-prefer-interface-ptr', '-o', output], {
        resolver: interfacePtrResolver(),
        out,
      });
      expect(await firstLine()).toBe(
        'sw1.corp.test,1.0.0.10.in-addr.arpa,10.0.0.1,False,,True,True,sw1-gi-0-1.corp.test,True',
      );
    });
  });
});
