jest.mock('next/server', () => ({
  NextResponse: {
    json: (body: unknown, init?: { status?: number }) => ({ body, status: init?.status || 200 }),
  },
}));

jest.mock('dns/promises', () => {
  const mockDns = {
    resolve4: jest.fn(),
    reverse: jest.fn(),
  };
  class Resolver {
    resolve4(hostname: string) {
      return mockDns.resolve4(hostname);
    }
    reverse(ip: string) {
      return mockDns.reverse(ip);
    }
  }
  return { __esModule: true, Resolver, mockDns };
});

import type { NextRequest } from 'next/server';
import { POST } from '../app/api/fqdn/route';

const dnsMock = jest.requireMock<{ mockDns: { resolve4: jest.Mock; reverse: jest.Mock } }>('dns/promises').mockDns;

interface MockResponse {
  status: number;
  body: Record<string, unknown>;
}

async function post(json: () => Promise<unknown>): Promise<MockResponse> {
  const req = { json } as unknown as NextRequest;
  return (await POST(req)) as unknown as MockResponse;
}

describe('app/api/fqdn/route', () => {
  beforeEach(() => {
    jest.resetAllMocks();
    dnsMock.resolve4.mockRejectedValue(new Error('queryA ENOTFOUND'));
    dnsMock.reverse.mockRejectedValue(new Error('queryPtr ENOTFOUND'));
  });

  test('returns 400 for a body that is not JSON', async () => {
    const res = await post(async () => {
      throw new SyntaxError('Unexpected token');
    });
    expect(res.status).toBe(400);
    expect(res.body).toEqual({ error: 'Request body must be JSON' });
  });

  test('returns 400 when rows are missing or empty', async () => {
    expect((await post(async () => ({}))).status).toBe(400);
    const empty = await post(async () => ({ rows: [] }));
    expect(empty.status).toBe(400);
    expect(empty.body).toEqual({ error: 'No data was provided' });
  });

  test('returns 400 for a malformed row', async () => {
    const res = await post(async () => ({ rows: [{ ip_address: '10.0.0.1', device_hostname: 'sw1' }, { ip_address: 1 }] }));
    expect(res.status).toBe(400);
    expect(res.body).toEqual({ error: 'rows[1] needs string ip_address and device_hostname fields' });
  });

  test('builds records and lists skipped rows', async () => {
    const res = await post(async () => ({
      rows: [
        { ip_address: '10.0.0.1', device_hostname: 'SW1' },
        { ip_address: 'bad', device_hostname: 'sw2' },
      ],
      options: { defaultDomain: 'corp.test', concurrency: false },
    }));

    expect(res.status).toBe(200);
    expect(res.body).toMatchObject({ status: true, total: 2, built: 1, failed: 1 });
    expect(res.body.records).toEqual([
      expect.objectContaining({
        fullName: 'sw1.corp.test',
        ptrRecord: '1.0.0.10.in-addr.arpa',
        forward: { status: 'NotFound', existingValue: null, exists: false, needsUpdate: true },
        row: ['sw1.corp.test', '1.0.0.10.in-addr.arpa', '10.0.0.1', 'False', '', 'True', 'False', '', 'True'],
      }),
    ]);
    expect(res.body.failures).toEqual([
      expect.objectContaining({ index: 1, kind: 'InvalidAddress', context: { hostname: 'sw2', ipAddress: 'bad' } }),
    ]);
    expect(dnsMock.resolve4).toHaveBeenCalledWith('sw1.corp.test');
  });
});
