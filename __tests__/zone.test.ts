import { fetchZone } from '../lib/sources/zone';
import { tcpReachable } from '../lib/net/tcp';
import { logger } from '../lib/logger';
import { drain, fakeResolver, makeEnv } from './helpers/scan';

jest.mock('../lib/net/tcp', () => ({ tcpReachable: jest.fn() }));

const tcpMock = jest.mocked(tcpReachable);

describe('zone transfer probe', () => {
  beforeEach(() => tcpMock.mockReset());
  afterEach(() => jest.restoreAllMocks());

  test('reports reachable nameservers and the failures in between', async () => {
    tcpMock.mockImplementation(async (host: string) => {
      if (host === 'ns2.example.com') throw new Error('connect ECONNREFUSED 192.0.2.2:53');
    });
    const warn = jest.spyOn(logger, 'warn');
    const env = makeEnv({ resolver: fakeResolver({}, ['ns1.example.com', 'ns2.example.com', 'ns3.example.com']) });

    const { findings, outcome } = await drain(fetchZone('example.com', env));
    expect(findings).toEqual([
      { kind: 'status', level: 'info', message: 'Found 3 nameservers for example.com' },
      { kind: 'status', level: 'info', message: 'Testing nameserver ns1.example.com' },
      { kind: 'nameserver', host: 'ns1.example.com' },
      { kind: 'status', level: 'info', message: 'Testing nameserver ns2.example.com' },
      {
        kind: 'status',
        level: 'error',
        message: 'Failed to connect to ns2.example.com: connect ECONNREFUSED 192.0.2.2:53',
      },
      { kind: 'status', level: 'info', message: 'Testing nameserver ns3.example.com' },
      { kind: 'nameserver', host: 'ns3.example.com' },
    ]);
    expect(outcome).toEqual({ ok: true });
    expect(warn).toHaveBeenCalledTimes(1);
    expect(tcpMock).toHaveBeenCalledWith('ns1.example.com', 53, 5000, env.signal);
  });

  test('a failed NS lookup ends the source with errors', async () => {
    const env = makeEnv({
      resolver: {
        lookupHost: jest.fn(async () => []),
        lookupNs: jest.fn(async () => {
          throw new Error('queryNs ENODATA example.com');
        }),
      },
    });
    const { findings, outcome } = await drain(fetchZone('example.com', env));
    expect(findings).toEqual([]);
    expect(outcome).toEqual({ ok: false, reason: 'failed to lookup NS records: queryNs ENODATA example.com' });
    expect(tcpMock).not.toHaveBeenCalled();
  });

  test('no nameservers still completes', async () => {
    const { findings, outcome } = await drain(fetchZone('example.com', makeEnv()));
    expect(findings).toEqual([{ kind: 'status', level: 'info', message: 'Found 0 nameservers for example.com' }]);
    expect(outcome).toEqual({ ok: true });
  });

  test('cancellation between nameservers stops the probe', async () => {
    const controller = new AbortController();
    tcpMock.mockImplementation(async () => {
      controller.abort();
    });
    const env = makeEnv({
      signal: controller.signal,
      resolver: fakeResolver({}, ['ns1.example.com', 'ns2.example.com']),
    });

    const { findings, outcome } = await drain(fetchZone('example.com', env));
    expect(findings.map((f) => f.kind)).toEqual(['status', 'status', 'nameserver']);
    expect(outcome).toEqual({ ok: false, reason: 'cancelled' });
    expect(tcpMock).toHaveBeenCalledTimes(1);
  });
});
