import { DnsResolver } from '../lib/dns';

interface MockResolver {
  options: unknown;
  servers: string[];
  resolve4: jest.Mock;
}

const mockResolvers: MockResolver[] = [];
const mockResolveNs = jest.fn();

jest.mock('dns/promises', () => ({
  __esModule: true,
  default: {
    Resolver: class {
      servers: string[] = [];
      resolve4 = jest.fn();
      constructor(public options: unknown) {
        mockResolvers.push(this);
      }
      setServers(servers: string[]) {
        this.servers = servers;
      }
    },
    resolveNs: (domain: string) => mockResolveNs(domain),
  },
}));

const servers = ['192.0.2.53:53', '198.51.100.53:53'];

beforeEach(() => {
  mockResolvers.length = 0;
  mockResolveNs.mockReset();
});

describe('DnsResolver', () => {
  test('builds one resolver per upstream server', () => {
    const resolver = new DnsResolver({ servers, timeoutMs: 1000, tries: 2 });
    expect(resolver.servers).toEqual(servers);
    expect(mockResolvers.map((r) => r.servers)).toEqual([['192.0.2.53:53'], ['198.51.100.53:53']]);
    expect(mockResolvers[0].options).toEqual({ timeout: 1000, tries: 2 });
  });

  test('needs at least one server', () => {
    expect(() => new DnsResolver({ servers: [], timeoutMs: 1000, tries: 1 })).toThrow(
      'DnsResolver needs at least one upstream server',
    );
  });

  test('rotates through the servers round-robin', async () => {
    const onQuery = jest.fn();
    const resolver = new DnsResolver({ servers, timeoutMs: 1000, tries: 2 }, { onQuery });
    for (const r of mockResolvers) r.resolve4.mockResolvedValue(['192.0.2.1']);

    await expect(resolver.lookupHost('a.example.com')).resolves.toEqual(['192.0.2.1']);
    await resolver.lookupHost('b.example.com');
    await resolver.lookupHost('c.example.com');

    expect(mockResolvers[0].resolve4.mock.calls).toEqual([['a.example.com'], ['c.example.com']]);
    expect(mockResolvers[1].resolve4.mock.calls).toEqual([['b.example.com']]);
    expect(onQuery.mock.calls).toEqual([
      ['192.0.2.53:53', true],
      ['198.51.100.53:53', true],
      ['192.0.2.53:53', true],
    ]);
  });

  test('an empty answer is a failed lookup', async () => {
    const onQuery = jest.fn();
    const resolver = new DnsResolver({ servers: servers.slice(0, 1), timeoutMs: 1000, tries: 1 }, { onQuery });
    mockResolvers[0].resolve4.mockResolvedValue([]);

    await expect(resolver.lookupHost('www.example.com')).rejects.toThrow('no A records found for www.example.com');
    expect(onQuery.mock.calls).toEqual([['192.0.2.53:53', false]]);
  });

  test('resolver errors propagate', async () => {
    const onQuery = jest.fn();
    const resolver = new DnsResolver({ servers: servers.slice(0, 1), timeoutMs: 1000, tries: 1 }, { onQuery });
    mockResolvers[0].resolve4.mockRejectedValue(new Error('queryA ENOTFOUND nope.example.com'));

    await expect(resolver.lookupHost('nope.example.com')).rejects.toThrow('queryA ENOTFOUND nope.example.com');
    expect(onQuery.mock.calls).toEqual([['192.0.2.53:53', false]]);
  });

  test('a cancelled lookup rejects without waiting for the server', async () => {
    const resolver = new DnsResolver({ servers: servers.slice(0, 1), timeoutMs: 20, tries: 1 });
    mockResolvers[0].resolve4.mockReturnValue(new Promise<string[]>(() => undefined));
    const controller = new AbortController();
    const pending = resolver.lookupHost('slow.example.com', controller.signal);
    controller.abort();
    await expect(pending).rejects.toThrow('aborted');
  });

  test('a server that never answers times out', async () => {
    const resolver = new DnsResolver({ servers: servers.slice(0, 1), timeoutMs: 10, tries: 2 });
    mockResolvers[0].resolve4.mockReturnValue(new Promise<string[]>(() => undefined));
    await expect(resolver.lookupHost('slow.example.com')).rejects.toThrow('timeout');
  });

  test('nameservers are lowercased without the root dot', async () => {
    mockResolveNs.mockResolvedValue(['NS1.Example.COM.', 'ns2.example.com']);
    const resolver = new DnsResolver({ servers, timeoutMs: 1000, tries: 1 });
    await expect(resolver.lookupNs('example.com')).resolves.toEqual(['ns1.example.com', 'ns2.example.com']);
    expect(mockResolveNs).toHaveBeenCalledWith('example.com');
  });
});
