import { publishJob, sseFrame } from '../lib/stream/publisher';
import { createScanContext, disposeScanContext, type ScanContext } from '../lib/context';
import { SOURCES } from '../lib/sources';
import { CANCELLED, type SourceDefinition, type SourceEnv } from '../lib/sources/fetcher';
import { tcpReachable } from '../lib/net/tcp';
import type { Finding, SourceOutcome } from '../lib/types';
import { fakeResolver, testConfig } from './helpers/scan';

jest.mock('../lib/net/tcp', () => ({ tcpReachable: jest.fn() }));

const tcpMock = jest.mocked(tcpReachable);

function withFetch(base: SourceDefinition, fetch: SourceDefinition['fetch']): SourceDefinition {
  return { ...base, fetch };
}

function untilAborted(signal: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal.aborted) resolve();
    else signal.addEventListener('abort', () => resolve(), { once: true });
  });
}

const settle = () => new Promise((resolve) => setImmediate(resolve));

async function readAll(reader: ReadableStreamDefaultReader<Uint8Array>): Promise<string> {
  const decoder = new TextDecoder();
  let text = '';
  for (;;) {
    const { value, done } = await reader.read();
    if (done) return text;
    text += decoder.decode(value, { stream: true });
  }
}

describe('sseFrame', () => {
  test('a default event is a single data field', () => {
    expect(sseFrame('www.example.com')).toBe('data: www.example.com\n\n');
  });

  test('named events and multi-line data', () => {
    expect(sseFrame('a\nb', 'status')).toBe('event: status\ndata: a\ndata: b\n\n');
  });
});

describe('publishJob', () => {
  let ctx: ScanContext;

  beforeEach(() => {
    ctx = createScanContext(testConfig(), { resolver: fakeResolver() });
    tcpMock.mockReset();
  });

  afterEach(() => disposeScanContext(ctx));

  test('streams unique hosts, then a complete event', async () => {
    const source = withFetch(SOURCES.wayback, async function* (): AsyncGenerator<Finding, SourceOutcome, undefined> {
      yield { kind: 'host', host: 'a.example.com' };
      yield { kind: 'host', host: 'a.example.com' };
      yield { kind: 'status', level: 'info', message: 'halfway' };
      yield { kind: 'host', host: 'b.example.com' };
      return { ok: true };
    });
    const job = ctx.registry.register('example.com', 'wayback', 60_000);

    const text = await new Response(publishJob(job, source, ctx)).text();
    expect(text).toBe(
      'data: a.example.com\n\n' +
        'event: status\ndata: info: halfway\n\n' +
        'data: b.example.com\n\n' +
        'event: complete\ndata: {"source":"wayback","target":"example.com","status":"completed","count":2,' +
        '"message":"Wayback scan completed - found 2 subdomains"}\n\n',
    );
    expect(job.status).toBe('completed');
    expect(ctx.registry.size).toBe(0);

    const stats = await ctx.stats.snapshot();
    expect(stats).toMatchObject({ activeJobs: 0, completedJobs: 1, totalSubdomains: 2 });
    expect(stats.sources.wayback).toEqual({ requests: 1, results: 2, errors: 0 });
  });

  test('an upstream failure completes with errors and keeps the partial count', async () => {
    const source = withFetch(SOURCES.crtsh, async function* (): AsyncGenerator<Finding, SourceOutcome, undefined> {
      yield { kind: 'host', host: 'www.example.com' };
      return { ok: false, reason: 'HTTP 503' };
    });
    const job = ctx.registry.register('example.com', 'crtsh', 60_000);

    const text = await new Response(publishJob(job, source, ctx)).text();
    expect(text).toBe(
      'data: www.example.com\n\n' +
        'event: complete\ndata: {"source":"crtsh","target":"example.com","status":"completed_with_errors","count":1,' +
        '"message":"Certificate transparency scan completed with errors - found 1 subdomains","error":"HTTP 503"}\n\n',
    );
    expect(job.status).toBe('failed');
    const stats = await ctx.stats.snapshot();
    expect(stats.failedJobs).toBe(1);
    expect(stats.sources.crtsh.errors).toBe(1);
  });

  test('a fetcher that throws completes with errors', async () => {
    const source = withFetch(SOURCES.search, async function* (): AsyncGenerator<Finding, SourceOutcome, undefined> {
      throw new Error('parser exploded');
    });
    const job = ctx.registry.register('example.com', 'search', 60_000);

    const text = await new Response(publishJob(job, source, ctx)).text();
    expect(text).toBe(
      'event: complete\ndata: {"source":"search","target":"example.com","status":"completed_with_errors","count":0,' +
        '"message":"Search engine scan completed with errors - found 0 subdomains","error":"parser exploded"}\n\n',
    );
  });

  test('a superseded job ends with a cancelled event', async () => {
    const source = withFetch(
      SOURCES.crtsh,
      async function* (_target: string, env: SourceEnv): AsyncGenerator<Finding, SourceOutcome, undefined> {
        yield { kind: 'host', host: 'www.example.com' };
        await untilAborted(env.signal);
        return CANCELLED;
      },
    );
    const first = ctx.registry.register('example.com', 'crtsh', 60_000);
    const reader = publishJob(first, source, ctx).getReader();

    const chunk = await reader.read();
    expect(new TextDecoder().decode(chunk.value)).toBe('data: www.example.com\n\n');

    const second = ctx.registry.register('example.com', 'crtsh', 60_000);
    const rest = await readAll(reader);
    expect(rest).toBe(
      'event: cancelled\ndata: {"source":"crtsh","target":"example.com","reason":"superseded","count":1,' +
        '"message":"Certificate transparency scan cancelled: superseded by a newer request"}\n\n',
    );
    expect(first.status).toBe('cancelled');
    expect(ctx.registry.get(second.id)).toBe(second);
  });

  test('an aborted job reports the abort', async () => {
    const source = withFetch(
      SOURCES.dns,
      async function* (_target: string, env: SourceEnv): AsyncGenerator<Finding, SourceOutcome, undefined> {
        await untilAborted(env.signal);
        return CANCELLED;
      },
    );
    const job = ctx.registry.register('example.com', 'dns', 60_000);
    const body = new Response(publishJob(job, source, ctx)).text();
    await settle();
    expect(ctx.registry.abort('example.com')).toBe(1);

    expect(await body).toBe(
      'event: cancelled\ndata: {"source":"dns","target":"example.com","reason":"aborted","count":0,' +
        '"message":"DNS brute force scan cancelled: aborted by request"}\n\n',
    );
  });

  test('a job past its deadline ends with a cancelled event', async () => {
    const source = withFetch(
      SOURCES.wayback,
      async function* (_target: string, env: SourceEnv): AsyncGenerator<Finding, SourceOutcome, undefined> {
        await untilAborted(env.signal);
        return CANCELLED;
      },
    );
    const job = ctx.registry.register('example.com', 'wayback', 50);

    const text = await new Response(publishJob(job, source, ctx)).text();
    expect(text).toBe(
      'event: cancelled\ndata: {"source":"wayback","target":"example.com","reason":"deadline","count":0,' +
        '"message":"Wayback scan cancelled: timed out"}\n\n',
    );
    expect(job.status).toBe('cancelled');
    expect(job.cancelReason).toBe('deadline');
    expect(ctx.registry.size).toBe(0);
  });

  test('a client disconnect cancels the job and releases it', async () => {
    const source = withFetch(
      SOURCES.wayback,
      async function* (_target: string, env: SourceEnv): AsyncGenerator<Finding, SourceOutcome, undefined> {
        await untilAborted(env.signal);
        return CANCELLED;
      },
    );
    const job = ctx.registry.register('example.com', 'wayback', 60_000);
    const stream = publishJob(job, source, ctx);
    await settle();

    await stream.cancel();
    await settle();

    expect(job.status).toBe('cancelled');
    expect(job.cancelReason).toBe('client');
    expect(ctx.registry.size).toBe(0);
    const stats = await ctx.stats.snapshot();
    expect(stats).toMatchObject({ activeJobs: 0, cancelledJobs: 1 });
  });

  test('dns brute force with nothing resolving completes with zero', async () => {
    const job = ctx.registry.register('example.com', 'dns', 60_000);
    const text = await new Response(publishJob(job, SOURCES.dns, ctx)).text();
    expect(text).toBe(
      'event: complete\ndata: {"source":"dns","target":"example.com","status":"completed","count":0,' +
        '"message":"DNS brute force scan completed - found 0 subdomains"}\n\n',
    );
  });

  test('zone counts reachable nameservers', async () => {
    tcpMock.mockImplementation(async (host: string) => {
      if (host === 'ns2.example.com') throw new Error('connect ECONNREFUSED 192.0.2.2:53');
    });
    disposeScanContext(ctx);
    ctx = createScanContext(testConfig(), {
      resolver: fakeResolver({}, ['ns1.example.com', 'ns2.example.com', 'ns3.example.com']),
    });
    const job = ctx.registry.register('example.com', 'zone', 60_000);

    const text = await new Response(publishJob(job, SOURCES.zone, ctx)).text();
    expect(text).toBe(
      'event: status\ndata: info: Found 3 nameservers for example.com\n\n' +
        'event: status\ndata: info: Testing nameserver ns1.example.com\n\n' +
        'event: nameserver\ndata: ns1.example.com\n\n' +
        'event: status\ndata: info: Testing nameserver ns2.example.com\n\n' +
        'event: status\ndata: error: Failed to connect to ns2.example.com: connect ECONNREFUSED 192.0.2.2:53\n\n' +
        'event: status\ndata: info: Testing nameserver ns3.example.com\n\n' +
        'event: nameserver\ndata: ns3.example.com\n\n' +
        'event: complete\ndata: {"source":"zone","target":"example.com","status":"completed","count":2,' +
        '"message":"Zone transfer scan completed - found 2 nameservers"}\n\n',
    );
    expect((await ctx.stats.snapshot()).totalSubdomains).toBe(0);
  });
});
