import { Agent, request, type Dispatcher } from 'undici';
import { errorMessage } from './errors';
import type { HttpConfig } from './config';
import type { ProbeResult } from './types';

const TITLE_RE = /<title[^>]*>([\s\S]*?)<\/title>/i;
const MAX_TITLE_LENGTH = 100;
const REDIRECT_CODES = new Set([301, 302, 303, 307, 308]);
const CONNECT_TIMEOUT_MS = 5000;

export type ProbeOptions = Pick<HttpConfig, 'userAgent' | 'maxRedirects' | 'timeoutMs' | 'maxBodySize' | 'skipTlsVerify'> & {
  signal?: AbortSignal;
};

type ProbeOutcome = Pick<ProbeResult, 'status' | 'title' | 'error'>;

// One pooled agent per TLS mode. Skipping verification is the default: scanned
// hosts routinely present self-signed or mismatched certificates.
const agents = new Map<boolean, Agent>();

function agentFor(skipTlsVerify: boolean): Agent {
  let agent = agents.get(skipTlsVerify);
  if (!agent) {
    agent = new Agent({ connect: { rejectUnauthorized: !skipTlsVerify, timeout: CONNECT_TIMEOUT_MS } });
    agents.set(skipTlsVerify, agent);
  }
  return agent;
}

/**
 * First `<title>` of a page: whitespace runs collapsed, trimmed, cut to 100
 * characters plus `...`. Entities are left as written. "No title" when absent.
 */
export function extractTitle(html: string): string {
  const m = TITLE_RE.exec(html);
  if (!m) return 'No title';
  const title = m[1].replace(/\s+/g, ' ').trim();
  const chars = [...title];
  return chars.length > MAX_TITLE_LENGTH ? `${chars.slice(0, MAX_TITLE_LENGTH).join('')}...` : title;
}

function describeError(err: unknown): string {
  const msg = errorMessage(err);
  if (err instanceof Error && err.cause instanceof Error && !msg.includes(err.cause.message)) {
    return `${msg}: ${err.cause.message}`;
  }
  return msg;
}

function parseProbeUrl(raw: string): URL {
  const url = new URL(raw);
  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    throw new Error(`unsupported scheme ${url.protocol}`);
  }
  return url;
}

async function readCapped(body: Dispatcher.ResponseData['body'], maxBytes: number): Promise<string> {
  const chunks: Buffer[] = [];
  let size = 0;
  for await (const chunk of body) {
    const buf: Buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
    const room = maxBytes - size;
    chunks.push(buf.length > room ? buf.subarray(0, room) : buf);
    size += Math.min(buf.length, room);
    // leaving the loop early destroys the body stream
    if (size >= maxBytes) break;
  }
  return Buffer.concat(chunks).toString('utf8');
}

function locationOf(headers: Dispatcher.ResponseData['headers']): string | undefined {
  const loc = headers['location'];
  return Array.isArray(loc) ? loc[0] : loc;
}

async function probeOnce(raw: string, opts: ProbeOptions, signal: AbortSignal): Promise<ProbeOutcome> {
  let url: URL;
  try {
    url = parseProbeUrl(raw);
  } catch (err) {
    return { status: '0', title: 'Connection failed', error: `invalid URL: ${errorMessage(err)}` };
  }

  let redirects = 0;
  for (;;) {
    let res: Dispatcher.ResponseData;
    try {
      res = await request(url, {
        method: 'GET',
        headers: {
          'User-Agent': opts.userAgent,
          Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
          'Accept-Language': 'en-US,en;q=0.5',
        },
        dispatcher: agentFor(opts.skipTlsVerify),
        signal,
        headersTimeout: opts.timeoutMs,
        bodyTimeout: opts.timeoutMs,
      });
    } catch (err) {
      return { status: '0', title: 'Connection failed', error: describeError(err) };
    }

    const location = locationOf(res.headers);
    if (REDIRECT_CODES.has(res.statusCode) && location) {
      res.body.destroy();
      if (redirects >= opts.maxRedirects) {
        return { status: '0', title: 'Connection failed', error: `too many redirects (${opts.maxRedirects})` };
      }
      redirects++;
      try {
        url = parseProbeUrl(new URL(location, url).toString());
      } catch (err) {
        return { status: '0', title: 'Connection failed', error: `invalid redirect: ${errorMessage(err)}` };
      }
      continue;
    }

    const status = String(res.statusCode);
    try {
      const html = await readCapped(res.body, opts.maxBodySize);
      return { status, title: extractTitle(html), error: '' };
    } catch (err) {
      return { status, title: 'Failed to read response', error: describeError(err) };
    }
  }
}

/**
 * Single liveness check of `url`. Never rejects: every failure is reported in
 * the result, with status "0" when no response was received.
 */
export async function probe(url: string, opts: ProbeOptions): Promise<ProbeResult> {
  const started = Date.now();
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(new Error(`probe timed out after ${opts.timeoutMs}ms`)), opts.timeoutMs);
  const onAbort = () => controller.abort(new Error('probe cancelled'));
  opts.signal?.addEventListener('abort', onAbort, { once: true });
  try {
    const outcome = await probeOnce(url, opts, controller.signal);
    return { url, ...outcome, probeTimeMs: Date.now() - started };
  } finally {
    clearTimeout(timer);
    opts.signal?.removeEventListener('abort', onAbort);
  }
}

/**
 * Probe a URL as given, or, for a bare host, HTTPS first and HTTP when HTTPS
 * gets no response at all.
 */
export async function probeWithFallback(input: string, opts: ProbeOptions): Promise<ProbeResult> {
  const trimmed = input.trim();
  if (/^[a-z][a-z0-9+.-]*:\/\//i.test(trimmed)) return probe(trimmed, opts);
  const secure = await probe(`https://${trimmed}`, opts);
  if (secure.status !== '0') return secure;
  return probe(`http://${trimmed}`, opts);
}
