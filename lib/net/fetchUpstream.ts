import pLimit from 'p-limit';
import { createModuleLogger } from '../logger';
import { UpstreamError, errorMessage } from '../errors';

const log = createModuleLogger('fetchUpstream');

// Upstream APIs are shared by every job; cap in-flight requests per host.
const PER_HOST_CONCURRENCY = 5;
const hostLimitMap = new Map<string, pLimit.Limit>();

function getHostFromUrl(url: string): string {
  try {
    return new URL(url).host;
  } catch {
    return 'default';
  }
}

function getLimitForHost(host: string): pLimit.Limit {
  let limit = hostLimitMap.get(host);
  if (!limit) {
    limit = pLimit(PER_HOST_CONCURRENCY);
    hostLimitMap.set(host, limit);
  }
  return limit;
}

export interface FetchUpstreamOptions {
  timeoutMs: number; // per-request timeout
  signal?: AbortSignal; // job cancellation
  headers?: Record<string, string>;
}

/**
 * Single-attempt GET against an upstream API. Rejects with UpstreamError on
 * network failure, timeout or a non-2xx status; the caller owns the body.
 * A fresh client request is the only retry mechanism.
 */
export async function fetchUpstream(url: string, opts: FetchUpstreamOptions): Promise<Response> {
  const upstream = getHostFromUrl(url);
  return getLimitForHost(upstream)(() => execFetch(url, upstream, opts));
}

async function execFetch(url: string, upstream: string, opts: FetchUpstreamOptions): Promise<Response> {
  if (opts.signal?.aborted) {
    throw new UpstreamError(upstream, 'request cancelled');
  }
  const controller = new AbortController();
  const id = setTimeout(() => controller.abort(), opts.timeoutMs);
  // stays attached so a cancelled job also stops the body download
  opts.signal?.addEventListener('abort', () => controller.abort(), { once: true });
  try {
    const res = await fetch(url, { headers: opts.headers, signal: controller.signal });
    if (!res.ok) {
      log.debug({ url, status: res.status }, 'upstream returned non-success status');
      throw new UpstreamError(upstream, `HTTP ${res.status}`);
    }
    return res;
  } catch (err) {
    if (err instanceof UpstreamError) throw err;
    if (err instanceof Error && err.name === 'AbortError') {
      log.debug({ url }, 'upstream request aborted');
      throw new UpstreamError(upstream, 'request aborted or timed out');
    }
    log.debug({ url, err }, 'upstream network error');
    throw new UpstreamError(upstream, errorMessage(err));
  } finally {
    clearTimeout(id);
  }
}

export default fetchUpstream;
