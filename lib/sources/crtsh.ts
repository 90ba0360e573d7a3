import { fetchUpstream } from '../net/fetchUpstream';
import { abortable } from '../net/timeout';
import { UpstreamError } from '../errors';
import { cleanCandidate, isSubdomainOf } from '../subdomain';
import { CANCELLED, upstreamFailure, type SourceEnv } from './fetcher';
import type { Finding, SourceOutcome } from '../types';

interface CrtShEntry {
  name_value: string;
}

function isCrtShEntry(v: unknown): v is CrtShEntry {
  return typeof v === 'object' && v !== null && 'name_value' in v && typeof v.name_value === 'string';
}

export function crtshUrl(target: string): string {
  return `https://crt.sh/?q=%25.${target}&output=json`;
}

/**
 * Candidate names of one certificate entry: `name_value` holds one SAN per line.
 */
export function namesFromEntry(entry: CrtShEntry): string[] {
  return entry.name_value
    .split('\n')
    .map(cleanCandidate)
    .filter(Boolean);
}

/**
 * crt.sh: Certificate Transparency log search.
 * One JSON request, then names are relayed in response order.
 */
export async function* fetchCrtSh(target: string, env: SourceEnv): AsyncGenerator<Finding, SourceOutcome, undefined> {
  const { signal, config } = env;
  let data: unknown;
  try {
    const res = await fetchUpstream(crtshUrl(target), {
      timeoutMs: config.timeouts.crtsh,
      signal,
      headers: { Accept: 'application/json', 'User-Agent': config.http.userAgent },
    });
    const contentType = res.headers.get('content-type') ?? '';
    if (!contentType.includes('json')) {
      throw new UpstreamError('crt.sh', `unexpected content type: ${contentType || 'none'}`);
    }
    data = await abortable(res.json(), signal);
  } catch (err) {
    return upstreamFailure(env, 'crtsh', err);
  }

  if (!Array.isArray(data)) {
    return upstreamFailure(env, 'crtsh', new UpstreamError('crt.sh', 'response is not a JSON array'));
  }

  for (const entry of data) {
    if (signal.aborted) return CANCELLED;
    if (!isCrtShEntry(entry)) continue;
    for (const host of namesFromEntry(entry)) {
      if (isSubdomainOf(host, target)) {
        yield { kind: 'host', host };
      }
    }
  }
  return { ok: true };
}

export default fetchCrtSh;
