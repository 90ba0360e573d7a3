import { fetchUpstream } from '../net/fetchUpstream';
import { abortable } from '../net/timeout';
import { hostFromAuthority, isSubdomainOf } from '../subdomain';
import { CANCELLED, upstreamFailure, type SourceEnv } from './fetcher';
import type { Finding, SourceOutcome } from '../types';

// First host in a line of the CDX text output
const HOST_RE = /https?:\/\/([^/\s"'<>]+)/;

export function waybackUrl(target: string): string {
  return `https://web.archive.org/cdx/search/cdx?url=*.${target}/*&output=text&fl=original&collapse=urlkey`;
}

/**
 * Host of an archived URL line, lowercased, with any userinfo and port removed.
 * Returns null when the line has no URL.
 */
export function hostFromArchiveLine(line: string): string | null {
  const m = HOST_RE.exec(line);
  if (!m) return null;
  return hostFromAuthority(m[1]);
}

/**
 * Wayback Machine CDX index: every archived URL under the target, one per line,
 * relayed in document order.
 */
export async function* fetchWebArchive(target: string, env: SourceEnv): AsyncGenerator<Finding, SourceOutcome, undefined> {
  const { signal, config } = env;
  let body: string;
  try {
    const res = await fetchUpstream(waybackUrl(target), {
      timeoutMs: config.timeouts.wayback,
      signal,
      headers: { 'User-Agent': config.http.userAgent },
    });
    body = await abortable(res.text(), signal);
  } catch (err) {
    return upstreamFailure(env, 'wayback', err);
  }

  for (const line of body.split('\n')) {
    if (signal.aborted) return CANCELLED;
    const host = hostFromArchiveLine(line);
    if (host && isSubdomainOf(host, target)) {
      yield { kind: 'host', host };
    }
  }
  return { ok: true };
}

export default fetchWebArchive;
