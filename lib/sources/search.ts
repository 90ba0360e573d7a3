import { fetchUpstream } from '../net/fetchUpstream';
import { abortable } from '../net/timeout';
import { hostFromAuthority, isSubdomainOf } from '../subdomain';
import { CANCELLED, upstreamFailure, type SourceEnv } from './fetcher';
import type { Finding, SourceOutcome } from '../types';

function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

export function searchUrl(target: string): string {
  return `https://www.google.com/search?q=site:${target}`;
}

/**
 * Hosts under `target` linked anywhere in a results page, in page order.
 * Userinfo is dropped; matches that are not hostnames (query strings,
 * encoded URLs) are skipped.
 */
export function hostsInPage(html: string, target: string): string[] {
  const re = new RegExp(`https?://([^/\\s"'<>]+\\.${escapeRegExp(target)})`, 'gi');
  return [...html.matchAll(re)]
    .map((m) => hostFromAuthority(m[1]))
    .filter((host) => isSubdomainOf(host, target));
}

/**
 * Search-engine scrape of a `site:` query. Best-effort: the results page is
 * HTML meant for browsers and may change or be blocked at any time.
 */
export async function* fetchSearch(target: string, env: SourceEnv): AsyncGenerator<Finding, SourceOutcome, undefined> {
  const { signal, config } = env;
  let html: string;
  try {
    const res = await fetchUpstream(searchUrl(target), {
      timeoutMs: config.timeouts.search,
      signal,
      headers: { 'User-Agent': config.http.userAgent },
    });
    html = await abortable(res.text(), signal);
  } catch (err) {
    return upstreamFailure(env, 'search', err);
  }

  for (const host of hostsInPage(html, target)) {
    if (signal.aborted) return CANCELLED;
    if (isSubdomainOf(host, target)) {
      yield { kind: 'host', host };
    }
  }
  return { ok: true };
}

export default fetchSearch;
