import { flattenWordlist } from '../wordlists';
import { resolveCandidates } from './resolvePool';
import type { SourceEnv } from './fetcher';
import type { Finding, SourceOutcome } from '../types';

/**
 * Dictionary brute force: `word.target` for every word in the bundled wordlist,
 * resolved by a pool of `DNS_CONCURRENCY` workers. A lookup that fails only
 * drops that candidate.
 */
export function fetchDnsBrute(
  target: string,
  env: SourceEnv,
  words: readonly string[] = flattenWordlist(),
): AsyncGenerator<Finding, SourceOutcome, undefined> {
  const candidates = words.map((w) => `${w}.${target}`);
  env.logger.debug({ target, candidates: candidates.length }, 'dns brute force started');
  return resolveCandidates(candidates, env, env.config.dns.concurrency);
}

export default fetchDnsBrute;
