import { PERMUTATIONS, type PermutationTable } from '../wordlists';
import { isSubdomainOf } from '../subdomain';
import { resolveCandidates } from './resolvePool';
import type { SourceEnv } from './fetcher';
import type { Finding, SourceOutcome } from '../types';

/**
 * Every name the permutation table produces for `domain`:
 * - `prefix.domain` for each prefix
 * - `base-suffix.rest` and `basesuffix.rest`, where base is the first label
 * - `labelN.domain` for each numbered label and N in range
 *
 * The suffix forms are siblings of `domain`, not subdomains of it.
 */
export function generatePermutations(domain: string, table: PermutationTable = PERMUTATIONS): string[] {
  const out: string[] = table.prefixes.map((p) => `${p}.${domain}`);

  const [base, ...rest] = domain.split('.');
  if (rest.length > 0) {
    const tld = rest.join('.');
    for (const suffix of table.suffixes) {
      out.push(`${base}-${suffix}.${tld}`, `${base}${suffix}.${tld}`);
    }
  }

  const { labels, from, to } = table.numbered;
  for (let i = from; i <= to; i++) {
    for (const label of labels) out.push(`${label}${i}.${domain}`);
  }
  return out;
}

/** Permutation candidates that are strict subdomains of `target`, de-duplicated. */
export function permutationCandidates(target: string, table: PermutationTable = PERMUTATIONS): string[] {
  return [...new Set(generatePermutations(target, table))].filter((h) => isSubdomainOf(h, target));
}

/**
 * Resolve permutation candidates through a pool of `PERMUTE_CONCURRENCY`
 * workers and yield those that exist.
 */
export function fetchPermutations(target: string, env: SourceEnv): AsyncGenerator<Finding, SourceOutcome, undefined> {
  const candidates = permutationCandidates(target);
  env.logger.debug({ target, candidates: candidates.length }, 'permutation scan started');
  return resolveCandidates(candidates, env, env.config.permuteConcurrency);
}

export default fetchPermutations;
