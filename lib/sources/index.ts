import fetchWebArchive from './webarchive';
import fetchCrtSh from './crtsh';
import fetchDnsBrute from './dnsBrute';
import fetchSearch from './search';
import fetchPermutations from './permute';
import fetchZone from './zone';
import { SOURCE_IDS, type SourceId } from '../types';
import type { SourceDefinition } from './fetcher';

export type { SourceDefinition, SourceEnv, SourceFetcher } from './fetcher';

export const SOURCES: Record<SourceId, SourceDefinition> = {
  wayback: {
    id: 'wayback',
    label: 'Wayback',
    resultNoun: 'subdomains',
    fetch: fetchWebArchive,
    timeoutMs: (c) => c.timeouts.wayback,
  },
  crtsh: {
    id: 'crtsh',
    label: 'Certificate transparency',
    resultNoun: 'subdomains',
    fetch: fetchCrtSh,
    timeoutMs: (c) => c.timeouts.crtsh,
  },
  dns: {
    id: 'dns',
    label: 'DNS brute force',
    resultNoun: 'subdomains',
    fetch: (target, env) => fetchDnsBrute(target, env),
    timeoutMs: (c) => c.timeouts.dns,
  },
  search: {
    id: 'search',
    label: 'Search engine',
    resultNoun: 'subdomains',
    fetch: fetchSearch,
    timeoutMs: (c) => c.timeouts.search,
  },
  permute: {
    id: 'permute',
    label: 'Permutation',
    resultNoun: 'subdomains',
    fetch: fetchPermutations,
    timeoutMs: (c) => c.timeouts.permute,
  },
  zone: {
    id: 'zone',
    label: 'Zone transfer',
    resultNoun: 'nameservers',
    fetch: fetchZone,
    timeoutMs: (c) => c.timeouts.zone,
  },
};

export function isSourceId(value: string): value is SourceId {
  return SOURCE_IDS.some((id) => id === value);
}

export function getSource(id: SourceId): SourceDefinition {
  return SOURCES[id];
}
