import dns from 'dns/promises';
import type { Resolver } from 'dns/promises';
import { withTimeout, abortable } from './net/timeout';
import { createModuleLogger } from './logger';
import type { DnsConfig } from './config';

const log = createModuleLogger('dns');

export interface DnsResolverHooks {
  /** Called once per upstream query, whatever its outcome. */
  onQuery?: (server: string, ok: boolean) => void;
}

/** What the discovery sources need from name resolution. */
export interface HostResolver {
  lookupHost(host: string, signal?: AbortSignal): Promise<string[]>;
  lookupNs(domain: string, signal?: AbortSignal): Promise<string[]>;
}

interface Upstream {
  server: string;
  resolver: Resolver;
}

/**
 * A-record resolution against a pool of upstream servers (`host:port`),
 * picked round-robin per query, each query bounded by the configured timeout.
 */
export class DnsResolver implements HostResolver {
  private readonly upstreams: Upstream[];
  private readonly timeoutMs: number;
  private cursor = 0;

  constructor(cfg: Pick<DnsConfig, 'servers' | 'timeoutMs' | 'tries'>, private readonly hooks: DnsResolverHooks = {}) {
    if (cfg.servers.length === 0) {
      throw new Error('DnsResolver needs at least one upstream server');
    }
    // a hung upstream must not outlive its share of the query budget
    this.timeoutMs = cfg.timeoutMs * Math.max(1, cfg.tries);
    this.upstreams = cfg.servers.map((server) => {
      const resolver = new dns.Resolver({ timeout: cfg.timeoutMs, tries: Math.max(1, cfg.tries) });
      resolver.setServers([server]);
      return { server, resolver };
    });
  }

  get servers(): string[] {
    return this.upstreams.map((u) => u.server);
  }

  private nextUpstream(): Upstream {
    const u = this.upstreams[this.cursor % this.upstreams.length];
    this.cursor = (this.cursor + 1) % this.upstreams.length;
    return u;
  }

  /**
   * Resolve A records for `host`. Rejects when the query fails, times out,
   * is cancelled, or returns no addresses.
   */
  async lookupHost(host: string, signal?: AbortSignal): Promise<string[]> {
    const { server, resolver } = this.nextUpstream();
    let query = withTimeout(resolver.resolve4(host), this.timeoutMs);
    if (signal) query = abortable(query, signal);
    let ips: string[];
    try {
      ips = await query;
    } catch (err) {
      this.hooks.onQuery?.(server, false);
      throw err;
    }
    this.hooks.onQuery?.(server, ips.length > 0);
    if (ips.length === 0) {
      throw new Error(`no A records found for ${host}`);
    }
    return ips;
  }

  /**
   * Authoritative nameservers for `domain`, via the system resolver.
   */
  async lookupNs(domain: string, signal?: AbortSignal): Promise<string[]> {
    let query = withTimeout(dns.resolveNs(domain), this.timeoutMs);
    if (signal) query = abortable(query, signal);
    const hosts = await query;
    log.debug({ domain, count: hosts.length }, 'nameserver lookup');
    return hosts.map((h) => h.toLowerCase().replace(/\.$/, ''));
  }
}
