/**
 * Scan statistics backed by `prom-client`.
 *
 * Each scan context owns a private `Registry` so that isolated contexts (tests,
 * multiple instances in one process) never share counters. `snapshot()` reads
 * the registered metrics back into the JSON shape served by `/api/stats`.
 *
 * Metrics:
 * - `subdomain_scout_requests_total` (Counter)
 * - `subdomain_scout_rate_limited_total` (Counter)
 * - `subdomain_scout_jobs_active` (Gauge)
 * - `subdomain_scout_jobs_finished_total{outcome}` (Counter)
 * - `subdomain_scout_subdomains_total` (Counter)
 * - `subdomain_scout_probes_total{result}` (Counter)
 * - `subdomain_scout_dns_queries_total` (Counter)
 * - `subdomain_scout_source_events_total{source,kind}` (Counter)
 * - `subdomain_scout_probe_latency_seconds` (Histogram)
 */

import { Counter, Gauge, Histogram, Registry } from 'prom-client';
import type { SourceId } from './types';

export type JobOutcome = 'completed' | 'failed' | 'cancelled';

type SourceEventKind = 'requests' | 'results' | 'errors';

export interface SourceStats {
  requests: number;
  results: number;
  errors: number;
}

export interface StatsSnapshot {
  totalRequests: number;
  rateLimitedRequests: number;
  activeJobs: number;
  completedJobs: number;
  failedJobs: number;
  cancelledJobs: number;
  totalSubdomains: number;
  totalProbes: number;
  successfulProbes: number;
  dnsQueries: number;
  sources: Record<SourceId, SourceStats>;
  startTime: string;
  lastActivity: string;
  uptimeSeconds: number;
}

export class ScanStatistics {
  readonly register = new Registry();

  private readonly requestsTotal: Counter;
  private readonly rateLimitedTotal: Counter;
  private readonly activeJobs: Gauge;
  private readonly jobsFinished: Counter<'outcome'>;
  private readonly subdomainsTotal: Counter;
  private readonly probesTotal: Counter<'result'>;
  private readonly dnsQueriesTotal: Counter;
  private readonly sourceEvents: Counter<'source' | 'kind'>;
  private readonly probeLatency: Histogram;

  private readonly startedAt = new Date();
  private lastActivity = new Date();

  constructor() {
    const registers = [this.register];
    this.requestsTotal = new Counter({
      name: 'subdomain_scout_requests_total',
      help: 'Total number of API requests handled',
      registers,
    });
    this.rateLimitedTotal = new Counter({
      name: 'subdomain_scout_rate_limited_total',
      help: 'Total number of API requests rejected by the rate limiter',
      registers,
    });
    this.activeJobs = new Gauge({
      name: 'subdomain_scout_jobs_active',
      help: 'Discovery jobs currently running',
      registers,
    });
    this.jobsFinished = new Counter({
      name: 'subdomain_scout_jobs_finished_total',
      help: 'Discovery jobs by terminal outcome',
      labelNames: ['outcome'],
      registers,
    });
    this.subdomainsTotal = new Counter({
      name: 'subdomain_scout_subdomains_total',
      help: 'Unique subdomains streamed to clients',
      registers,
    });
    this.probesTotal = new Counter({
      name: 'subdomain_scout_probes_total',
      help: 'HTTP probes by result',
      labelNames: ['result'],
      registers,
    });
    this.dnsQueriesTotal = new Counter({
      name: 'subdomain_scout_dns_queries_total',
      help: 'DNS queries sent to upstream resolvers',
      registers,
    });
    this.sourceEvents = new Counter({
      name: 'subdomain_scout_source_events_total',
      help: 'Per-source requests, results and errors',
      labelNames: ['source', 'kind'],
      registers,
    });
    this.probeLatency = new Histogram({
      name: 'subdomain_scout_probe_latency_seconds',
      help: 'Histogram of HTTP probe latency in seconds',
      buckets: [0.05, 0.1, 0.25, 0.5, 1, 2, 5, 10],
      registers,
    });
  }

  private touch(): void {
    this.lastActivity = new Date();
  }

  incRequests(): void {
    this.requestsTotal.inc();
    this.touch();
  }

  incRateLimited(): void {
    this.rateLimitedTotal.inc();
  }

  jobStarted(source: SourceId): void {
    this.activeJobs.inc();
    this.sourceEvents.inc({ source, kind: 'requests' });
    this.touch();
  }

  jobFinished(outcome: JobOutcome): void {
    this.activeJobs.dec();
    this.jobsFinished.inc({ outcome });
    this.touch();
  }

  incSubdomains(source: SourceId): void {
    this.subdomainsTotal.inc();
    this.sourceEvents.inc({ source, kind: 'results' });
  }

  incSourceErrors(source: SourceId): void {
    this.sourceEvents.inc({ source, kind: 'errors' });
  }

  incDnsQueries(): void {
    this.dnsQueriesTotal.inc();
  }

  /**
   * Record a finished probe. `seconds` is dropped when not a finite, non-negative number.
   */
  observeProbe(ok: boolean, seconds: number): void {
    this.probesTotal.inc({ result: ok ? 'success' : 'failure' });
    if (Number.isFinite(seconds) && seconds >= 0) {
      this.probeLatency.observe(seconds);
    }
    this.touch();
  }

  async snapshot(): Promise<StatsSnapshot> {
    const [requests, rateLimited, active, finished, subdomains, probes, dnsQueries, sourceEvents] = await Promise.all([
      this.requestsTotal.get(),
      this.rateLimitedTotal.get(),
      this.activeJobs.get(),
      this.jobsFinished.get(),
      this.subdomainsTotal.get(),
      this.probesTotal.get(),
      this.dnsQueriesTotal.get(),
      this.sourceEvents.get(),
    ]);

    const total = (values: { value: number }[]) => values.reduce((sum, v) => sum + v.value, 0);
    const labelled = (values: { value: number; labels: Record<string, string | number | undefined> }[], match: Record<string, string>) =>
      total(values.filter((v) => Object.entries(match).every(([k, want]) => v.labels[k] === want)));

    const perSource = (source: SourceId): SourceStats => {
      const kindCount = (kind: SourceEventKind) => labelled(sourceEvents.values, { source, kind });
      return { requests: kindCount('requests'), results: kindCount('results'), errors: kindCount('errors') };
    };

    const probeTotal = total(probes.values);
    return {
      totalRequests: total(requests.values),
      rateLimitedRequests: total(rateLimited.values),
      activeJobs: total(active.values),
      completedJobs: labelled(finished.values, { outcome: 'completed' }),
      failedJobs: labelled(finished.values, { outcome: 'failed' }),
      cancelledJobs: labelled(finished.values, { outcome: 'cancelled' }),
      totalSubdomains: total(subdomains.values),
      totalProbes: probeTotal,
      successfulProbes: labelled(probes.values, { result: 'success' }),
      dnsQueries: total(dnsQueries.values),
      sources: {
        wayback: perSource('wayback'),
        crtsh: perSource('crtsh'),
        dns: perSource('dns'),
        search: perSource('search'),
        permute: perSource('permute'),
        zone: perSource('zone'),
      },
      startTime: this.startedAt.toISOString(),
      lastActivity: this.lastActivity.toISOString(),
      uptimeSeconds: Math.floor((Date.now() - this.startedAt.getTime()) / 1000),
    };
  }
}

export default ScanStatistics;
