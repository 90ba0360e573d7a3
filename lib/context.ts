import { CONFIG, type AppConfig } from './config';
import { logger as rootLogger, type Logger } from './logger';
import { JobRegistry } from './jobs/registry';
import { RateLimiter } from './limits';
import { ScanStatistics } from './metrics';
import { DnsResolver, type HostResolver } from './dns';

/**
 * Everything a request handler needs, built once and passed explicitly.
 * Route handlers share one process-wide instance; tests build their own.
 */
export interface ScanContext {
  config: AppConfig;
  logger: Logger;
  registry: JobRegistry;
  limiter: RateLimiter;
  stats: ScanStatistics;
  resolver: HostResolver;
}

export interface ScanContextOverrides {
  logger?: Logger;
  resolver?: HostResolver;
}

export function createScanContext(config: AppConfig = CONFIG, overrides: ScanContextOverrides = {}): ScanContext {
  const logger = overrides.logger ?? rootLogger;
  const stats = new ScanStatistics();
  const resolver = overrides.resolver ?? new DnsResolver(config.dns, { onQuery: () => stats.incDnsQueries() });
  return {
    config,
    logger,
    stats,
    resolver,
    registry: new JobRegistry({ maxConcurrentJobs: config.security.maxConcurrentJobs, logger: logger.child({ module: 'jobs' }) }),
    limiter: new RateLimiter(config.rateLimit),
  };
}

/** Cancel all jobs and stop the limiter's refill timer. */
export function disposeScanContext(ctx: ScanContext): void {
  ctx.registry.clear();
  ctx.limiter.dispose();
}

declare global {
  // Next.js may load a route module more than once per process; the context lives on globalThis.
  // eslint-disable-next-line no-var
  var __scanContext: ScanContext | undefined;
}

export function getScanContext(): ScanContext {
  if (!globalThis.__scanContext) {
    globalThis.__scanContext = createScanContext();
    globalThis.__scanContext.logger.info({ config: describeConfig(globalThis.__scanContext.config) }, 'scan context ready');
  }
  return globalThis.__scanContext;
}

/** Config fields safe to log or serve. */
export function describeConfig(config: AppConfig) {
  return {
    timeouts: config.timeouts,
    dns: { servers: config.dns.servers, concurrency: config.dns.concurrency, timeoutMs: config.dns.timeoutMs },
    http: {
      maxRedirects: config.http.maxRedirects,
      timeoutMs: config.http.timeoutMs,
      maxBodySize: config.http.maxBodySize,
      skipTlsVerify: config.http.skipTlsVerify,
    },
    rateLimit: config.rateLimit,
    security: {
      maxConcurrentJobs: config.security.maxConcurrentJobs,
      enableCors: config.security.enableCors,
      allowedDomains: config.security.allowedDomains.length,
    },
    permuteConcurrency: config.permuteConcurrency,
    streamQueueSize: config.streamQueueSize,
  };
}
