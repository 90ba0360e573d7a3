import { errorMessage } from '../errors';
import type { AppConfig } from '../config';
import type { HostResolver } from '../dns';
import type { Logger } from '../logger';
import type { ScanStatistics } from '../metrics';
import type { Finding, SourceId, SourceOutcome } from '../types';

/** Everything a fetcher may touch while it runs. */
export interface SourceEnv {
  signal: AbortSignal;
  config: AppConfig;
  resolver: HostResolver;
  logger: Logger;
  stats: ScanStatistics;
}

/**
 * A discovery source. Yields findings lazily, checks `env.signal` between units
 * of work and returns how it ended. It never throws for upstream failures.
 */
export type SourceFetcher = (target: string, env: SourceEnv) => AsyncGenerator<Finding, SourceOutcome, undefined>;

export interface SourceDefinition {
  id: SourceId;
  label: string;
  /** Noun used in completion messages ("found 3 subdomains"). */
  resultNoun: string;
  fetch: SourceFetcher;
  timeoutMs: (config: AppConfig) => number;
}

export const CANCELLED: SourceOutcome = { ok: false, reason: 'cancelled' };

/**
 * Turn an upstream error into a failed outcome, logging it unless the job was
 * cancelled underneath the request.
 */
export function upstreamFailure(env: SourceEnv, source: SourceId, err: unknown): SourceOutcome {
  if (env.signal.aborted) return CANCELLED;
  const reason = errorMessage(err);
  env.logger.warn({ err, source }, 'source ended with upstream failure');
  return { ok: false, reason };
}
