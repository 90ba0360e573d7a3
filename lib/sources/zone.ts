import { tcpReachable } from '../net/tcp';
import { errorMessage } from '../errors';
import { CANCELLED, upstreamFailure, type SourceEnv } from './fetcher';
import type { Finding, SourceOutcome } from '../types';

const DNS_PORT = 53;

/**
 * Zone-transfer reachability probe.
 *
 * Looks up the target's authoritative nameservers and opens a TCP connection
 * to port 53 on each; reachable ones are reported as `nameserver` findings.
 * No AXFR query is sent.
 */
export async function* fetchZone(target: string, env: SourceEnv): AsyncGenerator<Finding, SourceOutcome, undefined> {
  const { signal, resolver, logger, config } = env;
  let nameservers: string[];
  try {
    nameservers = await resolver.lookupNs(target, signal);
  } catch (err) {
    return upstreamFailure(env, 'zone', new Error(`failed to lookup NS records: ${errorMessage(err)}`));
  }

  yield { kind: 'status', level: 'info', message: `Found ${nameservers.length} nameservers for ${target}` };

  for (const ns of nameservers) {
    if (signal.aborted) return CANCELLED;
    yield { kind: 'status', level: 'info', message: `Testing nameserver ${ns}` };
    try {
      await tcpReachable(ns, DNS_PORT, config.zoneConnectTimeoutMs, signal);
    } catch (err) {
      if (signal.aborted) return CANCELLED;
      logger.warn({ err, nameserver: ns, target }, 'nameserver unreachable');
      yield { kind: 'status', level: 'error', message: `Failed to connect to ${ns}: ${errorMessage(err)}` };
      continue;
    }
    logger.debug({ nameserver: ns, target }, 'nameserver reachable');
    yield { kind: 'nameserver', host: ns };
  }
  return { ok: true };
}

export default fetchZone;
