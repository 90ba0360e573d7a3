import pLimit from 'p-limit';
import { BoundedChannel } from '../stream/channel';
import { CANCELLED, type SourceEnv } from './fetcher';
import type { Finding, SourceOutcome } from '../types';

/**
 * Resolve every candidate through a bounded worker pool and yield the ones with
 * at least one A record, in the order their lookups succeed.
 *
 * Cancellation clears the pool's pending queue and ends the sequence; lookups
 * already in flight are abandoned through the job signal.
 */
export async function* resolveCandidates(
  candidates: readonly string[],
  env: SourceEnv,
  concurrency: number,
): AsyncGenerator<Finding, SourceOutcome, undefined> {
  const { signal, resolver, logger } = env;
  const limit = pLimit(Math.max(1, concurrency));
  const found = new BoundedChannel<string>(env.config.streamQueueSize);

  const stop = () => {
    limit.clearQueue();
    found.discard();
  };
  signal.addEventListener('abort', stop, { once: true });

  const lookups = candidates.map((host) =>
    limit(async () => {
      if (signal.aborted) return;
      try {
        await resolver.lookupHost(host, signal);
      } catch (err) {
        logger.debug({ err, host }, 'candidate did not resolve');
        return;
      }
      await found.push(host, signal);
    }),
  );
  // every lookup handles its own failure, so this settles once the pool drains
  const drained = Promise.all(lookups).then(() => found.close());

  try {
    for (;;) {
      const next = await found.take();
      if (next.done) break;
      yield { kind: 'host', host: next.value };
    }
    if (signal.aborted) return CANCELLED;
    await drained;
    return { ok: true };
  } finally {
    signal.removeEventListener('abort', stop);
    if (!found.isClosed) stop();
  }
}
