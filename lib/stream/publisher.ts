import { BoundedChannel } from './channel';
import { errorMessage } from '../errors';
import { CANCELLED, type SourceDefinition, type SourceEnv } from '../sources/fetcher';
import type { Job } from '../jobs/job';
import type { ScanContext } from '../context';
import type { CancelledEvent, CompleteEvent, Finding, SourceOutcome } from '../types';

const encoder = new TextEncoder();

export const SSE_HEADERS: Record<string, string> = {
  'Content-Type': 'text/event-stream',
  'Cache-Control': 'no-cache, no-transform',
  Connection: 'keep-alive',
  'X-Accel-Buffering': 'no',
};

/** One server-sent event; multi-line data is split across `data:` fields. */
export function sseFrame(data: string, event?: string): string {
  const body = data
    .split(/\r?\n/)
    .map((line) => `data: ${line}`)
    .join('\n');
  return event ? `event: ${event}\n${body}\n\n` : `${body}\n\n`;
}

const CANCEL_MESSAGES = {
  superseded: 'superseded by a newer request',
  aborted: 'aborted by request',
  deadline: 'timed out',
  client: 'client disconnected',
} as const;

/**
 * Drive `source` for `job` and expose the run as a `text/event-stream` body.
 *
 * A producer task pumps the fetcher into a bounded channel; the stream's pull
 * side drains it. Each new host is one default `data:` event. The stream always
 * ends with exactly one `complete` or `cancelled` event, after which the job
 * is finished and released from the registry.
 */
export function publishJob(job: Job, source: SourceDefinition, ctx: ScanContext): ReadableStream<Uint8Array> {
  const log = ctx.logger.child({ jobId: job.id, target: job.target, source: job.source });
  const channel = new BoundedChannel<string>(ctx.config.streamQueueSize);

  const frameFor = (finding: Finding): string | null => {
    switch (finding.kind) {
      case 'host':
        if (!job.accept(finding.host)) return null;
        ctx.stats.incSubdomains(job.source);
        return sseFrame(finding.host);
      case 'nameserver':
        return job.accept(finding.host) ? sseFrame(finding.host, 'nameserver') : null;
      case 'status':
        return sseFrame(`${finding.level}: ${finding.message}`, 'status');
    }
  };

  const terminate = (outcome: SourceOutcome): string => {
    const count = job.discovered;
    if (job.cancelled) {
      const reason = job.cancelReason ?? 'aborted';
      job.finish('cancelled');
      ctx.stats.jobFinished('cancelled');
      log.info({ reason, count }, 'job cancelled');
      const event: CancelledEvent = {
        source: job.source,
        target: job.target,
        reason,
        count,
        message: `${source.label} scan cancelled: ${CANCEL_MESSAGES[reason]}`,
      };
      return sseFrame(JSON.stringify(event), 'cancelled');
    }

    const found = `found ${count} ${source.resultNoun}`;
    let event: CompleteEvent;
    if (outcome.ok) {
      job.finish('completed');
      ctx.stats.jobFinished('completed');
      log.info({ count }, 'job completed');
      event = { source: job.source, target: job.target, status: 'completed', count, message: `${source.label} scan completed - ${found}` };
    } else {
      job.finish('failed');
      ctx.stats.jobFinished('failed');
      ctx.stats.incSourceErrors(job.source);
      log.warn({ count, reason: outcome.reason }, 'job completed with errors');
      event = {
        source: job.source,
        target: job.target,
        status: 'completed_with_errors',
        count,
        message: `${source.label} scan completed with errors - ${found}`,
        error: outcome.reason,
      };
    }
    return sseFrame(JSON.stringify(event), 'complete');
  };

  const produce = async (): Promise<void> => {
    const env: SourceEnv = { signal: job.signal, config: ctx.config, resolver: ctx.resolver, logger: log, stats: ctx.stats };
    const findings = source.fetch(job.target, env);
    let outcome: SourceOutcome = CANCELLED;
    try {
      for (;;) {
        if (job.cancelled) {
          await findings.return(CANCELLED);
          break;
        }
        const step = await findings.next();
        if (step.done) {
          outcome = step.value;
          break;
        }
        const frame = frameFor(step.value);
        if (frame !== null && !(await channel.push(frame, job.signal))) {
          await findings.return(CANCELLED);
          break;
        }
      }
    } catch (err) {
      if (!job.cancelled) log.error({ err }, 'source fetcher threw');
      outcome = { ok: false, reason: errorMessage(err) };
    } finally {
      channel.close(terminate(outcome));
      ctx.registry.release(job);
    }
  };

  let detached = false;
  return new ReadableStream<Uint8Array>({
    start() {
      ctx.stats.jobStarted(job.source);
      log.info('job started');
      produce().catch((err) => log.error({ err }, 'stream producer failed'));
    },
    async pull(controller) {
      const next = await channel.take();
      // the reader is gone once cancel() has run
      if (detached) return;
      if (next.done) {
        controller.close();
        return;
      }
      controller.enqueue(encoder.encode(next.value));
    },
    cancel() {
      detached = true;
      job.cancel('client');
      channel.discard();
    },
  });
}

export default publishJob;
