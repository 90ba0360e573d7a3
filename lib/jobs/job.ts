import { randomUUID } from 'crypto';
import type { CancelReason, JobDetail, JobSnapshot, JobStatus, SourceId } from '../types';

/**
 * One discovery run for a (target, source) pair.
 *
 * The job owns the AbortController every fetcher, worker and upstream request
 * of the run listens to, the per-run seen-set used for deduplication, and the
 * deadline timer. Status moves once from `running` to a terminal state.
 */
export class Job {
  readonly id = randomUUID();
  readonly startedAt = new Date();
  status: JobStatus = 'running';
  cancelReason?: CancelReason;

  private readonly controller = new AbortController();
  private readonly seen = new Set<string>();
  private deadline: ReturnType<typeof setTimeout> | null = null;

  constructor(
    readonly target: string,
    readonly source: SourceId,
  ) {}

  get key(): string {
    return jobKey(this.target, this.source);
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get cancelled(): boolean {
    return this.controller.signal.aborted;
  }

  /** Number of unique hosts accepted so far. */
  get discovered(): number {
    return this.seen.size;
  }

  /**
   * Record `host` for this run. Returns false when it was already seen.
   */
  accept(host: string): boolean {
    if (this.seen.has(host)) return false;
    this.seen.add(host);
    return true;
  }

  /** Cancel the job with `reason` once `ms` elapses. */
  armDeadline(ms: number): void {
    this.clearDeadline();
    this.deadline = setTimeout(() => this.cancel('deadline'), ms);
    this.deadline.unref();
  }

  clearDeadline(): void {
    if (this.deadline) {
      clearTimeout(this.deadline);
      this.deadline = null;
    }
  }

  /**
   * Signal cancellation. The first reason wins; later calls are no-ops.
   * Returns true when this call cancelled the job.
   */
  cancel(reason: CancelReason): boolean {
    if (this.cancelled || this.status !== 'running') return false;
    this.cancelReason = reason;
    this.clearDeadline();
    this.controller.abort(reason);
    return true;
  }

  /** Move to a terminal status. Only the first call has an effect. */
  finish(status: Exclude<JobStatus, 'running'>): void {
    if (this.status !== 'running') return;
    this.status = status;
    this.clearDeadline();
  }

  snapshot(): JobSnapshot {
    return {
      id: this.id,
      target: this.target,
      source: this.source,
      status: this.status,
      startedAt: this.startedAt.toISOString(),
      discovered: this.discovered,
      ...(this.cancelReason ? { cancelReason: this.cancelReason } : {}),
    };
  }

  /** Hosts seen so far, in first-discovered order. */
  results(): string[] {
    return [...this.seen];
  }

  detail(): JobDetail {
    return { ...this.snapshot(), results: this.results() };
  }
}

export function jobKey(target: string, source: SourceId): string {
  return `${target}|${source}`;
}
