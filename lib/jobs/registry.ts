import { Job, jobKey } from './job';
import { CapacityError } from '../errors';
import type { Logger } from '../logger';
import type { JobSnapshot, SourceId, TargetStatus } from '../types';

export interface JobRegistryOptions {
  maxConcurrentJobs: number;
  logger: Logger;
}

/**
 * Process-wide table of running jobs keyed by (target, source).
 *
 * Every method is synchronous, so each call is atomic with respect to the
 * event loop: a supersede cancels the old job and installs the new one with no
 * await in between.
 */
export class JobRegistry {
  private readonly jobs = new Map<string, Job>();
  private readonly maxConcurrentJobs: number;
  private readonly log: Logger;

  constructor(opts: JobRegistryOptions) {
    this.maxConcurrentJobs = opts.maxConcurrentJobs;
    this.log = opts.logger;
  }

  get size(): number {
    return this.jobs.size;
  }

  /**
   * Start a job for (target, source), cancelling whatever already runs under that
   * key. Throws CapacityError when the running-job limit would be exceeded.
   */
  register(target: string, source: SourceId, timeoutMs: number): Job {
    const key = jobKey(target, source);
    const previous = this.jobs.get(key);
    const others = previous ? this.jobs.size - 1 : this.jobs.size;
    if (others >= this.maxConcurrentJobs) {
      throw new CapacityError(this.maxConcurrentJobs);
    }

    if (previous) {
      previous.cancel('superseded');
      this.jobs.delete(key);
      this.log.info({ target, source, jobId: previous.id }, 'job superseded');
    }

    const job = new Job(target, source);
    job.armDeadline(timeoutMs);
    this.jobs.set(key, job);
    this.log.info({ target, source, jobId: job.id, timeoutMs }, 'job registered');
    return job;
  }

  /**
   * Remove the job's slot, but only while it still holds that job; a superseded
   * job finishing late must not evict its successor.
   */
  release(job: Job): void {
    if (this.jobs.get(job.key) === job) this.jobs.delete(job.key);
  }

  /** Cancel and remove every job for `target`. Returns how many were cancelled. */
  abort(target: string): number {
    let count = 0;
    for (const [key, job] of this.jobs) {
      if (job.target !== target) continue;
      if (job.cancel('aborted')) count++;
      this.jobs.delete(key);
    }
    if (count > 0) this.log.info({ target, count }, 'jobs aborted');
    return count;
  }

  status(target: string): TargetStatus {
    const jobs = [...this.jobs.values()].filter((j) => j.target === target);
    return {
      target,
      active: jobs.length > 0,
      sources: jobs.map((j) => j.source),
      jobs: jobs.map((j) => j.snapshot()),
    };
  }

  list(): JobSnapshot[] {
    return [...this.jobs.values()].map((j) => j.snapshot());
  }

  get(id: string): Job | undefined {
    for (const job of this.jobs.values()) {
      if (job.id === id) return job;
    }
    return undefined;
  }

  /** Cancel everything; used on shutdown. */
  clear(): void {
    for (const job of this.jobs.values()) job.cancel('aborted');
    this.jobs.clear();
  }
}

export default JobRegistry;
