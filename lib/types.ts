export const SOURCE_IDS = ['wayback', 'crtsh', 'dns', 'search', 'permute', 'zone'] as const;

export type SourceId = (typeof SOURCE_IDS)[number];

export type JobStatus = 'running' | 'completed' | 'cancelled' | 'failed';

export type CancelReason = 'superseded' | 'aborted' | 'deadline' | 'client';

export interface JobSnapshot {
  id: string;
  target: string;
  source: SourceId;
  status: JobStatus;
  startedAt: string; // ISO timestamp
  discovered: number;
  cancelReason?: CancelReason;
}

/** A job as returned by `GET /api/jobs/{id}`. */
export interface JobDetail extends JobSnapshot {
  results: string[];
}

export interface TargetStatus {
  target: string;
  active: boolean;
  sources: SourceId[];
  jobs: JobSnapshot[];
}

/** Something a fetcher yields while it runs. */
export type Finding =
  | { kind: 'host'; host: string } // candidate subdomain
  | { kind: 'nameserver'; host: string } // zone pseudo-result
  | { kind: 'status'; level: 'info' | 'error'; message: string }; // progress note

/** Fetcher return value: natural end, or early end because of an upstream failure. */
export type SourceOutcome = { ok: true } | { ok: false; reason: string };

export interface CompleteEvent {
  source: SourceId;
  target: string;
  status: 'completed' | 'completed_with_errors';
  count: number;
  message: string;
  error?: string;
}

export interface CancelledEvent {
  source: SourceId;
  target: string;
  reason: CancelReason;
  count: number;
  message: string;
}

export interface ProbeResult {
  url: string;
  status: string; // numeric status as string, "0" on connection failure
  title: string;
  error: string; // empty on success
  probeTimeMs: number;
}
