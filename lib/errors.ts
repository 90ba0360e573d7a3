/**
 * Error classes shared by the API handlers and source fetchers.
 *
 * Each API-facing error carries the HTTP status it maps to, so handlers can
 * turn any thrown value into a response with `toHttpStatus`.
 */

export class ScoutError extends Error {
  readonly status: number;

  constructor(message: string, status = 500) {
    super(message);
    this.name = new.target.name;
    this.status = status;
  }
}

/** Missing or malformed request parameter. No job is created. */
export class InputError extends ScoutError {
  constructor(message: string) {
    super(message, 400);
  }
}

export class ForbiddenError extends ScoutError {
  constructor(message: string) {
    super(message, 403);
  }
}

export class NotFoundError extends ScoutError {
  constructor(message: string) {
    super(message, 404);
  }
}

export class RateLimitError extends ScoutError {
  constructor(message = 'Rate limit exceeded') {
    super(message, 429);
  }
}

/** Raised by the registry when MAX_CONCURRENT_JOBS running jobs already exist. */
export class CapacityError extends ScoutError {
  constructor(limit: number) {
    super(`too many concurrent jobs (limit ${limit})`, 503);
  }
}

/**
 * Upstream transport or decode failure inside a fetcher. Fetchers convert it
 * into a failed source outcome; it never reaches the client as a fault.
 */
export class UpstreamError extends ScoutError {
  readonly upstream: string;

  constructor(upstream: string, message: string) {
    super(message, 502);
    this.upstream = upstream;
  }
}

export function toHttpStatus(err: unknown): number {
  return err instanceof ScoutError ? err.status : 500;
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
