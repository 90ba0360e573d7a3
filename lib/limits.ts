/**
 * Inbound rate limiting.
 *
 * `RateLimiter` is a token bucket: it starts full at `burstSize` tokens and
 * gains one token every `1000 / requestsPerSecond` ms, never exceeding the
 * burst size. Each API call takes one token and never returns it.
 *
 * Callers that find the bucket empty may wait up to a short grace window; waiters
 * are handed tokens first-in first-out as the bucket refills.
 *
 * Example:
 * const limiter = new RateLimiter({ requestsPerSecond: 10, burstSize: 20, graceMs: 100 })
 * if (!(await limiter.acquire())) { // respond 429 }
 */

import type { RateLimitConfig } from './config';

type Waiter = {
  grant: (ok: boolean) => void;
  timer: ReturnType<typeof setTimeout>;
};

export class RateLimiter {
  private tokens: number;
  private readonly capacity: number;
  private readonly graceMs: number;
  private readonly waiters: Waiter[] = [];
  private refillTimer: ReturnType<typeof setInterval> | null;

  constructor(cfg: RateLimitConfig) {
    this.capacity = Math.max(1, cfg.burstSize);
    this.tokens = this.capacity;
    this.graceMs = cfg.graceMs;
    const intervalMs = Math.max(1, Math.floor(1000 / Math.max(1, cfg.requestsPerSecond)));
    this.refillTimer = setInterval(() => this.refill(), intervalMs);
    // Allow process to exit without waiting for this timer
    this.refillTimer.unref();
  }

  /** Tokens currently in the bucket. */
  get available(): number {
    return this.tokens;
  }

  private refill(): void {
    const next = this.waiters.shift();
    if (next) {
      clearTimeout(next.timer);
      next.grant(true);
      return;
    }
    if (this.tokens < this.capacity) this.tokens += 1;
  }

  /**
   * Take one token. Resolves `true` immediately when one is available, otherwise
   * waits up to `graceMs` for a refill and resolves `false` if none arrives.
   */
  acquire(graceMs = this.graceMs): Promise<boolean> {
    if (this.tokens > 0 && this.waiters.length === 0) {
      this.tokens -= 1;
      return Promise.resolve(true);
    }
    if (graceMs <= 0 || this.refillTimer === null) return Promise.resolve(false);

    return new Promise<boolean>((resolve) => {
      const waiter: Waiter = {
        grant: resolve,
        timer: setTimeout(() => {
          const idx = this.waiters.indexOf(waiter);
          if (idx >= 0) this.waiters.splice(idx, 1);
          resolve(false);
        }, graceMs),
      };
      this.waiters.push(waiter);
    });
  }

  /** Stop refilling and turn away anyone still waiting. */
  dispose(): void {
    if (this.refillTimer) {
      clearInterval(this.refillTimer);
      this.refillTimer = null;
    }
    for (const w of this.waiters.splice(0)) {
      clearTimeout(w.timer);
      w.grant(false);
    }
  }
}

export default RateLimiter;
