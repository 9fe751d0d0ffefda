import type { RateLimit } from '../limits/rate-limit-spec.js';

export type RateDecision =
  | { allowed: true; remaining: number | null }
  | { allowed: false; retryAfterSeconds: number };

export interface RateLimiterOptions {
  now?: () => number;
  /** How often idle identities are dropped; 0 disables the timer. */
  sweepIntervalMs?: number;
}

interface RequestLog {
  /** Admission times, oldest first. */
  timestamps: number[];
  windowMs: number;
}

/**
 * Sliding-window log per identity. Each check-and-record runs without an
 * await, so concurrent requests for one identity cannot both take the last
 * slot. State lives in memory only and resets on restart.
 */
export class RateLimiter {
  private readonly logs = new Map<string, RequestLog>();

  private readonly now: () => number;

  private readonly sweepTimer: NodeJS.Timeout | null;

  public constructor(options: RateLimiterOptions = {}) {
    this.now = options.now ?? (() => Date.now());

    const sweepIntervalMs = options.sweepIntervalMs ?? 60_000;
    if (sweepIntervalMs > 0) {
      this.sweepTimer = setInterval(() => {
        this.sweep();
      }, sweepIntervalMs);
      this.sweepTimer.unref();
    } else {
      this.sweepTimer = null;
    }
  }

  public allow(identity: string, rateLimit: RateLimit | null): RateDecision {
    if (rateLimit === null) {
      return { allowed: true, remaining: null };
    }

    const now = this.now();
    const windowStart = now - rateLimit.windowMs;
    let log = this.logs.get(identity);
    if (log === undefined) {
      log = { timestamps: [], windowMs: rateLimit.windowMs };
      this.logs.set(identity, log);
    }

    log.windowMs = rateLimit.windowMs;
    pruneBefore(log.timestamps, windowStart);

    if (log.timestamps.length >= rateLimit.limit) {
      // The oldest entries leave first; enough must expire to get back under the limit.
      const freeingIndex = log.timestamps.length - rateLimit.limit;
      const freeingAt = (log.timestamps[freeingIndex] ?? now) + rateLimit.windowMs;
      return {
        allowed: false,
        retryAfterSeconds: Math.max(1, Math.ceil((freeingAt - now) / 1_000))
      };
    }

    log.timestamps.push(now);
    return {
      allowed: true,
      remaining: rateLimit.limit - log.timestamps.length
    };
  }

  /** Drops identities with no admissions left inside their window. */
  public sweep(): void {
    const now = this.now();
    for (const [identity, log] of this.logs) {
      pruneBefore(log.timestamps, now - log.windowMs);
      if (log.timestamps.length === 0) {
        this.logs.delete(identity);
      }
    }
  }

  public get trackedIdentities(): number {
    return this.logs.size;
  }

  public reset(identity?: string): void {
    if (identity === undefined) {
      this.logs.clear();
      return;
    }

    this.logs.delete(identity);
  }

  public close(): void {
    if (this.sweepTimer !== null) {
      clearInterval(this.sweepTimer);
    }
  }
}

function pruneBefore(timestamps: number[], windowStart: number): void {
  let expired = 0;
  while (expired < timestamps.length && (timestamps[expired] ?? Number.POSITIVE_INFINITY) <= windowStart) {
    expired += 1;
  }

  if (expired > 0) {
    timestamps.splice(0, expired);
  }
}
