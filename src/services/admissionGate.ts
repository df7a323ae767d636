/**
 * Admission gate: per-client sliding-window request limiter.
 *
 * Each identity (normally the client IP) keeps the timestamps of its admitted
 * requests inside the trailing window. A request is admitted only while fewer
 * than `limit` timestamps remain after pruning; rejected requests are not
 * recorded, so a throttled client is let back in as soon as its oldest
 * request slides out of the window.
 *
 * `admit` is synchronous: pruning, counting and appending happen in one step
 * of the event loop, so concurrent requests for the same identity can never
 * both take the last slot.
 *
 * State lives in memory and is lost on restart. Idle identities are swept on
 * an unref'd timer so the map stays bounded by the set of recently active
 * clients.
 */

export interface AdmissionGateOptions {
  /** Requests admitted per identity within one window */
  limit: number;
  /** Window length in milliseconds */
  windowMs: number;
  /** Clock, overridable for tests */
  now?: () => number;
  /** How often idle identities are evicted. 0 disables the timer. Defaults to windowMs. */
  sweepIntervalMs?: number;
}

export interface Admitted {
  allowed: true;
  /** Requests counted in the window, including this one */
  count: number;
  /** When the oldest counted request leaves the window (epoch ms) */
  resetAt: number;
}

export interface Rejected {
  allowed: false;
  count: number;
  resetAt: number;
  /** Milliseconds until a slot frees up */
  retryAfterMs: number;
}

export type AdmissionDecision = Admitted | Rejected;

export class AdmissionGate {
  readonly limit: number;
  readonly windowMs: number;

  private readonly now: () => number;
  private readonly windows = new Map<string, number[]>();
  private sweepTimer: NodeJS.Timeout | null = null;

  constructor(options: AdmissionGateOptions) {
    if (!Number.isInteger(options.limit) || options.limit < 1) {
      throw new Error(`Admission limit must be a positive integer (got ${options.limit})`);
    }
    if (!(options.windowMs > 0)) {
      throw new Error(`Admission window must be positive (got ${options.windowMs})`);
    }

    this.limit = options.limit;
    this.windowMs = options.windowMs;
    this.now = options.now ?? Date.now;

    const sweepIntervalMs = options.sweepIntervalMs ?? options.windowMs;
    if (sweepIntervalMs > 0) {
      this.sweepTimer = setInterval(() => this.sweep(), sweepIntervalMs);
      this.sweepTimer.unref();
    }
  }

  /** Number of identities currently tracked. */
  get size(): number {
    return this.windows.size;
  }

  admit(identity: string, now: number = this.now()): AdmissionDecision {
    const timestamps = this.prune(identity, now);

    if (timestamps.length >= this.limit) {
      const resetAt = timestamps[0] + this.windowMs;
      return {
        allowed: false,
        count: timestamps.length,
        resetAt,
        retryAfterMs: Math.max(0, resetAt - now),
      };
    }

    timestamps.push(now);
    this.windows.set(identity, timestamps);

    return {
      allowed: true,
      count: timestamps.length,
      resetAt: timestamps[0] + this.windowMs,
    };
  }

  /** Requests currently counted against an identity. */
  count(identity: string, now: number = this.now()): number {
    return this.prune(identity, now).length;
  }

  /** Hand back the most recent slot of an identity (the request was rolled back). */
  release(identity: string): void {
    const timestamps = this.windows.get(identity);
    if (!timestamps) return;

    timestamps.pop();
    if (timestamps.length === 0) {
      this.windows.delete(identity);
    }
  }

  reset(identity?: string): void {
    if (identity === undefined) {
      this.windows.clear();
    } else {
      this.windows.delete(identity);
    }
  }

  /** Evict identities with no request left in the window. Returns how many were dropped. */
  sweep(now: number = this.now()): number {
    let evicted = 0;
    const cutoff = now - this.windowMs;

    for (const [identity, timestamps] of this.windows) {
      const newest = timestamps[timestamps.length - 1];
      if (newest === undefined || newest < cutoff) {
        this.windows.delete(identity);
        evicted++;
      }
    }

    return evicted;
  }

  stop(): void {
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = null;
    }
  }

  // Timestamps are appended in order, so the expired ones are always a prefix.
  private prune(identity: string, now: number): number[] {
    const timestamps = this.windows.get(identity);
    if (!timestamps) return [];

    const cutoff = now - this.windowMs;
    let expired = 0;
    while (expired < timestamps.length && timestamps[expired] < cutoff) {
      expired++;
    }

    if (expired === timestamps.length) {
      this.windows.delete(identity);
      return [];
    }
    if (expired > 0) {
      timestamps.splice(0, expired);
    }
    return timestamps;
  }
}
