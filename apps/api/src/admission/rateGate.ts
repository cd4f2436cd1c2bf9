import { AdmissionError } from './errors.js';

export type ClientWindowCounter = {
  count: number;
  /** Epoch ms at which the current window ends. */
  resetAt: number;
};

/**
 * Storage for per-identity counters. Implementations must be synchronous: the
 * gate's read-modify-write relies on running without a yield in between.
 */
export interface CounterStore {
  get(identity: string): ClientWindowCounter | undefined;
  set(identity: string, counter: ClientWindowCounter): void;
  delete(identity: string): void;
  entries(): Iterable<[string, ClientWindowCounter]>;
  readonly size: number;
}

export class MemoryCounterStore implements CounterStore {
  private readonly counters = new Map<string, ClientWindowCounter>();

  get(identity: string): ClientWindowCounter | undefined {
    return this.counters.get(identity);
  }

  set(identity: string, counter: ClientWindowCounter): void {
    this.counters.set(identity, counter);
  }

  delete(identity: string): void {
    this.counters.delete(identity);
  }

  entries(): Iterable<[string, ClientWindowCounter]> {
    return [...this.counters.entries()];
  }

  get size(): number {
    return this.counters.size;
  }
}

export type RateGateOptions = {
  limit?: number;
  windowMs?: number;
  store?: CounterStore;
};

export type RateAdmission = {
  count: number;
  remaining: number;
  resetAt: number;
};

export const DEFAULT_RATE_LIMIT = 30;
export const DEFAULT_RATE_WINDOW_MS = 60_000;

/**
 * Fixed-window counter per client identity. Across a window boundary a client
 * can get up to twice `limit` requests through in quick succession.
 */
export class FixedWindowRateGate {
  readonly limit: number;
  readonly windowMs: number;
  private readonly store: CounterStore;
  private lastSweepAt = Number.NEGATIVE_INFINITY;

  constructor(opts: RateGateOptions = {}) {
    this.limit = opts.limit ?? DEFAULT_RATE_LIMIT;
    this.windowMs = opts.windowMs ?? DEFAULT_RATE_WINDOW_MS;
    this.store = opts.store ?? new MemoryCounterStore();
  }

  admit(identity: string, now: number): RateAdmission {
    if (now - this.lastSweepAt >= this.windowMs) {
      this.sweep(now);
    }

    const counter = this.store.get(identity);

    if (!counter || now >= counter.resetAt) {
      const fresh = { count: 1, resetAt: now + this.windowMs };
      this.store.set(identity, fresh);
      return { count: 1, remaining: this.limit - 1, resetAt: fresh.resetAt };
    }

    if (counter.count >= this.limit) {
      const retryAfterSeconds = Math.max(1, Math.ceil((counter.resetAt - now) / 1000));
      throw new AdmissionError('RateLimited', 'Rate limit exceeded. Try again in a minute.', { retryAfterSeconds });
    }

    const next = { count: counter.count + 1, resetAt: counter.resetAt };
    this.store.set(identity, next);
    return { count: next.count, remaining: this.limit - next.count, resetAt: next.resetAt };
  }

  /** Drops counters whose window ended more than one window ago. Returns how many were removed. */
  sweep(now: number): number {
    this.lastSweepAt = now;
    let removed = 0;
    for (const [identity, counter] of this.store.entries()) {
      if (now - counter.resetAt > this.windowMs) {
        this.store.delete(identity);
        removed++;
      }
    }
    return removed;
  }

  get trackedIdentities(): number {
    return this.store.size;
  }
}
