import { describe, expect, it } from 'vitest';
import { AdmissionError } from './errors.js';
import { FixedWindowRateGate, MemoryCounterStore } from './rateGate.js';

const T0 = 1_000_000;

function rejection(fn: () => unknown): AdmissionError | null {
  try {
    fn();
  } catch (e) {
    if (e instanceof AdmissionError) return e;
    throw e;
  }
  return null;
}

describe('FixedWindowRateGate', () => {
  it('admits 30 requests in a window and rejects the 31st', () => {
    const gate = new FixedWindowRateGate();
    for (let i = 1; i <= 30; i++) {
      expect(gate.admit('10.0.0.1', T0).count).toBe(i);
    }

    const err = rejection(() => gate.admit('10.0.0.1', T0 + 10_000));
    expect(err?.code).toBe('RateLimited');
    expect(err?.details).toEqual({ retryAfterSeconds: 50 });
  });

  it('admits again once the window has fully elapsed', () => {
    const gate = new FixedWindowRateGate();
    for (let i = 0; i < 30; i++) gate.admit('10.0.0.1', T0);

    expect(rejection(() => gate.admit('10.0.0.1', T0 + 59_999))?.code).toBe('RateLimited');
    expect(gate.admit('10.0.0.1', T0 + 60_000)).toEqual({ count: 1, remaining: 29, resetAt: T0 + 120_000 });
  });

  it('counts identities independently', () => {
    const gate = new FixedWindowRateGate({ limit: 1 });
    gate.admit('a', T0);

    expect(rejection(() => gate.admit('a', T0 + 1))?.code).toBe('RateLimited');
    expect(gate.admit('b', T0 + 1).count).toBe(1);
  });

  // Fixed windows, not sliding: a burst straddling the boundary gets twice the limit through.
  it('allows up to twice the limit across a window boundary', () => {
    const gate = new FixedWindowRateGate();
    gate.admit('burst', T0);
    for (let i = 0; i < 29; i++) gate.admit('burst', T0 + 59_000);

    let admitted = 0;
    for (let i = 0; i < 30; i++) {
      gate.admit('burst', T0 + 60_000);
      admitted++;
    }
    expect(admitted).toBe(30);
    expect(rejection(() => gate.admit('burst', T0 + 60_500))?.code).toBe('RateLimited');
  });

  it('sweep removes counters a full window past their reset and keeps active ones', () => {
    const gate = new FixedWindowRateGate();
    gate.admit('stale', 0);
    gate.admit('active', 100_000);

    expect(gate.sweep(59_999 + 60_000)).toBe(0);
    expect(gate.sweep(120_001)).toBe(1);
    expect(gate.trackedIdentities).toBe(1);
  });

  it('never sweeps a counter that is still inside its window', () => {
    const gate = new FixedWindowRateGate();
    gate.admit('x', 0);

    expect(gate.sweep(59_999)).toBe(0);
    expect(rejection(() => gate.admit('x', 59_999))).toBeNull();
    expect(gate.admit('x', 59_999).count).toBe(3);
  });

  it('sweeps opportunistically on admit', () => {
    const gate = new FixedWindowRateGate();
    gate.admit('old', 0);
    gate.admit('new', 130_000);

    expect(gate.trackedIdentities).toBe(1);
  });

  it('keeps its counters in the injected store', () => {
    const store = new MemoryCounterStore();
    const gate = new FixedWindowRateGate({ store, limit: 5, windowMs: 1_000 });
    gate.admit('ip', T0);
    gate.admit('ip', T0 + 10);

    expect(store.get('ip')).toEqual({ count: 2, resetAt: T0 + 1_000 });
    expect(store.size).toBe(1);
  });
});
