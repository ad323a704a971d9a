import { describe, it, expect } from 'vitest';
import { applyFailure, AttemptGuard, isLocked } from '../attempt-guard';
import { type AttemptPolicy } from '../ports';
import { TestAttemptStore } from './harness';

const policy: AttemptPolicy = { maxFailures: 3, windowMs: 60_000, lockMs: 120_000 };
const t0 = new Date('2026-03-10T00:00:00Z');
const at = (ms: number) => new Date(t0.getTime() + ms);

describe('applyFailure', () => {
  it('starts a window on the first failure', () => {
    const counter = applyFailure(null, 'k', t0, policy);
    expect(counter).toEqual({ keyHash: 'k', failedCount: 1, windowStartedAt: t0, lockedUntil: null });
  });

  it('locks once the threshold is reached inside the window', () => {
    let counter = applyFailure(null, 'k', t0, policy);
    counter = applyFailure(counter, 'k', at(1_000), policy);
    counter = applyFailure(counter, 'k', at(2_000), policy);
    expect(counter.failedCount).toBe(3);
    expect(counter.lockedUntil).toEqual(at(122_000));
  });

  it('leaves a locked counter untouched', () => {
    const locked = { keyHash: 'k', failedCount: 3, windowStartedAt: t0, lockedUntil: at(120_000) };
    expect(applyFailure(locked, 'k', at(5_000), policy)).toBe(locked);
  });

  it('restarts from one once the window has passed', () => {
    let counter = applyFailure(null, 'k', t0, policy);
    counter = applyFailure(counter, 'k', at(1_000), policy);
    counter = applyFailure(counter, 'k', at(60_000), policy);
    expect(counter.failedCount).toBe(1);
    expect(counter.windowStartedAt).toEqual(at(60_000));
  });

  it('restarts from one after the lock elapses', () => {
    const expired = { keyHash: 'k', failedCount: 3, windowStartedAt: t0, lockedUntil: at(120_000) };
    const counter = applyFailure(expired, 'k', at(120_000), policy);
    expect(counter).toEqual({ keyHash: 'k', failedCount: 1, windowStartedAt: at(120_000), lockedUntil: null });
  });
});

describe('isLocked', () => {
  it('is false without a counter or lock', () => {
    expect(isLocked(null, t0)).toBe(false);
    expect(isLocked({ keyHash: 'k', failedCount: 2, windowStartedAt: t0, lockedUntil: null }, t0)).toBe(false);
  });

  it('is true strictly before lockedUntil', () => {
    const counter = { keyHash: 'k', failedCount: 3, windowStartedAt: t0, lockedUntil: at(10) };
    expect(isLocked(counter, at(9))).toBe(true);
    expect(isLocked(counter, at(10))).toBe(false);
  });
});

describe('AttemptGuard', () => {
  it('hashes the context key before it reaches the store', () => {
    const guard = new AttemptGuard({ store: new TestAttemptStore(), policy, hashKey: (raw) => `#${raw}` });
    expect(guard.keyFor('203.0.113.7')).toBe('#attempt:203.0.113.7');
  });

  it('reports locked after the last allowed failure and allowed after reset', async () => {
    const store = new TestAttemptStore();
    const guard = new AttemptGuard({ store, policy, hashKey: (raw) => raw });

    expect(await guard.recordFailure('k', t0)).toBe('allowed');
    expect(await guard.recordFailure('k', t0)).toBe('allowed');
    expect(await guard.recordFailure('k', t0)).toBe('locked');
    expect(await guard.check('k', at(119_999))).toBe('locked');
    expect(await guard.check('k', at(120_000))).toBe('allowed');

    await guard.reset('k');
    expect(store.counters.has('k')).toBe(false);
  });
});
