import { type AttemptCounter, type AttemptPolicy, type AttemptStore } from './ports';

export type GuardVerdict = 'allowed' | 'locked';

export interface AttemptGuardDeps {
  store: AttemptStore;
  policy: AttemptPolicy;
  /** Peppered hash applied to raw requester keys before they reach the store. */
  hashKey: (raw: string) => string;
}

export const DEFAULT_ATTEMPT_POLICY: AttemptPolicy = {
  maxFailures: 5,
  windowMs: 30 * 60 * 1000,
  lockMs: 30 * 60 * 1000,
};

export function isLocked(counter: AttemptCounter | null, now: Date): boolean {
  if (!counter || !counter.lockedUntil) return false;
  return counter.lockedUntil.getTime() > now.getTime();
}

/**
 * Fixed-window failure counter with a hard lockout. Once the lock elapses the
 * next failure starts again from one.
 */
export class AttemptGuard {
  constructor(private readonly deps: AttemptGuardDeps) {}

  keyFor(contextKey: string): string {
    return this.deps.hashKey(`attempt:${contextKey}`);
  }

  async check(keyHash: string, now: Date): Promise<GuardVerdict> {
    const counter = await this.deps.store.get(keyHash);
    return isLocked(counter, now) ? 'locked' : 'allowed';
  }

  async recordFailure(keyHash: string, now: Date): Promise<GuardVerdict> {
    const counter = await this.deps.store.increment(keyHash, now, this.deps.policy);
    return isLocked(counter, now) ? 'locked' : 'allowed';
  }

  async reset(keyHash: string): Promise<void> {
    await this.deps.store.clear(keyHash);
  }
}

/**
 * Reference increment shared by the stores that keep counters in process
 * memory. The Redis store runs the same steps in a Lua script.
 */
export function applyFailure(
  current: AttemptCounter | null,
  keyHash: string,
  now: Date,
  policy: AttemptPolicy,
): AttemptCounter {
  const nowMs = now.getTime();
  let counter: AttemptCounter = current ?? {
    keyHash,
    failedCount: 0,
    windowStartedAt: null,
    lockedUntil: null,
  };

  if (isLocked(counter, now)) {
    return counter;
  }

  const lockElapsed = counter.lockedUntil !== null;
  const windowElapsed =
    counter.windowStartedAt !== null && nowMs - counter.windowStartedAt.getTime() >= policy.windowMs;
  if (lockElapsed || windowElapsed) {
    counter = { keyHash, failedCount: 0, windowStartedAt: null, lockedUntil: null };
  }

  const failedCount = counter.failedCount + 1;
  return {
    keyHash,
    failedCount,
    windowStartedAt: counter.windowStartedAt ?? now,
    lockedUntil: failedCount >= policy.maxFailures ? new Date(nowMs + policy.lockMs) : null,
  };
}
