import type Redis from 'ioredis';
import {
  applyFailure,
  type AttemptCounter,
  type AttemptPolicy,
  type AttemptStore,
} from '@careline/domain';

const KEY_PREFIX = 'attempt:';

// Same steps as applyFailure; -1 stands for "unset".
const INCREMENT_SCRIPT = `
local key = KEYS[1]
local now = tonumber(ARGV[1])
local maxFailures = tonumber(ARGV[2])
local windowMs = tonumber(ARGV[3])
local lockMs = tonumber(ARGV[4])
local failed = tonumber(redis.call('HGET', key, 'failed') or '0')
local windowStart = tonumber(redis.call('HGET', key, 'window') or '-1')
local lockedUntil = tonumber(redis.call('HGET', key, 'locked') or '-1')
if lockedUntil > now then
  return {failed, windowStart, lockedUntil}
end
if lockedUntil >= 0 or (windowStart >= 0 and now - windowStart >= windowMs) then
  failed = 0
  windowStart = -1
  lockedUntil = -1
end
failed = failed + 1
if windowStart < 0 then
  windowStart = now
end
if failed >= maxFailures then
  lockedUntil = now + lockMs
else
  lockedUntil = -1
end
redis.call('HSET', key, 'failed', failed, 'window', windowStart, 'locked', lockedUntil)
redis.call('PEXPIRE', key, math.max(windowMs, lockMs))
return {failed, windowStart, lockedUntil}
`;

function toDate(ms: number): Date | null {
  return ms < 0 ? null : new Date(ms);
}

function parseNumber(value: unknown): number {
  const parsed = typeof value === 'number' ? value : Number(value);
  if (!Number.isFinite(parsed)) {
    throw new Error('Unexpected attempt counter value from Redis');
  }
  return parsed;
}

/** The ioredis commands the store issues. */
export type AttemptRedis = Pick<Redis, 'hmget' | 'eval' | 'del'>;

export class RedisAttemptStore implements AttemptStore {
  constructor(private readonly redis: AttemptRedis) {}

  async get(keyHash: string): Promise<AttemptCounter | null> {
    const [failed, window, locked] = await this.redis.hmget(KEY_PREFIX + keyHash, 'failed', 'window', 'locked');
    if (failed === null || window === null || locked === null) return null;
    return {
      keyHash,
      failedCount: parseNumber(failed),
      windowStartedAt: toDate(parseNumber(window)),
      lockedUntil: toDate(parseNumber(locked)),
    };
  }

  async increment(keyHash: string, now: Date, policy: AttemptPolicy): Promise<AttemptCounter> {
    const reply = await this.redis.eval(
      INCREMENT_SCRIPT,
      1,
      KEY_PREFIX + keyHash,
      now.getTime(),
      policy.maxFailures,
      policy.windowMs,
      policy.lockMs,
    );
    if (!Array.isArray(reply) || reply.length !== 3) {
      throw new Error('Unexpected attempt counter reply from Redis');
    }
    return {
      keyHash,
      failedCount: parseNumber(reply[0]),
      windowStartedAt: toDate(parseNumber(reply[1])),
      lockedUntil: toDate(parseNumber(reply[2])),
    };
  }

  async clear(keyHash: string): Promise<void> {
    await this.redis.del(KEY_PREFIX + keyHash);
  }
}

/** Single-instance store; counters live only as long as the process. */
export class InMemoryAttemptStore implements AttemptStore {
  private readonly counters = new Map<string, AttemptCounter>();

  async get(keyHash: string): Promise<AttemptCounter | null> {
    return this.counters.get(keyHash) ?? null;
  }

  async increment(keyHash: string, now: Date, policy: AttemptPolicy): Promise<AttemptCounter> {
    const next = applyFailure(this.counters.get(keyHash) ?? null, keyHash, now, policy);
    this.counters.set(keyHash, next);
    return next;
  }

  async clear(keyHash: string): Promise<void> {
    this.counters.delete(keyHash);
  }
}
