import { type FastifyRequest, type FastifyReply } from 'fastify';
import { AppError, ErrorCode, createLogger } from '@careline/shared';

const logger = createLogger({ name: 'api:rate-limit' });

interface RateLimitBucket {
  count: number;
  resetAt: number;
}

export interface RateLimitOptions {
  name: string;
  windowMs: number;
  maxRequests: number;
  now?: () => number;
}

/**
 * Fixed-window request limiter keyed by client IP. Per-instance only; the
 * attempt guard behind redemption is the shared, authoritative limit.
 */
export function createRateLimiter(opts: RateLimitOptions) {
  const buckets = new Map<string, RateLimitBucket>();
  const now = opts.now ?? Date.now;

  setInterval(() => {
    const at = now();
    for (const [key, bucket] of buckets) {
      if (bucket.resetAt <= at) {
        buckets.delete(key);
      }
    }
  }, opts.windowMs).unref();

  return async function rateLimit(request: FastifyRequest, reply: FastifyReply) {
    const key = request.ip;
    const at = now();

    let bucket = buckets.get(key);
    if (!bucket || bucket.resetAt <= at) {
      bucket = { count: 0, resetAt: at + opts.windowMs };
      buckets.set(key, bucket);
    }

    bucket.count++;
    if (bucket.count > opts.maxRequests) {
      logger.warn({ limiter: opts.name, requestId: request.id }, 'Rate limit exceeded');
      reply.header('retry-after', Math.ceil((bucket.resetAt - at) / 1000));
      throw new AppError(ErrorCode.RATE_LIMITED, 'Too many requests, please try again later');
    }
  };
}

export type RateLimit = ReturnType<typeof createRateLimiter>;
