import type { FastifyReply, FastifyRequest } from 'fastify';
import { RateLimitError } from '../errors.js';
import { TENANT_HEADER } from './tenant.js';
import { headerValue } from './headers.js';

export interface RateLimitOptions {
  enabled: boolean;
  burst: number;
  sustainedPerMinute: number;
}

interface TokenBucket {
  tokens: number;
  lastRefill: number;
}

/** Token buckets keyed by tenant, or by client address without one. */
export class RateLimiter {
  private buckets = new Map<string, TokenBucket>();

  constructor(
    private options: Pick<RateLimitOptions, 'burst' | 'sustainedPerMinute'>,
    private now: () => number = Date.now
  ) {}

  private getBucket(key: string): TokenBucket {
    const now = this.now();
    let bucket = this.buckets.get(key);

    if (!bucket) {
      bucket = { tokens: this.options.burst, lastRefill: now };
      this.buckets.set(key, bucket);
    }

    const minutes = (now - bucket.lastRefill) / 60_000;
    const tokensToAdd = Math.floor(minutes * this.options.sustainedPerMinute);
    if (tokensToAdd > 0) {
      bucket.tokens = Math.min(this.options.burst, bucket.tokens + tokensToAdd);
      bucket.lastRefill = now;
    }

    return bucket;
  }

  tryConsume(key: string): { allowed: boolean; retryAfter: number; remaining: number } {
    const bucket = this.getBucket(key);
    const retryAfter = Math.ceil(60 / this.options.sustainedPerMinute);

    if (bucket.tokens >= 1) {
      bucket.tokens -= 1;
      return { allowed: true, retryAfter, remaining: bucket.tokens };
    }
    return { allowed: false, retryAfter, remaining: 0 };
  }
}

export function rateLimit(options: RateLimitOptions, limiter = new RateLimiter(options)) {
  return async (request: FastifyRequest, reply: FastifyReply): Promise<void> => {
    if (!options.enabled) return;

    const tenantId = headerValue(request, TENANT_HEADER);
    const key = tenantId ? `tenant:${tenantId}` : `ip:${request.ip}`;
    const result = limiter.tryConsume(key);

    reply.header('X-RateLimit-Limit', String(options.burst));
    reply.header('X-RateLimit-Remaining', String(result.remaining));

    if (!result.allowed) {
      reply.header('Retry-After', String(result.retryAfter));
      throw new RateLimitError(result.retryAfter);
    }
  };
}
