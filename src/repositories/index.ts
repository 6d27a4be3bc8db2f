import type { BackoffPolicy } from '../lib/backoff.js';
import type { UpstashClient } from '../lib/upstash.js';
import type { JobStore } from './base.js';
import { InMemoryJobStore } from './memory.js';
import { RedisJobStore } from './redis.js';

export * from './base.js';
export * from './memory.js';
export * from './redis.js';

export function createJobStore(options: { client: UpstashClient | null; backoff: BackoffPolicy }): JobStore {
  if (options.client) {
    return new RedisJobStore(options.client, { backoff: options.backoff });
  }
  return new InMemoryJobStore({ backoff: options.backoff });
}
