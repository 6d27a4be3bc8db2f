import type { UpstashClient } from '../lib/upstash.js';
import type { CacheBackend } from './base.js';
import { InMemoryCacheBackend } from './memory.js';
import { RedisCacheBackend } from './redis.js';

export * from './base.js';
export * from './memory.js';
export * from './redis.js';
export * from './tenant-cache.js';

export function createCacheBackend(client: UpstashClient | null): CacheBackend {
  return client ? new RedisCacheBackend(client) : new InMemoryCacheBackend();
}
