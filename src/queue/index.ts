import type { UpstashClient } from '../lib/upstash.js';
import type { TaskQueue } from './base.js';
import { InMemoryTaskQueue } from './memory.js';
import { RedisTaskQueue } from './redis.js';

export * from './base.js';
export * from './memory.js';
export * from './redis.js';

export function createTaskQueue(client: UpstashClient | null): TaskQueue {
  return client ? new RedisTaskQueue(client) : new InMemoryTaskQueue();
}
