import type { UpstashClient } from '../lib/upstash.js';
import type { CacheBackend } from './base.js';

export class RedisCacheBackend implements CacheBackend {
  constructor(private client: UpstashClient, private prefix = 'cache:') {}

  async get(key: string): Promise<string | null> {
    return this.client.string(['GET', `${this.prefix}${key}`]);
  }

  async set(key: string, value: string, ttlSeconds: number): Promise<void> {
    await this.client.command(['SET', `${this.prefix}${key}`, value, 'EX', ttlSeconds]);
  }

  async delete(key: string): Promise<void> {
    await this.client.command(['DEL', `${this.prefix}${key}`]);
  }
}
