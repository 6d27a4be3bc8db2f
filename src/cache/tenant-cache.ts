import type { ZodType, ZodTypeDef } from 'zod';
import type { Logger } from '../logger.js';
import { ValidationError, errorMessage } from '../errors.js';
import { keySegment } from '../lib/keys.js';
import type { CacheBackend } from './base.js';

export function tenantKey(tenantId: string, key: string): string {
  if (!tenantId) {
    throw new ValidationError('Tenant cache keys require a tenantId');
  }
  return `tenant:${keySegment(tenantId)}:${key}`;
}

/**
 * Cache wrapper that prefixes every key with its tenant. A failing backend
 * reads as a miss and writes as a no-op, so callers always fall through to
 * the source of truth.
 */
export class TenantCache {
  private logger: Logger;
  private defaultTtlSeconds: number;

  constructor(
    private backend: CacheBackend,
    options: { defaultTtlSeconds: number; logger: Logger }
  ) {
    this.defaultTtlSeconds = options.defaultTtlSeconds;
    this.logger = options.logger.child({ component: 'tenant-cache' });
  }

  async get<T>(tenantId: string, key: string, schema: ZodType<T, ZodTypeDef, unknown>): Promise<T | null> {
    const physicalKey = tenantKey(tenantId, key);
    let raw: string | null;
    try {
      raw = await this.backend.get(physicalKey);
    } catch (error) {
      this.logger.warn({ tenantId, key, error: errorMessage(error) }, 'Cache read failed; treating as miss');
      return null;
    }
    if (raw === null) return null;

    try {
      const parsed = schema.safeParse(JSON.parse(raw));
      if (parsed.success) return parsed.data;
    } catch (error) {
      this.logger.warn({ tenantId, key, error: errorMessage(error) }, 'Cache entry is not valid JSON');
    }
    return null;
  }

  async set(tenantId: string, key: string, value: unknown, ttlSeconds = this.defaultTtlSeconds): Promise<void> {
    const physicalKey = tenantKey(tenantId, key);
    try {
      await this.backend.set(physicalKey, JSON.stringify(value), ttlSeconds);
    } catch (error) {
      this.logger.warn({ tenantId, key, error: errorMessage(error) }, 'Cache write failed; skipping');
    }
  }

  async delete(tenantId: string, key: string): Promise<void> {
    const physicalKey = tenantKey(tenantId, key);
    try {
      await this.backend.delete(physicalKey);
    } catch (error) {
      this.logger.warn({ tenantId, key, error: errorMessage(error) }, 'Cache delete failed; skipping');
    }
  }

  /** Returns the cached value, or loads, caches and returns it. Loader errors propagate. */
  async getOrLoad<T>(
    tenantId: string,
    key: string,
    schema: ZodType<T, ZodTypeDef, unknown>,
    loader: () => Promise<T>,
    ttlSeconds = this.defaultTtlSeconds
  ): Promise<T> {
    const cached = await this.get(tenantId, key, schema);
    if (cached !== null) return cached;

    const value = await loader();
    await this.set(tenantId, key, value, ttlSeconds);
    return value;
  }
}
