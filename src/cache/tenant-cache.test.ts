import { describe, it, expect, beforeEach, vi } from 'vitest';
import { z } from 'zod';
import { TenantCache, tenantKey } from './tenant-cache.js';
import { InMemoryCacheBackend } from './memory.js';
import type { CacheBackend } from './base.js';
import { silentLogger } from '../logger.js';

const Value = z.object({ title: z.string() });

describe('TenantCache', () => {
  let clock: number;
  let backend: InMemoryCacheBackend;
  let cache: TenantCache;

  beforeEach(() => {
    clock = 1_000_000;
    backend = new InMemoryCacheBackend(() => clock);
    cache = new TenantCache(backend, { defaultTtlSeconds: 60, logger: silentLogger() });
  });

  it('should prefix physical keys with the tenant', async () => {
    await cache.set('tenant-a', 'outline:course-1', { title: 'Intro' });

    expect(backend.keys()).toEqual(['tenant:tenant-a:outline:course-1']);
    expect(tenantKey('tenant-a', 'k')).toBe('tenant:tenant-a:k');
  });

  it('should never serve one tenant another tenant\'s entry', async () => {
    await cache.set('tenant-a', 'k', { title: 'secret' });

    expect(await cache.get('tenant-b', 'k', Value)).toBeNull();
    expect(await cache.get('tenant-a', 'k', Value)).toEqual({ title: 'secret' });
  });

  it('should keep a colon in the tenant id from reaching another tenant\'s key', async () => {
    await cache.set('acme:outline', 'course-1', { title: 'tenant acme:outline data' });

    expect(await cache.get('acme', 'outline:course-1', Value)).toBeNull();
    expect(backend.keys()).toEqual(['tenant:acme%3Aoutline:course-1']);
  });

  it('should expire entries after their TTL', async () => {
    await cache.set('tenant-a', 'k', { title: 'Intro' }, 10);

    clock += 10_000;

    expect(await cache.get('tenant-a', 'k', Value)).toBeNull();
  });

  it('should treat entries that fail validation as misses', async () => {
    await cache.set('tenant-a', 'k', { heading: 'wrong shape' });

    expect(await cache.get('tenant-a', 'k', Value)).toBeNull();
  });

  it('should delete entries', async () => {
    await cache.set('tenant-a', 'k', { title: 'Intro' });
    await cache.delete('tenant-a', 'k');

    expect(await cache.get('tenant-a', 'k', Value)).toBeNull();
  });

  describe('when the backend is unavailable', () => {
    const broken: CacheBackend = {
      get: () => Promise.reject(new Error('connection refused')),
      set: () => Promise.reject(new Error('connection refused')),
      delete: () => Promise.reject(new Error('connection refused')),
    };

    it('should degrade to misses and no-ops', async () => {
      const degraded = new TenantCache(broken, { defaultTtlSeconds: 60, logger: silentLogger() });

      await expect(degraded.set('tenant-a', 'k', { title: 'Intro' })).resolves.toBeUndefined();
      await expect(degraded.get('tenant-a', 'k', Value)).resolves.toBeNull();
      await expect(degraded.delete('tenant-a', 'k')).resolves.toBeUndefined();
    });

    it('should still load through getOrLoad', async () => {
      const degraded = new TenantCache(broken, { defaultTtlSeconds: 60, logger: silentLogger() });
      const loader = vi.fn(async () => ({ title: 'Fresh' }));

      expect(await degraded.getOrLoad('tenant-a', 'k', Value, loader)).toEqual({ title: 'Fresh' });
      expect(loader).toHaveBeenCalledTimes(1);
    });
  });

  it('should call the loader only on a miss', async () => {
    const loader = vi.fn(async () => ({ title: 'Loaded' }));

    await cache.getOrLoad('tenant-a', 'k', Value, loader);
    const second = await cache.getOrLoad('tenant-a', 'k', Value, loader);

    expect(second).toEqual({ title: 'Loaded' });
    expect(loader).toHaveBeenCalledTimes(1);
  });
});

describe('InMemoryCacheBackend', () => {
  it('should drop expired entries that are never read again', async () => {
    let clock = 1_000_000;
    const backend = new InMemoryCacheBackend(() => clock);
    await backend.set('knowledge:1:abc', 'old ranking', 10);
    await backend.set('knowledge:1:def', 'still fresh', 600);

    clock += 61_000;
    await backend.set('knowledge:2:abc', 'new ranking', 10);

    expect(backend.keys()).toEqual(['knowledge:1:def', 'knowledge:2:abc']);
  });
});
