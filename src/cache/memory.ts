import type { CacheBackend } from './base.js';

interface Entry {
  value: string;
  expiresAt: number;
}

/** Expired entries nobody reads again are dropped on the first write after this long. */
const SWEEP_INTERVAL_MS = 60_000;

export class InMemoryCacheBackend implements CacheBackend {
  private entries = new Map<string, Entry>();
  private lastSweep: number;

  constructor(private now: () => number = Date.now) {
    this.lastSweep = now();
  }

  async get(key: string): Promise<string | null> {
    const entry = this.entries.get(key);
    if (!entry) return null;
    if (entry.expiresAt <= this.now()) {
      this.entries.delete(key);
      return null;
    }
    return entry.value;
  }

  async set(key: string, value: string, ttlSeconds: number): Promise<void> {
    const now = this.now();
    if (now - this.lastSweep >= SWEEP_INTERVAL_MS) {
      this.sweep(now);
    }
    this.entries.set(key, { value, expiresAt: now + ttlSeconds * 1000 });
  }

  private sweep(now: number): void {
    for (const [key, entry] of this.entries) {
      if (entry.expiresAt <= now) {
        this.entries.delete(key);
      }
    }
    this.lastSweep = now;
  }

  async delete(key: string): Promise<void> {
    this.entries.delete(key);
  }

  keys(): string[] {
    return Array.from(this.entries.keys());
  }
}
