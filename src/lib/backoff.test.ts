import { describe, it, expect } from 'vitest';
import { exponentialBackoff } from './backoff.js';

describe('exponentialBackoff', () => {
  it('should double the delay per attempt without jitter', () => {
    const backoff = exponentialBackoff({ baseDelayMs: 1000, maxDelayMs: 60000 }, () => 0);

    expect(backoff(1)).toBe(1000);
    expect(backoff(2)).toBe(2000);
    expect(backoff(3)).toBe(4000);
  });

  it('should cap the delay at maxDelayMs', () => {
    const backoff = exponentialBackoff({ baseDelayMs: 1000, maxDelayMs: 60000 }, () => 0);

    expect(backoff(10)).toBe(60000);
  });

  it('should add at most the configured jitter fraction', () => {
    const backoff = exponentialBackoff({ baseDelayMs: 1000, maxDelayMs: 60000, jitter: 0.1 }, () => 1);

    expect(backoff(1)).toBe(1100);
  });
});
