import { describe, it, expect } from 'vitest';
import {
  ValidationError,
  NotFoundError,
  TransientProviderError,
  PermanentProviderError,
  StorageError,
  ConcurrencyConflict,
  isRetryable,
} from './errors.js';

describe('errors', () => {
  it('should serialize to the reply shape', () => {
    const error = new NotFoundError('Job', 'job-1');

    expect(error.statusCode).toBe(404);
    expect(error.toJSON()).toEqual({
      error: 'NotFoundError',
      message: 'Job not found: job-1',
      code: 'NOT_FOUND',
      details: { resource: 'Job', identifier: 'job-1' },
    });
  });

  it('should classify retryable errors', () => {
    expect(isRetryable(new TransientProviderError('ai', 'rate limited'))).toBe(true);
    expect(isRetryable(new StorageError('write failed'))).toBe(true);
    expect(isRetryable(new ConcurrencyConflict('Job', 'job-1'))).toBe(true);
    expect(isRetryable(new Error('socket hang up'))).toBe(true);
  });

  it('should classify permanent errors', () => {
    expect(isRetryable(new PermanentProviderError('ai', 'invalid credentials'))).toBe(false);
    expect(isRetryable(new ValidationError('bad input'))).toBe(false);
    expect(isRetryable(new NotFoundError('Lesson'))).toBe(false);
  });
});
