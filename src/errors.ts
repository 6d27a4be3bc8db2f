export class AppError extends Error {
  constructor(
    message: string,
    public code: string,
    public statusCode: number = 500,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'AppError';
  }

  /** Whether a job that hit this error may be attempted again. */
  get retryable(): boolean {
    return false;
  }

  toJSON() {
    return {
      error: this.name,
      message: this.message,
      code: this.code,
      ...(this.details && { details: this.details }),
    };
  }
}

export class ValidationError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'VALIDATION_ERROR', 400, details);
    this.name = 'ValidationError';
  }
}

export class NotFoundError extends AppError {
  constructor(resource: string, identifier?: string) {
    const message = identifier
      ? `${resource} not found: ${identifier}`
      : `${resource} not found`;
    super(message, 'NOT_FOUND', 404, { resource, identifier });
    this.name = 'NotFoundError';
  }
}

export class InvalidStateError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'INVALID_STATE', 409, details);
    this.name = 'InvalidStateError';
  }
}

export class ConflictError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONFLICT', 409, details);
    this.name = 'ConflictError';
  }
}

/** Lost a race for a row another writer changed first. */
export class ConcurrencyConflict extends AppError {
  constructor(resource: string, identifier: string) {
    super(`${resource} was modified concurrently: ${identifier}`, 'CONCURRENCY_CONFLICT', 409, {
      resource,
      identifier,
    });
    this.name = 'ConcurrencyConflict';
  }

  get retryable(): boolean {
    return true;
  }
}

export class TransientProviderError extends AppError {
  constructor(provider: string, message: string, details?: Record<string, unknown>) {
    super(`${provider}: ${message}`, 'PROVIDER_UNAVAILABLE', 503, { provider, ...details });
    this.name = 'TransientProviderError';
  }

  get retryable(): boolean {
    return true;
  }
}

export class PermanentProviderError extends AppError {
  constructor(provider: string, message: string, details?: Record<string, unknown>) {
    super(`${provider}: ${message}`, 'PROVIDER_REJECTED', 502, { provider, ...details });
    this.name = 'PermanentProviderError';
  }
}

export class StorageError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'STORAGE_ERROR', 500, details);
    this.name = 'StorageError';
  }

  get retryable(): boolean {
    return true;
  }
}

export class SignatureVerificationError extends AppError {
  constructor(message: string) {
    super(message, 'INVALID_SIGNATURE', 400);
    this.name = 'SignatureVerificationError';
  }
}

export class UnauthorizedError extends AppError {
  constructor(message: string) {
    super(message, 'UNAUTHORIZED', 401);
    this.name = 'UnauthorizedError';
  }
}

export class RateLimitError extends AppError {
  constructor(public retryAfterSeconds: number) {
    super('Rate limit exceeded', 'RATE_LIMIT_EXCEEDED', 429, { retryAfter: retryAfterSeconds });
    this.name = 'RateLimitError';
  }
}

export class ConfigError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONFIG_ERROR', 500, details);
    this.name = 'ConfigError';
  }
}

/**
 * Raised at a workflow checkpoint when the job must stop: it was cancelled,
 * the worker lost ownership, or the pool is shutting down.
 */
export class JobCancelledError extends Error {
  constructor(
    public jobId: string,
    public reason: 'cancelled' | 'shutdown'
  ) {
    super(`Job ${jobId} stopped: ${reason}`);
    this.name = 'JobCancelledError';
  }
}

/** Unknown errors count as transient; only classified errors may opt out. */
export function isRetryable(error: unknown): boolean {
  if (error instanceof AppError) {
    return error.retryable;
  }
  return true;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
