export interface BackoffOptions {
  baseDelayMs: number;
  maxDelayMs: number;
  /** Fraction of the delay added as random jitter (0.1 = up to 10%). */
  jitter?: number;
}

export type BackoffPolicy = (attempt: number) => number;

/**
 * Exponential backoff: base * 2^(attempt - 1), capped, plus jitter.
 * `attempt` is the 1-based number of the retry being scheduled.
 */
export function exponentialBackoff(options: BackoffOptions, random: () => number = Math.random): BackoffPolicy {
  const jitter = options.jitter ?? 0.1;
  return (attempt: number) => {
    const exponent = Math.max(attempt - 1, 0);
    const delay = Math.min(options.baseDelayMs * Math.pow(2, exponent), options.maxDelayMs);
    return Math.round(delay + random() * jitter * delay);
  };
}

export const noBackoff: BackoffPolicy = () => 0;
