import { logger } from './logger.js';
import { errorMessage } from './errors.js';
import { sleep as defaultSleep } from './utils.js';

/**
 * Declarative retry policy applied uniformly to sink calls.
 * `backoff(attempt)` is the delay before the given 1-based attempt.
 */
export interface RetryPolicy {
  maxAttempts: number;
  backoff: (attempt: number) => number;
  retryable: (err: unknown) => boolean;
}

/** 0 before the first attempt, then base, 2×base, 4×base, … */
export function exponentialBackoff(baseDelayMs: number): (attempt: number) => number {
  return (attempt) => (attempt <= 1 ? 0 : baseDelayMs * 2 ** (attempt - 2));
}

export function retryPolicy(opts: {
  maxAttempts: number;
  baseDelayMs: number;
  retryable?: (err: unknown) => boolean;
}): RetryPolicy {
  return {
    maxAttempts: Math.max(1, opts.maxAttempts),
    backoff: exponentialBackoff(opts.baseDelayMs),
    retryable: opts.retryable ?? (() => true),
  };
}

export class RetryExhaustedError extends Error {
  constructor(
    message: string,
    public readonly attempts: number,
    public readonly lastError: unknown,
  ) {
    super(message);
    this.name = 'RetryExhaustedError';
  }
}

export interface RetryOptions {
  label: string;
  context?: Record<string, unknown>;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Run `fn` under `policy`. Throws RetryExhaustedError once attempts run out or the
 * error is not retryable.
 */
export async function withRetry<T>(
  policy: RetryPolicy,
  fn: (attempt: number) => Promise<T>,
  opts: RetryOptions,
): Promise<T> {
  const wait = opts.sleep ?? defaultSleep;
  let lastError: unknown = null;

  for (let attempt = 1; attempt <= policy.maxAttempts; attempt++) {
    const delay = policy.backoff(attempt);
    if (delay > 0) {
      logger.info({ ...opts.context, attempt, delay }, `${opts.label}: retrying after backoff`);
      await wait(delay);
    }

    try {
      return await fn(attempt);
    } catch (err) {
      lastError = err;
      logger.warn(
        { ...opts.context, attempt, maxAttempts: policy.maxAttempts, error: errorMessage(err) },
        `${opts.label}: attempt failed`,
      );
      if (!policy.retryable(err)) {
        throw new RetryExhaustedError(
          `${opts.label} failed with a non-retryable error: ${errorMessage(err)}`,
          attempt,
          err,
        );
      }
    }
  }

  throw new RetryExhaustedError(
    `${opts.label} failed after ${policy.maxAttempts} attempts: ${errorMessage(lastError)}`,
    policy.maxAttempts,
    lastError,
  );
}
