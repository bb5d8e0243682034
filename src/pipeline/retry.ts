/**
 * Retry logic with exponential backoff
 */

import { MetadataFetchError, PlaylistFetchError } from './errors';

export interface RetryConfig {
  /** Total number of attempts, including the first one */
  maxAttempts: number;
  /** Initial delay between attempts in milliseconds */
  initialDelay: number;
  /** Maximum delay between attempts in milliseconds */
  maxDelay: number;
  /** Exponential backoff base */
  exponentialBase: number;
  /** Add random jitter to delays */
  jitter: boolean;
  /** Decides whether an error is worth another attempt */
  isRetryable: (error: unknown) => boolean;
  /** Called before sleeping ahead of the next attempt */
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
}

export function isRetryableError(error: unknown): boolean {
  if (error instanceof MetadataFetchError || error instanceof PlaylistFetchError) {
    return error.retryable;
  }
  return false;
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxAttempts: 3,
  initialDelay: 1000,
  maxDelay: 30000,
  exponentialBase: 2,
  jitter: true,
  isRetryable: isRetryableError,
};

/**
 * Calculate delay for the given (zero-based) attempt
 */
export function calculateDelay(attempt: number, config: RetryConfig): number {
  let delay = Math.min(
    config.initialDelay * Math.pow(config.exponentialBase, attempt),
    config.maxDelay
  );

  if (config.jitter) {
    // "Equal jitter": random value between 50% and 100% of delay.
    delay = delay * (0.5 + Math.random() * 0.5);
  }

  return delay;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Execute function with retry logic
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  config: RetryConfig = DEFAULT_RETRY_CONFIG
): Promise<T> {
  const attempts = Math.max(1, config.maxAttempts);
  let lastError: unknown;

  for (let attempt = 0; attempt < attempts; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      lastError = error;

      if (attempt + 1 >= attempts || !config.isRetryable(error)) {
        throw error;
      }

      const delay = calculateDelay(attempt, config);
      config.onRetry?.(error, attempt + 1, delay);
      if (delay > 0) {
        await sleep(delay);
      }
    }
  }

  throw lastError;
}
