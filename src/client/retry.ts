import type { Logger } from '../audit/logger.js';

export interface RetryOptions {
  maxAttempts?: number;
  initialDelayMs?: number;
  maxDelayMs?: number;
  backoffMultiplier?: number;
  /** Errors for which this returns false are rethrown without another attempt. */
  shouldRetry?: (error: unknown) => boolean;
  /** Minimum wait the failed attempt asked for (e.g. Retry-After), in ms. */
  minDelayFor?: (error: unknown) => number | undefined;
  sleep?: (ms: number) => Promise<void>;
}

const defaultOptions = {
  maxAttempts: 3,
  initialDelayMs: 500,
  maxDelayMs: 8_000,
  backoffMultiplier: 2,
};

/**
 * Executes an async function with bounded exponential backoff.
 * Rethrows the last error once attempts run out or a non-retryable error occurs.
 */
export async function executeWithRetry<T>(
  operation: (attempt: number) => Promise<T>,
  options: RetryOptions = {},
  logger?: Logger,
): Promise<T> {
  const maxAttempts = options.maxAttempts ?? defaultOptions.maxAttempts;
  const maxDelayMs = options.maxDelayMs ?? defaultOptions.maxDelayMs;
  const multiplier = options.backoffMultiplier ?? defaultOptions.backoffMultiplier;
  const shouldRetry = options.shouldRetry ?? (() => true);
  const wait = options.sleep ?? sleep;
  let delayMs = options.initialDelayMs ?? defaultOptions.initialDelayMs;

  for (let attempt = 1; ; attempt++) {
    try {
      return await operation(attempt);
    } catch (error) {
      if (!shouldRetry(error)) {
        throw error;
      }

      if (attempt >= maxAttempts) {
        logger?.warn('Retry attempts exhausted', {
          attempts: attempt,
          error: String(error),
        });
        throw error;
      }

      const requested = options.minDelayFor?.(error) ?? 0;
      const waitMs = Math.min(Math.max(delayMs, requested), maxDelayMs);

      logger?.warn('Operation failed, retrying', {
        attempt,
        maxAttempts,
        delayMs: waitMs,
        error: String(error),
      });

      await wait(waitMs);
      delayMs = Math.min(delayMs * multiplier, maxDelayMs);
    }
  }
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
