/**
 * Retry Utility with Exponential Backoff
 *
 * Provides a centralized retry mechanism for transient failures.
 * Supports configurable attempt counts, delays, retryable error detection
 * and a hook that runs before each retry (e.g. to refresh a session).
 */

import { logger } from './logger.js';

/**
 * Configuration for retry behavior
 */
export interface RetryConfig {
  /** Maximum number of retry attempts after the first try (default: 3) */
  maxAttempts?: number;
  /** Initial delay in milliseconds (default: 1000) */
  initialDelay?: number;
  /** Maximum delay in milliseconds (default: 30000) */
  maxDelay?: number;
  /** Exponential backoff multiplier (default: 2) */
  multiplier?: number;
  /** Function to determine if an error is retryable (default: network and 5xx/429 errors) */
  isRetryable?: (error: unknown) => boolean;
  /** Custom delay function (overrides exponential backoff if provided) */
  getDelay?: (attempt: number, error: unknown) => number;
  /** Runs after the delay and before the next attempt */
  onRetry?: (attempt: number, error: unknown) => void | Promise<void>;
  /** Sleep implementation, replaceable in tests */
  sleep?: (ms: number) => Promise<void>;
}

const DEFAULT_RETRY_CONFIG = {
  maxAttempts: 3,
  initialDelay: 1000,
  maxDelay: 30000,
  multiplier: 2,
};

function errorField(error: unknown, field: string): unknown {
  if (error && typeof error === 'object' && field in error) {
    return Object.getOwnPropertyDescriptor(error, field)?.value;
  }
  return undefined;
}

/**
 * Default retryable error detection
 * Retries on rate limits (429), server errors (5xx) and dropped connections
 */
function defaultIsRetryable(error: unknown): boolean {
  const response = errorField(error, 'response');
  const status = errorField(response, 'status');
  if (typeof status === 'number') {
    return status === 429 || (status >= 500 && status < 600);
  }

  const code = errorField(error, 'code');
  if (code === 'ECONNRESET' || code === 'ETIMEDOUT' || code === 'ECONNREFUSED' || code === 'ECONNABORTED') {
    return true;
  }

  // axios errors without a response are network failures
  return errorField(error, 'isAxiosError') === true && response === undefined;
}

/**
 * Calculate exponential backoff delay
 *
 * @param attempt - Current attempt number (0-indexed)
 */
export function calculateExponentialBackoff(
  attempt: number,
  initialDelay: number,
  multiplier: number,
  maxDelay: number
): number {
  const delay = initialDelay * Math.pow(multiplier, attempt);
  return Math.min(delay, maxDelay);
}

const defaultSleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Retry an operation with exponential backoff
 *
 * @param operation - The operation to retry
 * @param context - Optional context for logging (e.g., operation name)
 * @returns Result of the operation
 * @throws The last error if all retries are exhausted or the error is not retryable
 */
export async function retryWithBackoff<T>(
  operation: () => Promise<T>,
  config: RetryConfig = {},
  context?: string
): Promise<T> {
  const {
    maxAttempts = DEFAULT_RETRY_CONFIG.maxAttempts,
    initialDelay = DEFAULT_RETRY_CONFIG.initialDelay,
    maxDelay = DEFAULT_RETRY_CONFIG.maxDelay,
    multiplier = DEFAULT_RETRY_CONFIG.multiplier,
    isRetryable = defaultIsRetryable,
    getDelay,
    onRetry,
    sleep = defaultSleep,
  } = config;

  const contextStr = context ? ` (${context})` : '';

  for (let attempt = 0; ; attempt++) {
    try {
      const result = await operation();

      if (attempt > 0) {
        logger.info(
          { attempt: attempt + 1, maxAttempts: maxAttempts + 1, context },
          `Operation succeeded after ${attempt} retry attempts${contextStr}`
        );
      }

      return result;
    } catch (error) {
      if (!isRetryable(error)) {
        throw error;
      }

      if (attempt >= maxAttempts) {
        logger.error(
          {
            attempt: attempt + 1,
            maxAttempts: maxAttempts + 1,
            error: error instanceof Error ? error.message : String(error),
            context,
          },
          `Operation failed after ${maxAttempts + 1} attempts${contextStr}`
        );
        throw error;
      }

      const delay = getDelay
        ? getDelay(attempt, error)
        : calculateExponentialBackoff(attempt, initialDelay, multiplier, maxDelay);

      logger.warn(
        {
          attempt: attempt + 1,
          maxAttempts: maxAttempts + 1,
          delay,
          error: error instanceof Error ? error.message : String(error),
          context,
        },
        `Retrying operation${contextStr} (attempt ${attempt + 1}/${maxAttempts + 1})`
      );

      await sleep(delay);
      if (onRetry) {
        await onRetry(attempt, error);
      }
    }
  }
}

/**
 * Check if an error is retryable using default logic
 */
export function isRetryableError(error: unknown): boolean {
  return defaultIsRetryable(error);
}
