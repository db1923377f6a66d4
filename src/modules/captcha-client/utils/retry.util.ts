/**
 * Retry utility with exponential backoff
 *
 * Used for transient failures while polling a CAPTCHA and by the solver
 * service around whole decode attempts.
 */

/**
 * Options for retry with backoff
 */
export interface RetryOptions {
  /**
   * Maximum number of attempts (including the initial attempt)
   * @default 3
   */
  maxAttempts: number;

  /**
   * Initial backoff delay in milliseconds
   * @default 1000
   */
  backoffMs: number;

  /**
   * Maximum backoff delay in milliseconds (caps the exponential growth)
   * @default 10000
   */
  maxBackoffMs?: number;

  /**
   * Decides whether an error should trigger another attempt
   */
  shouldRetry?: (error: unknown) => boolean;

  /**
   * Called before each retry attempt
   * @param attempt - Attempt that just failed (1-indexed)
   * @param delay - Delay before the next attempt in milliseconds
   */
  onRetry?: (attempt: number, error: unknown, delay: number) => void;

  /**
   * Called when all attempts are exhausted
   */
  onExhausted?: (lastError: unknown, attempts: number) => void;

  /**
   * Waits between attempts. Defaults to a timer; tests and the polling loop
   * pass their own clock here.
   */
  sleep?: (ms: number) => Promise<void>;
}

const DEFAULT_MAX_BACKOFF_MS = 10000;

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Calculate exponential backoff delay
 * @param attempt - Current attempt number (1-indexed)
 */
export function calculateBackoffDelay(
  attempt: number,
  initialBackoff: number,
  maxBackoff: number,
): number {
  // initialBackoff * 2^(attempt-1), capped at maxBackoff
  return Math.min(initialBackoff * Math.pow(2, attempt - 1), maxBackoff);
}

/**
 * Retry an async function with exponential backoff
 *
 * @returns The function's resolved value
 * @throws The last error if all attempts are exhausted, or the first error
 * `shouldRetry` rejects
 *
 * @example
 * ```typescript
 * const record = await retryWithBackoff(
 *   () => client.getCaptcha(id),
 *   {
 *     maxAttempts: 3,
 *     backoffMs: 500,
 *     shouldRetry: isRecoverableError,
 *   },
 * );
 * ```
 */
export async function retryWithBackoff<T>(
  fn: () => Promise<T>,
  options: RetryOptions,
): Promise<T> {
  const maxAttempts = Math.max(1, options.maxAttempts);
  const maxBackoffMs = options.maxBackoffMs ?? DEFAULT_MAX_BACKOFF_MS;
  const wait = options.sleep ?? sleep;
  let lastError: unknown = null;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      return await fn();
    } catch (error: unknown) {
      lastError = error;

      if (options.shouldRetry && !options.shouldRetry(error)) {
        throw error;
      }

      if (attempt >= maxAttempts) {
        break;
      }

      const delay = calculateBackoffDelay(
        attempt,
        options.backoffMs,
        maxBackoffMs,
      );

      if (options.onRetry) {
        options.onRetry(attempt, error, delay);
      }

      await wait(delay);
    }
  }

  if (options.onExhausted) {
    options.onExhausted(lastError, maxAttempts);
  }

  throw lastError;
}
