import { ConnectionError, TimeoutError, errorMessage } from './errors';
import { logWarn } from './logger';
import { wait } from './wait';

export interface RetryOptions {
  maxRetries?: number; // total attempts; undefined = infinite
  initialDelayMs?: number;
  maxDelayMs?: number;
  backoffMultiplier?: number;
  isRetryableError?: (error: unknown) => boolean;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
  signal?: AbortSignal;
}

const DEFAULT_OPTIONS: Required<Pick<RetryOptions, 'initialDelayMs' | 'maxDelayMs' | 'backoffMultiplier'>> = {
  initialDelayMs: 1000,
  maxDelayMs: 30000,
  backoffMultiplier: 2,
};

/**
 * Retries a function with exponential backoff
 * @param fn Function to execute (can be async)
 * @param options Retry configuration options
 * @returns Promise that resolves with the function result or rejects after max retries
 */
export const retryWithBackoff = async <T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<T> => {
  const {
    maxRetries,
    initialDelayMs = DEFAULT_OPTIONS.initialDelayMs,
    maxDelayMs = DEFAULT_OPTIONS.maxDelayMs,
    backoffMultiplier = DEFAULT_OPTIONS.backoffMultiplier,
    isRetryableError = () => true,
    onRetry,
    signal,
  } = options;

  let attempt = 0;
  let delayMs = initialDelayMs;

  for (;;) {
    try {
      return await fn();
    } catch (error: unknown) {
      attempt++;

      if (!isRetryableError(error)) throw error;
      if (maxRetries !== undefined && attempt >= maxRetries) throw error;

      const currentDelay = Math.min(delayMs, maxDelayMs);

      if (onRetry) {
        onRetry(error, attempt, currentDelay);
      } else {
        logWarn(`[Retry] Attempt ${attempt} failed, retrying in ${currentDelay / 1000}s: ${errorMessage(error)}`);
      }

      // A zero delay retries immediately, without yielding to the timer queue
      if (currentDelay > 0) await wait(currentDelay, signal);

      delayMs = Math.min(delayMs * backoffMultiplier, maxDelayMs);
    }
  }
};

/**
 * Errors worth one more attempt: the connection dropped or the broker was slow.
 * Rejections by the broker itself are final.
 */
export const isTransientError = (error: unknown): boolean =>
  error instanceof ConnectionError || error instanceof TimeoutError;
