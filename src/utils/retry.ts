/**
 * Retry Utilities
 *
 * Exponential backoff for transient scrape failures.
 */

export interface RetryOptions {
  /** Maximum number of attempts (default: 3) */
  maxAttempts?: number;
  /** Initial backoff delay in milliseconds (default: 500) */
  initialBackoffMs?: number;
  /** Maximum backoff delay in milliseconds (default: 10000) */
  maxBackoffMs?: number;
  /** Backoff multiplier (default: 2) */
  backoffMultiplier?: number;
  /** Optional jitter to add randomness (0-1, default: 0.1) */
  jitter?: number;
  /** Decides whether an error is worth another attempt (default: all errors) */
  isRetryable?: (error: unknown) => boolean;
  /** Callback for each retry attempt */
  onRetry?: (attempt: number, error: unknown, nextDelayMs: number) => void;
  /** Stops further attempts; the last error is rethrown */
  signal?: AbortSignal;
}

const DEFAULT_OPTIONS: Required<Omit<RetryOptions, 'signal'>> = {
  maxAttempts: 3,
  initialBackoffMs: 500,
  maxBackoffMs: 10_000,
  backoffMultiplier: 2,
  jitter: 0.1,
  isRetryable: () => true,
  onRetry: () => {},
};

/**
 * Execute a function with exponential backoff retry logic.
 *
 * @param fn - Receives the 1-based attempt number
 * @throws The last error if all attempts fail
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  options?: RetryOptions
): Promise<T> {
  const opts = { ...DEFAULT_OPTIONS, ...options };
  let currentBackoff = opts.initialBackoffMs;

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      if (attempt >= opts.maxAttempts || !opts.isRetryable(error) || opts.signal?.aborted) {
        throw error;
      }

      const jitterAmount = currentBackoff * opts.jitter * (Math.random() * 2 - 1);
      const delay = Math.max(0, Math.min(currentBackoff + jitterAmount, opts.maxBackoffMs));

      opts.onRetry(attempt, error, delay);

      const interrupted = await sleep(delay, opts.signal);
      if (interrupted) {
        throw error;
      }

      currentBackoff = Math.min(currentBackoff * opts.backoffMultiplier, opts.maxBackoffMs);
    }
  }
}

/**
 * Resolves to true when the signal aborted before the delay elapsed.
 */
function sleep(ms: number, signal?: AbortSignal): Promise<boolean> {
  return new Promise((resolve) => {
    const onAbort = () => {
      clearTimeout(timer);
      resolve(true);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve(false);
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
