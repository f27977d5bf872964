/**
 * Exponential backoff with jitter for retrying operations.
 */

export interface RetryOptions {
  /** Maximum number of attempts (including the first). Default: 3 */
  maxAttempts?: number;
  /** Base delay in milliseconds. Default: 1000 */
  baseDelayMs?: number;
  /** Maximum delay in milliseconds. Default: 30000 */
  maxDelayMs?: number;
  /** Return true to stop retrying and rethrow immediately. */
  shouldAbort?: (error: unknown) => boolean;
  /** Called before each backoff sleep. */
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
  /** Cancels pending backoff sleeps; the last error is rethrown. */
  signal?: AbortSignal;
}

/**
 * Retry an async operation with exponential backoff and full jitter.
 *
 * Delay formula: random(0, min(maxDelay, baseDelay * 2^attempt))
 */
export async function retry<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const {
    maxAttempts = 3,
    baseDelayMs = 1000,
    maxDelayMs = 30000,
    shouldAbort,
    onRetry,
    signal,
  } = options;

  let lastError: unknown;

  for (let attempt = 0; attempt < maxAttempts; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      lastError = error;

      if (shouldAbort?.(error) || signal?.aborted) {
        throw error;
      }

      if (attempt < maxAttempts - 1) {
        const cappedDelay = Math.min(baseDelayMs * Math.pow(2, attempt), maxDelayMs);
        const jitteredDelay = Math.random() * cappedDelay;
        onRetry?.(error, attempt, jitteredDelay);
        await sleep(jitteredDelay, signal);
        if (signal?.aborted) {
          throw error;
        }
      }
    }
  }

  throw lastError;
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}
