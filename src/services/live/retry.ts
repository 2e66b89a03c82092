// Retry with exponential backoff for live-source calls

/**
 * Backoff policy injected into fetchers
 */
export interface RetryPolicy {
  /** Give up once this much time has passed since the first attempt */
  maxElapsedMs: number;
  /** Delay before the first retry */
  baseDelayMs: number;
  /** Growth factor applied to the delay after each retry */
  multiplier: number;
  /** Upper bound for a single delay */
  maxDelayMs: number;
}

export const DEFAULT_RETRY_POLICY: Readonly<RetryPolicy> = Object.freeze({
  maxElapsedMs: 30000,
  baseDelayMs: 500,
  multiplier: 1.5,
  maxDelayMs: 10000
});

export interface RetryOptions {
  /** Aborts pending sleeps and prevents further attempts */
  signal?: AbortSignal;
  /** Whether an error is worth another attempt; defaults to always */
  isRetryable?: (error: unknown) => boolean;
  /** Called before each sleep */
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  now?: () => number;
}

/**
 * Delay before retry number `attempt` (1-based)
 */
export function backoffDelay(policy: RetryPolicy, attempt: number): number {
  const delay = policy.baseDelayMs * Math.pow(policy.multiplier, attempt - 1);
  return Math.min(delay, policy.maxDelayMs);
}

/**
 * Executes an async operation, retrying failures with exponential
 * backoff until it succeeds, fails with a non-retryable error, or the
 * policy's elapsed-time budget would be exceeded by the next sleep.
 * The last error is rethrown.
 */
export async function retryWithBackoff<T>(
  operation: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  options: RetryOptions = {}
): Promise<T> {
  const sleep = options.sleep ?? abortableSleep;
  const now = options.now ?? (() => Date.now());
  const isRetryable = options.isRetryable ?? (() => true);
  const startedAt = now();

  for (let attempt = 1; ; attempt++) {
    options.signal?.throwIfAborted();

    try {
      return await operation(attempt);
    } catch (error) {
      if (options.signal?.aborted || !isRetryable(error)) {
        throw error;
      }

      const delay = backoffDelay(policy, attempt);
      if (now() - startedAt + delay > policy.maxElapsedMs) {
        throw error;
      }

      options.onRetry?.(error, attempt, delay);
      await sleep(delay, options.signal);
    }
  }
}

/**
 * Resolves after `ms`, or rejects with the signal's reason once aborted
 */
export function abortableSleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason);
    };

    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
