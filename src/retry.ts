/** bounded retry without backoff */
export type RetryPolicy = {
  /** total attempts including the first one */
  maxAttempts: number;
  /** whether a failure may be retried at all */
  shouldRetry: (err: unknown) => boolean;
  /** recovery action run before the next attempt */
  beforeRetry?: (err: unknown, attempt: number) => Promise<void>;
};

/**
 * Run `operation` until it succeeds, the error is not retryable or
 * `maxAttempts` is reached. The last error is rethrown unchanged.
 */
export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
): Promise<T> {
  const maxAttempts = Math.max(1, Math.floor(policy.maxAttempts));
  for (let attempt = 1; ; attempt++) {
    try {
      return await operation(attempt);
    } catch (err) {
      if (attempt >= maxAttempts || !policy.shouldRetry(err)) {
        throw err;
      }
      await policy.beforeRetry?.(err, attempt);
    }
  }
}
