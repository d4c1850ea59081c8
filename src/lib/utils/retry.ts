export type RetryOptions = {
  maxRetries?: number;
  baseDelayMs?: number;
  factor?: number;
  maxDelayMs?: number;
  /** Errors for which this returns false are thrown without further attempts. */
  shouldRetry?: (error: unknown) => boolean;
  onRetry?: (attempt: number, error: unknown, delayMs: number) => void;
  /** Cuts a backoff wait short; the last error is then thrown. */
  signal?: AbortSignal;
};

export async function retryWithBackoff<T>(
  operation: () => Promise<T>,
  options: RetryOptions = {},
): Promise<T> {
  const maxRetries = options.maxRetries ?? 3;
  const baseDelayMs = options.baseDelayMs ?? 250;
  const factor = options.factor ?? 2;
  const maxDelayMs = options.maxDelayMs ?? Number.POSITIVE_INFINITY;

  for (let attempt = 0; ; attempt += 1) {
    try {
      return await operation();
    } catch (error) {
      const retryable = options.shouldRetry?.(error) ?? true;
      if (attempt >= maxRetries || !retryable || options.signal?.aborted) {
        throw error instanceof Error ? error : new Error("Retry operation failed");
      }

      const delayMs = Math.min(baseDelayMs * factor ** attempt, maxDelayMs);
      options.onRetry?.(attempt + 1, error, delayMs);
      await sleep(delayMs, options.signal);

      if (options.signal?.aborted) {
        throw error instanceof Error ? error : new Error("Retry operation failed");
      }
    }
  }
}

/** Resolves after `ms`, or as soon as `signal` aborts. */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }

    const done = () => {
      clearTimeout(timer);
      signal?.removeEventListener("abort", done);
      resolve();
    };
    const timer = setTimeout(done, ms);
    signal?.addEventListener("abort", done, { once: true });
  });
}
