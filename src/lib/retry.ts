export type RetryOptions = {
  retries: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
  shouldRetry?: (err: unknown) => boolean;
  onRetry?: (err: unknown, attempt: number, delayMs: number) => void;
  sleep?: (ms: number) => Promise<void>;
};

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => {
    setTimeout(resolve, ms);
  });
}

/**
 * Runs `fn` and retries it up to `retries` extra times with exponential
 * backoff. Errors rejected by `shouldRetry` are rethrown immediately.
 */
export async function withRetries<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions,
): Promise<T> {
  const sleep = options.sleep ?? defaultSleep;
  const maxDelay = options.maxDelayMs ?? 30000;
  let attempt = 0;
  let delay = options.baseDelayMs ?? 1000;

  for (;;) {
    try {
      return await fn(attempt + 1);
    } catch (err) {
      attempt = attempt + 1;

      if (attempt > options.retries) {
        throw err;
      }

      if (options.shouldRetry && !options.shouldRetry(err)) {
        throw err;
      }

      const wait = Math.min(delay, maxDelay);
      options.onRetry?.(err, attempt, wait);
      await sleep(wait);
      delay = delay * 2;
    }
  }
}
