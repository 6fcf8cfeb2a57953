/**
 * Retry an operation while it fails with a retryable error.
 */

export interface RetryOptions {
  /** Maximum number of attempts */
  maxAttempts?: number;
  /** Which errors warrant another attempt; others are rethrown at once */
  shouldRetry?: (error: unknown) => boolean;
  /** Called before each retry with the failed attempt number */
  onRetry?: (error: unknown, attempt: number) => void;
}

const DEFAULTS: Required<RetryOptions> = {
  maxAttempts: 3,
  shouldRetry: () => true,
  onRetry: () => {},
};

export async function retry<T>(
  fn: (attempt: number) => Promise<T>,
  opts: RetryOptions = {},
): Promise<T> {
  const config = { ...DEFAULTS, ...opts };
  let lastError: unknown;

  for (let attempt = 1; attempt <= config.maxAttempts; attempt++) {
    try {
      return await fn(attempt);
    } catch (err) {
      lastError = err;
      if (!config.shouldRetry(err) || attempt === config.maxAttempts) break;
      config.onRetry(err, attempt);
    }
  }

  throw lastError instanceof Error
    ? lastError
    : new Error(`Retry exhausted: ${String(lastError)}`);
}
