export interface RetryOptions {
  /** Extra attempts after the first one. */
  retries?: number;
  delayMs?: number;
  onRetry?: (error: unknown, attempt: number) => void;
}

/**
 * Runs `operation` until it resolves, waiting a linearly growing delay
 * between attempts. The last error is rethrown once the budget is spent.
 */
export async function retryOperation<T>(
  operation: (attempt: number) => Promise<T>,
  options: RetryOptions = {},
): Promise<T> {
  const retries = options.retries ?? 3;
  const delayMs = options.delayMs ?? 300;
  let lastError: unknown;

  for (let attempt = 0; attempt <= retries; attempt += 1) {
    try {
      return await operation(attempt);
    } catch (error) {
      lastError = error;
      if (attempt >= retries) {
        break;
      }
      options.onRetry?.(error, attempt + 1);
      await sleep(delayMs * (attempt + 1));
    }
  }
  throw lastError;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
