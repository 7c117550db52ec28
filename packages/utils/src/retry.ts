/**
 * Bounded retry with exponential backoff. The delay doubles after every
 * failed attempt until it reaches `maxDelay`.
 */

export interface RetryOptions {
  maxAttempts: number;
  initialDelay: number;
  maxDelay: number;
  /** Errors this rejects are rethrown at once */
  retryIf?: (error: unknown) => boolean;
  onRetry?: (error: unknown, attempt: number, delay: number) => void;
}

const DEFAULTS: RetryOptions = {
  maxAttempts: 3,
  initialDelay: 1000,
  maxDelay: 30000,
};

export async function retry<T>(
  fn: (attempt: number) => Promise<T>,
  options: Partial<RetryOptions> = {}
): Promise<T> {
  const { maxAttempts, initialDelay, maxDelay, retryIf, onRetry } = { ...DEFAULTS, ...options };
  const attempts = Math.max(1, maxAttempts);

  for (let attempt = 1, delay = initialDelay; ; attempt++, delay = Math.min(delay * 2, maxDelay)) {
    try {
      return await fn(attempt);
    } catch (error) {
      if (attempt >= attempts || (retryIf && !retryIf(error))) {
        throw error;
      }
      onRetry?.(error, attempt, delay);
      await new Promise<void>(resolve => setTimeout(resolve, delay));
    }
  }
}
