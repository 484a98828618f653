export interface RetryOptions {
  /** Attempts including the first. Default: 2 */
  maxAttempts?: number;
  /** Pause before each retry. Default: 50 */
  delayMs?: number;
  /** Called before each pause with the attempt that just failed. */
  onRetry?: (error: unknown, attempt: number) => void;
}

/**
 * Runs `fn` until it resolves or attempts run out, then rethrows the last
 * error. Store writes use this with a single quick retry.
 */
export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const { maxAttempts = 2, delayMs = 50, onRetry } = options;

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      if (attempt >= maxAttempts) throw error;

      onRetry?.(error, attempt);
      if (delayMs > 0) await new Promise((resolve) => setTimeout(resolve, delayMs));
    }
  }
}
