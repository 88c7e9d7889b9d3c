/**
 * Exponential-backoff retry.
 *
 * Delay between attempts is baseDelayMs * 2^(attempt-1), so the defaults
 * wait 300 → 600 ms before giving up on the third attempt.
 */

export interface RetryOptions {
  /** Total attempts including the first one (default 3). */
  attempts?: number;
  /** Delay before the first retry in ms (default 300). */
  baseDelayMs?: number;
  /** Decides whether an error is worth another attempt. Defaults to always. */
  shouldRetry?: (err: unknown) => boolean;
  /** Called before each retry sleep. */
  onRetry?: (err: unknown, attempt: number, delayMs: number) => void;
}

export async function withRetry<T>(
  fn: () => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const maxAttempts = Math.max(1, options.attempts ?? 3);
  const baseDelayMs = options.baseDelayMs ?? 300;
  const shouldRetry = options.shouldRetry ?? (() => true);

  let lastError: unknown;
  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      return await fn();
    } catch (err) {
      lastError = err;
      if (!shouldRetry(err) || attempt === maxAttempts) throw err;
      const delay = baseDelayMs * Math.pow(2, attempt - 1);
      options.onRetry?.(err, attempt, delay);
      await new Promise<void>((r) => setTimeout(r, delay));
    }
  }
  throw lastError;
}
