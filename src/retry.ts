import { TransientServiceError } from './errors.js';

export interface RetryOptions {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export const DEFAULT_RETRY: RetryOptions = {
  maxAttempts: 3,
  baseDelayMs: 1000,
  maxDelayMs: 3000,
};

/** Capped exponential backoff: base * 2^attempt, never above maxDelayMs */
export function backoffDelay(attempt: number, options: RetryOptions): number {
  return Math.min(options.baseDelayMs * 2 ** attempt, options.maxDelayMs);
}

/**
 * Run `fn`, retrying only on TransientServiceError. Any other error, and the
 * last transient one once attempts run out, is rethrown to the caller.
 */
export async function withRetry<T>(
  label: string,
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions = DEFAULT_RETRY,
  sleep: (ms: number) => Promise<void> = ms => new Promise<void>(resolve => setTimeout(resolve, ms))
): Promise<T> {
  for (let attempt = 0; ; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      if (!(error instanceof TransientServiceError) || attempt >= options.maxAttempts - 1) throw error;
      const delay = backoffDelay(attempt, options);
      console.error(`[Retry] ${label} failed (attempt ${attempt + 1}/${options.maxAttempts}): ${error.message}. Retrying in ${delay}ms`);
      await sleep(delay);
    }
  }
}
