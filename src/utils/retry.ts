import { sleep as defaultSleep, type SleepFn } from './delay.js';
import { logger } from '../config/logger.js';
import { toErrorMessage } from './errors.js';

export interface RetryOptions {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  backoffMultiplier: number;
  /** Return false to give up immediately on this error */
  shouldRetry: (error: unknown) => boolean;
  sleep: SleepFn;
}

const DEFAULT_OPTIONS: RetryOptions = {
  maxAttempts: 3,
  baseDelayMs: 1000,
  maxDelayMs: 30000,
  backoffMultiplier: 2,
  shouldRetry: () => true,
  sleep: defaultSleep,
};

/**
 * Retry a function with exponential backoff.
 * The last error is rethrown once attempts run out or shouldRetry refuses.
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  label: string,
  options: Partial<RetryOptions> = {},
): Promise<T> {
  const opts = { ...DEFAULT_OPTIONS, ...options };
  let lastError: unknown;
  let delay = opts.baseDelayMs;

  for (let attempt = 1; attempt <= opts.maxAttempts; attempt++) {
    try {
      return await fn(attempt);
    } catch (error: unknown) {
      lastError = error;
      if (attempt === opts.maxAttempts || !opts.shouldRetry(error)) break;
      logger.warn(`${label} attempt ${attempt}/${opts.maxAttempts} failed: ${toErrorMessage(error)}. Retrying in ${delay}ms`);
      await opts.sleep(delay);
      delay = Math.min(delay * opts.backoffMultiplier, opts.maxDelayMs);
    }
  }

  throw lastError;
}
