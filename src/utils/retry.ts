import { logger } from '../config/logger';

export interface RetryOptions {
  maxRetries: number;
  baseDelayMs: number;
  /** Return false to give up immediately on this error. */
  shouldRetry?: (error: unknown) => boolean;
  label?: string;
}

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * Runs `task`, retrying failures with exponential backoff
 * (baseDelayMs, 2x, 4x, ...). Resolves with the result and the number of
 * attempts made; rethrows the last error once retries are exhausted.
 */
export const withRetry = async <T>(
  task: () => Promise<T>,
  { maxRetries, baseDelayMs, shouldRetry = () => true, label = 'task' }: RetryOptions
): Promise<{ result: T; attempts: number }> => {
  let attempt = 0;

  for (;;) {
    attempt += 1;
    try {
      return { result: await task(), attempts: attempt };
    } catch (error) {
      if (attempt > maxRetries || !shouldRetry(error)) {
        throw error;
      }

      const delay = baseDelayMs * 2 ** (attempt - 1);
      logger.warn(`${label} failed, retrying`, {
        attempt,
        maxRetries,
        delayMs: delay,
        error: error instanceof Error ? error.message : String(error)
      });
      await sleep(delay);
    }
  }
};
