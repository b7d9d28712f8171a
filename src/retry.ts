import { setTimeout as sleep } from 'timers/promises';
import { debug } from './misc-utils.js';

/**
 * How an operation is retried.
 *
 * - `retries`: How many times the operation is attempted again after the first
 *   failure.
 * - `minTimeout`: The delay in milliseconds before the first retry.
 * - `factor`: The multiplier applied to the delay after each retry.
 * - `shouldRetry`: Decides whether a given failure is worth another attempt.
 */
export type RetryOptions = {
  retries: number;
  minTimeout: number;
  factor: number;
  shouldRetry: (error: unknown) => boolean;
};

export const DEFAULT_RETRY_OPTIONS: RetryOptions = {
  retries: 3,
  minTimeout: 500,
  factor: 2,
  shouldRetry: () => true,
};

/**
 * Calculates how long to wait before the given retry.
 *
 * @param retryIndex - The zero-based index of the retry.
 * @param options - The retry options.
 * @param options.minTimeout - The delay before the first retry.
 * @param options.factor - The growth factor of the delay.
 * @returns The delay in milliseconds.
 */
export function getRetryDelay(
  retryIndex: number,
  { minTimeout, factor }: Pick<RetryOptions, 'minTimeout' | 'factor'>,
): number {
  return minTimeout * factor ** retryIndex;
}

/**
 * Runs the given operation, running it again with an exponentially growing
 * delay whenever it fails with an error that `shouldRetry` accepts.
 *
 * @param description - What the operation does, for logging.
 * @param operation - The operation to run.
 * @param options - Overrides for {@link DEFAULT_RETRY_OPTIONS}.
 * @returns What the operation resolves to.
 * @throws The error of the last attempt, or the first error that
 * `shouldRetry` rejects.
 */
export async function withRetry<Value>(
  description: string,
  operation: () => Promise<Value>,
  options: Partial<RetryOptions> = {},
): Promise<Value> {
  const { retries, minTimeout, factor, shouldRetry } = {
    ...DEFAULT_RETRY_OPTIONS,
    ...options,
  };

  for (let retryIndex = 0; ; retryIndex++) {
    try {
      return await operation();
    } catch (error) {
      if (retryIndex >= retries || !shouldRetry(error)) {
        throw error;
      }

      const delay = getRetryDelay(retryIndex, { minTimeout, factor });
      debug(
        `${description} failed (attempt ${retryIndex + 1} of ${
          retries + 1
        }), retrying in ${delay}ms`,
      );
      await sleep(delay);
    }
  }
}
