import createDebug from 'debug';
import { ErrorWithCause } from 'pony-cause';

export { isTruthyString } from '@metamask/action-utils';

/**
 * Logs what a run is doing. Enable it with
 * `DEBUG=terraform-module-versions:*`.
 */
export const debug = createDebug('terraform-module-versions:impl');

/**
 * Type guard for errors carrying a `code`, such as the ones Node throws for
 * filesystem operations (`ENOENT`, `EACCES`).
 *
 * @param error - The object to check.
 * @returns True or false, depending on the result.
 */
export function isErrorWithCode(error: unknown): error is { code: string } {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    typeof error.code === 'string'
  );
}

/**
 * Puts the given message in front of an error raised by a lower layer, so
 * that a failure names the directory, file or module it concerns. The lower
 * error stays reachable through `cause`, and its `code` is kept so that
 * callers can still tell an `ENOENT` apart.
 *
 * `fs.promises` errors carry no stack trace, so wrapping them is the only way
 * to see where they came from.
 *
 * @param message - What was being attempted.
 * @param originalError - What was thrown.
 * @returns The wrapped error.
 */
export function wrapError(message: string, originalError: unknown): Error {
  if (!(originalError instanceof Error)) {
    return new Error(`${message}: ${String(originalError)}`);
  }

  const error: Error & { code?: string } = new ErrorWithCause(message, {
    cause: originalError,
  });

  if (isErrorWithCode(originalError)) {
    error.code = originalError.code;
  }

  return error;
}
