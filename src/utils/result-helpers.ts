/**
 * Result Type Helpers
 *
 * ReScript-inspired Result types for explicit error handling at the
 * transport boundary: a rejected transport promise becomes an Err value
 * the executor classifies, instead of an exception crossing the runner.
 *
 * Usage:
 * ```typescript
 * const result = await resultify(transport.send(request, signal));
 * if (result.err) {
 *   // classify result.val
 * } else {
 *   const response = result.val;
 * }
 * ```
 */

import { Result, Ok, Err } from 'ts-results';

/**
 * Helper to convert Promise<T> to Promise<Result<T, Error>>
 *
 * Non-Error rejections are wrapped so callers always get an Error.
 */
export async function resultify<T>(promise: Promise<T>): Promise<Result<T, Error>> {
  try {
    const value = await promise;
    return Ok(value);
  } catch (error) {
    return Err(error instanceof Error ? error : new Error(String(error)));
  }
}

/**
 * Helper to run a synchronous function that may throw
 *
 * @example
 * ```typescript
 * const parsed = attempt(() => JSON.parse(body));
 * ```
 */
export function attempt<T>(fn: () => T): Result<T, Error> {
  try {
    return Ok(fn());
  } catch (error) {
    return Err(error instanceof Error ? error : new Error(String(error)));
  }
}

// Re-export Result types for convenience
export { Result, Ok, Err };
