/**
 * Result Pattern
 * Discriminated union returned by every fallible service call
 */

export type Result<T> = { ok: true; value: T } | { ok: false; error: string };

/**
 * Create a success result
 */
export const Success = <T>(value: T): Result<T> => ({ ok: true, value });

/**
 * Create a failure result
 */
export const Failure = <T>(error: string): Result<T> => ({ ok: false, error });

export const isOk = <T>(result: Result<T>): result is { ok: true; value: T } => result.ok;

export const isFail = <T>(result: Result<T>): result is { ok: false; error: string } => !result.ok;

/**
 * Unwrap a result or fall back to a default value
 */
export function valueOr<T>(result: Result<T>, fallback: T): T {
  return result.ok ? result.value : fallback;
}
