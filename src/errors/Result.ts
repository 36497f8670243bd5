/**
 * Result - success or failure as a value
 *
 * Operations that can reject their input return a Result instead of
 * throwing, so both paths are visible in the type.
 */

export interface Ok<T> {
  readonly ok: true;
  readonly value: T;
}

export interface Err<E> {
  readonly ok: false;
  readonly error: E;
}

export type Result<T, E> = Ok<T> | Err<E>;

export function ok<T>(value: T): Ok<T> {
  return { ok: true, value };
}

export function err<E>(error: E): Err<E> {
  return { ok: false, error };
}

/**
 * Apply `fn` to a successful value, passing failures through unchanged.
 */
export function mapResult<T, U, E>(result: Result<T, E>, fn: (value: T) => U): Result<U, E> {
  return result.ok ? ok(fn(result.value)) : result;
}

/**
 * Chain an operation that can itself fail.
 */
export function flatMapResult<T, U, E>(
  result: Result<T, E>,
  fn: (value: T) => Result<U, E>
): Result<U, E> {
  return result.ok ? fn(result.value) : result;
}

/**
 * Extract the value, throwing for failures.
 *
 * @param describe - Formats the error for the thrown message
 */
export function unwrap<T, E>(result: Result<T, E>, describe: (error: E) => string): T {
  if (!result.ok) {
    throw new Error(describe(result.error));
  }
  return result.value;
}
