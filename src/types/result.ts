/**
 * Result type for chart transitions that can be rejected.
 * Either a value (ok) or the error explaining the rejection.
 */
export type Result<T, E = Error> = { ok: true; data: T } | { ok: false; error: E };

/**
 * Creates a successful Result
 */
export function ok<T>(data: T): Result<T, never> {
  return { ok: true, data };
}

/**
 * Creates an error Result
 */
export function err<E>(error: E): Result<never, E> {
  return { ok: false, error };
}

/**
 * Chains a fallible step onto a Result, short-circuiting on the first error.
 */
export function andThen<T, U, E>(result: Result<T, E>, next: (data: T) => Result<U, E>): Result<U, E> {
  return result.ok ? next(result.data) : result;
}

/**
 * Unwraps a Result, returning the data if successful or throwing the error
 * @throws The error if the Result is not ok
 */
export function unwrap<T, E = Error>(result: Result<T, E>): T {
  if (!result.ok) {
    throw result.error;
  }
  return result.data;
}

/**
 * Unwraps the error from a Result that is known to be an error
 */
export function unwrapErr<T, E>(result: Result<T, E>): E {
  if (result.ok) {
    throw new Error('Called unwrapErr on a successful Result');
  }
  return result.error;
}
