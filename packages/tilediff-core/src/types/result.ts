/**
 * Result type for explicit error handling.
 * Precondition failures of a diff come back as a `Failure` instead of a throw.
 */

export interface Success<T> {
  success: true;
  value: T;
}

export interface Failure<E> {
  success: false;
  error: E;
}

/**
 * @example
 * ```typescript
 * const result = diffSync(before, after, output);
 * if (isErr(result)) {
 *   console.error(result.error.message);
 * } else {
 *   console.log(result.value.diffCount);
 * }
 * ```
 */
export type Result<T, E> = Success<T> | Failure<E>;

export function ok<T>(value: T): Success<T> {
  return { success: true, value };
}

export function err<E>(error: E): Failure<E> {
  return { success: false, error };
}

export function isOk<T, E>(result: Result<T, E>): result is Success<T> {
  return result.success;
}

export function isErr<T, E>(result: Result<T, E>): result is Failure<E> {
  return !result.success;
}

/**
 * Unwrap a result or throw.
 * Error-shaped failures (anything with a string `message`) keep their message.
 * @throws If result is a failure
 */
export function unwrap<T, E>(result: Result<T, E>): T {
  if (result.success) {
    return result.value;
  }
  const { error } = result;
  if (error instanceof Error) {
    throw error;
  }
  if (typeof error === 'object' && error !== null && 'message' in error) {
    throw new Error(String(error.message));
  }
  throw new Error(String(error));
}

export function unwrapOr<T, E>(result: Result<T, E>, defaultValue: T): T {
  return result.success ? result.value : defaultValue;
}
