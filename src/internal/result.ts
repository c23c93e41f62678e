/**
 * Result type for operations whose failures are expected and recoverable.
 *
 * Decoding, slicing and parsing return a `Result` instead of throwing so the
 * caller decides what a failure means.
 */

export type Ok<T> = { readonly kind: "ok"; readonly value: T };
export type Err<E> = { readonly kind: "err"; readonly error: E };

export type Result<T, E> = Ok<T> | Err<E>;

export const ok = <T>(value: T): Ok<T> => ({ kind: "ok", value });
export const err = <E>(error: E): Err<E> => ({ kind: "err", error });

export function isOk<T, E>(result: Result<T, E>): result is Ok<T> {
  return result.kind === "ok";
}

export function isErr<T, E>(result: Result<T, E>): result is Err<E> {
  return result.kind === "err";
}

export function map<T, E, U>(
  result: Result<T, E>,
  fn: (value: T) => U,
): Result<U, E> {
  return result.kind === "ok" ? ok(fn(result.value)) : result;
}

export function mapErr<T, E, F>(
  result: Result<T, E>,
  fn: (error: E) => F,
): Result<T, F> {
  return result.kind === "err" ? err(fn(result.error)) : result;
}

export function andThen<T, E, U>(
  result: Result<T, E>,
  fn: (value: T) => Result<U, E>,
): Result<U, E> {
  return result.kind === "ok" ? fn(result.value) : result;
}

/**
 * Returns the value of an ok result, or throws the carried error.
 * Use where a failure is a programming error rather than bad input.
 */
export function unwrap<T, E extends Error>(result: Result<T, E>): T {
  if (result.kind === "err") {
    throw result.error;
  }
  return result.value;
}
