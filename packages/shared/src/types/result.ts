/**
 * Result type for business logic: no throwing, explicit error handling.
 *
 * Usage:
 *   const result = ok(42);
 *   const error = err(AppError.create('SOME_ERROR', 'Something went wrong'));
 *
 *   if (result.ok) {
 *     console.log(result.value); // 42
 *   } else {
 *     console.log(result.error); // AppError
 *   }
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
