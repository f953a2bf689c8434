/**
 * Result type for business logic: failures are values, not exceptions.
 *
 * Usage:
 *   const result = evaluateBmi(70, 1.75);
 *
 *   if (result.ok) {
 *     result.value.category; // 'NORMAL'
 *   } else {
 *     result.error.code; // 'BMI_INVALID_INPUT'
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

/**
 * Unwrap a Result, throwing on Err. Only for tests and script entry points.
 */
export function unwrap<T, E>(result: Result<T, E>): T {
  if (result.ok) {
    return result.value;
  }
  throw new Error(`Attempted to unwrap an Err: ${String(result.error)}`);
}
