/**
 * Helper functions for working with Result<T, E> types.
 *
 * A Result is an owned, immutable value. `release()` marks it as consumed;
 * from then on every helper here treats it as an absent handle: no branch is
 * visible, fallbacks apply and `match()` runs no handler.
 *
 * @module result
 */

import { Result, Maybe, Ok as OkType, Err as ErrType } from '../types/result';

/**
 * Results that have been released. Held weakly so releasing never keeps a
 * value alive.
 */
const released = new WeakSet<Result<unknown, unknown>>();

/**
 * Build the success variant.
 *
 * @example
 * ```typescript
 * const names = FixedArray.create(stringBinding, 5);
 * // names: Ok<FixedArray<string>> when the size is accepted
 * ```
 */
export function Ok<T>(value: T): OkType<T> {
  return { ok: true, value };
}

/**
 * Build the error variant.
 *
 * @example
 * ```typescript
 * const notFound: Result<Output, ExitCode> = Err(ExitCode.CommandNotFound);
 * debugResult(notFound, { ok: outputBinding, err: exitCodeBinding });
 * // Result::Error<Output, ExitCode> { ... value: Command Not Found ... }
 * ```
 */
export function Err<E>(error: E): ErrType<E> {
  return { ok: false, error };
}

/**
 * Check whether a Result is a live success.
 *
 * Not a type guard: a released Ok also returns false. Narrow on `result.ok`
 * when the branch value itself is needed.
 *
 * @example
 * ```typescript
 * isOk(Ok(42));    // => true
 * isOk(Err("x"));  // => false
 * ```
 */
export function isOk<T, E>(result: Result<T, E>): boolean {
  return !released.has(result) && result.ok;
}

/**
 * Check whether a Result is a live failure.
 *
 * Returns false for a released result.
 */
export function isErr<T, E>(result: Result<T, E>): boolean {
  return !released.has(result) && !result.ok;
}

/**
 * Get the success value, or undefined when the Result is an Err or released.
 *
 * @example
 * ```typescript
 * value(Ok(42));    // => 42
 * value(Err("x"));  // => undefined
 * ```
 */
export function value<T, E>(result: Result<T, E>): Maybe<T> {
  if (released.has(result) || !result.ok) {
    return undefined;
  }
  return result.value;
}

/**
 * Get the error value, or undefined when the Result is an Ok or released.
 */
export function error<T, E>(result: Result<T, E>): Maybe<E> {
  if (released.has(result) || result.ok) {
    return undefined;
  }
  return result.error;
}

/**
 * Get the success value, or `fallback` when the Result is an Err or released.
 *
 * @example
 * ```typescript
 * valueOr(Err("x"), 0);  // => 0
 * valueOr(Ok(42), 0);    // => 42
 * ```
 */
export function valueOr<T, E>(result: Result<T, E>, fallback: T): T {
  if (released.has(result) || !result.ok) {
    return fallback;
  }
  return result.value;
}

/**
 * Get the error value, or `fallback` when the Result is an Ok or released.
 */
export function errorOr<T, E>(result: Result<T, E>, fallback: E): E {
  if (released.has(result) || result.ok) {
    return fallback;
  }
  return result.error;
}

/**
 * Get the success value, or the value produced by `supplier`.
 *
 * `supplier` is only called when the Result is an Err or released, and at
 * most once per call.
 *
 * @example
 * ```typescript
 * valueOrElse(Ok(1), () => expensiveDefault());  // expensiveDefault never runs
 * ```
 */
export function valueOrElse<T, E>(result: Result<T, E>, supplier: () => T): T {
  if (released.has(result) || !result.ok) {
    return supplier();
  }
  return result.value;
}

/**
 * Get the error value, or the value produced by `supplier`.
 *
 * `supplier` is only called when the Result is an Ok or released.
 */
export function errorOrElse<T, E>(result: Result<T, E>, supplier: () => E): E {
  if (released.has(result) || result.ok) {
    return supplier();
  }
  return result.error;
}

/**
 * Dispatch on the discriminant: call `onOk` with the value or `onErr` with the
 * error, never both.
 *
 * @returns The handler's return value, or undefined for a released Result
 *
 * @example
 * ```typescript
 * match(
 *   result,
 *   (message) => console.log(`Success: ${message}`),
 *   (failure) => console.log(`Failure: ${failure}`)
 * );
 * ```
 */
export function match<T, E, R>(
  result: Result<T, E>,
  onOk: (value: T) => R,
  onErr: (error: E) => R
): Maybe<R> {
  if (released.has(result)) {
    return undefined;
  }
  return result.ok ? onOk(result.value) : onErr(result.error);
}

/**
 * Mark a Result as consumed.
 *
 * @returns true the first time, false if the Result was already released
 */
export function release<T, E>(result: Result<T, E>): boolean {
  if (released.has(result)) {
    return false;
  }
  released.add(result);
  return true;
}

/**
 * Check whether `release()` has been called on a Result.
 */
export function isReleased<T, E>(result: Result<T, E>): boolean {
  return released.has(result);
}
