/**
 * Result<T, E>: a success value of type T or an error value of type E.
 *
 * `ok` is the discriminant and never changes once a Result is built. Each
 * variant only carries its own field, so `result.value` does not type-check
 * until `result.ok` has been narrowed to true.
 *
 * @example
 * ```typescript
 * function parsePort(text: string): Result<number, string> {
 *   const port = Number(text);
 *   return Number.isInteger(port) ? Ok(port) : Err(`Not a port: ${text}`);
 * }
 * ```
 *
 * @module result
 */

/**
 * Success variant.
 */
export interface Ok<T> {
  readonly ok: true;
  readonly value: T;
}

/**
 * Error variant.
 */
export interface Err<E> {
  readonly ok: false;
  readonly error: E;
}

export type Result<T, E> = Ok<T> | Err<E>;

/**
 * A lookup that may find nothing: a released container, the inactive branch
 * of a Result, or an out-of-range index.
 */
export type Maybe<T> = T | undefined;
