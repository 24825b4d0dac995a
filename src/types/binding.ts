/**
 * Type bindings: the runtime half of a generic instantiation.
 *
 * TypeScript generics vanish at run time, but rendering a container needs the
 * display name of its type parameters and a way to turn a value into text, and
 * a FixedArray needs the zero value of its element type. A binding carries
 * exactly those facts for one concrete type.
 *
 * @module binding
 */

/**
 * Display name and formatter for values of type T.
 *
 * @example
 * ```typescript
 * const exitCode: TypeFormatter<number> = {
 *   name: "ExitCode",
 *   format: (code) => `exit ${code}`,
 * };
 * ```
 */
export interface TypeFormatter<T> {
  /**
   * Name shown in debug renderings, e.g. `Array<name>`.
   */
  readonly name: string;

  /**
   * Render a single value as text.
   */
  format(value: T): string;
}

/**
 * Full binding for an element type: formatter plus zero value.
 *
 * `zero()` is called once per slot, so a binding may hand out a fresh
 * mutable value each time.
 */
export interface TypeBinding<T> extends TypeFormatter<T> {
  zero(): T;
}

/**
 * The pair of formatters a Result<T, E> is rendered with.
 */
export interface ResultBindings<T, E> {
  readonly ok: TypeFormatter<T>;
  readonly err: TypeFormatter<E>;
}
