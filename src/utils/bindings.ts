/**
 * Built-in type bindings and helpers for declaring new ones.
 *
 * @module bindings
 */

import { z } from 'zod';
import { TypeBinding } from '../types/binding';
import { ContainerError } from '../types/errors';
import { Result } from '../types/result';
import { Ok } from './result';
import { containerError, describeZodError } from './errors';

const isFunction = (candidate: unknown): boolean =>
  typeof candidate === 'function';

const BindingSchema = z.object({
  name: z.string().trim().min(1, 'Binding name is required'),
  zero: z.custom(isFunction, { message: 'Expected a function' }),
  format: z.custom(isFunction, { message: 'Expected a function' }),
});

export const stringBinding: TypeBinding<string> = {
  name: 'string',
  zero: () => '',
  format: (value) => value,
};

export const numberBinding: TypeBinding<number> = {
  name: 'number',
  zero: () => 0,
  format: (value) => String(value),
};

export const booleanBinding: TypeBinding<boolean> = {
  name: 'boolean',
  zero: () => false,
  format: (value) => String(value),
};

/**
 * Validate a caller-supplied binding.
 *
 * @returns Ok with the same binding, or Err with code `INVALID_BINDING`
 *
 * @example
 * ```typescript
 * const point = defineBinding<Point>({
 *   name: "Point",
 *   zero: () => ({ x: 0, y: 0 }),
 *   format: (p) => `(${p.x}, ${p.y})`,
 * });
 * ```
 */
export function defineBinding<T>(
  binding: TypeBinding<T>
): Result<TypeBinding<T>, ContainerError> {
  const parsed = BindingSchema.safeParse(binding);
  if (!parsed.success) {
    return containerError('INVALID_BINDING', describeZodError(parsed.error));
  }
  return Ok(binding);
}

/**
 * Expose an existing binding under another display name.
 *
 * @example
 * ```typescript
 * const str = aliasBinding(stringBinding, "str");
 * const names = FixedArray.create(str, 2);  // debug header reads "Array<str>"
 * ```
 */
export function aliasBinding<T>(
  binding: TypeBinding<T>,
  name: string
): TypeBinding<T> {
  return {
    name,
    zero: () => binding.zero(),
    format: (value) => binding.format(value),
  };
}

/**
 * Build a binding for a numeric enum that renders through a label table.
 *
 * Values missing from the table render as their number.
 *
 * @example
 * ```typescript
 * enum Level { Low = 0, High = 1 }
 * const level = enumBinding("Level", { [Level.Low]: "low", [Level.High]: "high" }, Level.Low);
 * level.format(Level.High)  // => "high"
 * ```
 */
export function enumBinding<K extends number>(
  name: string,
  labels: Readonly<Record<K, string>>,
  zero: K
): TypeBinding<K> {
  return {
    name,
    zero: () => zero,
    format: (value) => labels[value] ?? String(value),
  };
}
