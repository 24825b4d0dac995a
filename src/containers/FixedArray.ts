/**
 * Fixed-length, bounds-checked array.
 *
 * A FixedArray owns exactly `size` slots, each initialised with the zero value
 * of its element binding. The length never changes. Out-of-range access is
 * reported as `undefined` / `false` and never performed.
 *
 * @module FixedArray
 */

import { z } from 'zod';
import { TypeBinding } from '../types/binding';
import { ContainerError } from '../types/errors';
import { Maybe, Result } from '../types/result';
import { RenderOptions, resolveRenderConfig } from '../config';
import { Writer, stdoutWriter } from '../writer';
import { Ok } from '../utils/result';
import { containerError, describeZodError } from '../utils/errors';
import { renderBlock, renderList, renderReleased } from '../format/render';

/**
 * Largest slot count `create` accepts. Every slot is materialised up front,
 * so the limit is kept to what a default Node.js heap backs in fast elements.
 */
export const MAX_ARRAY_SIZE = 2 ** 20;

const SizeSchema = z
  .number({ invalid_type_error: 'Size must be a number' })
  .int('Size must be an integer')
  .min(0, 'Size must not be negative')
  .max(MAX_ARRAY_SIZE, 'Size exceeds the maximum array length');

/**
 * Fixed-length array of T.
 *
 * @example
 * ```typescript
 * const created = FixedArray.create(stringBinding, 3);
 * if (!created.ok) {
 *   console.error(created.error.message);
 *   return;
 * }
 *
 * const names = created.value;
 * names.set(0, "Alice");
 * names.get(0);       // => "Alice"
 * names.get(3);       // => undefined (out of range)
 * names.format();     // => "[Alice, , ]"
 * names.release();    // => true
 * ```
 */
export class FixedArray<T> {
  /**
   * Backing slots.
   *
   * Null once release() has been called; every accessor checks this first.
   */
  private data: T[] | null;

  private constructor(
    readonly binding: TypeBinding<T>,
    size: number
  ) {
    this.data = Array.from({ length: size }, () => binding.zero());
  }

  /**
   * Create an array of `size` zero-valued slots.
   *
   * @param binding - Element type binding (zero value, name, formatter)
   * @param size - Number of slots; a non-negative integer
   * @returns Ok with the array, or Err with code `INVALID_SIZE`
   */
  static create<T>(
    binding: TypeBinding<T>,
    size: number
  ): Result<FixedArray<T>, ContainerError> {
    const parsed = SizeSchema.safeParse(size);
    if (!parsed.success) {
      return containerError('INVALID_SIZE', describeZodError(parsed.error));
    }
    return Ok(new FixedArray(binding, parsed.data));
  }

  /**
   * Drop the backing storage.
   *
   * After release the array behaves as an absent handle: size() is 0, reads
   * return undefined and writes return false.
   *
   * @returns true the first time, false if already released
   */
  release(): boolean {
    if (this.data === null) {
      return false;
    }
    this.data = null;
    return true;
  }

  isReleased(): boolean {
    return this.data === null;
  }

  /**
   * Number of slots, or 0 once released.
   */
  size(): number {
    return this.data === null ? 0 : this.data.length;
  }

  /**
   * Read the element at `index`.
   *
   * @returns The element, or undefined if released or `index` is out of range
   */
  get(index: number): Maybe<T> {
    if (this.data === null || !this.inBounds(this.data, index)) {
      return undefined;
    }
    return this.data[index];
  }

  /**
   * Overwrite the element at `index`.
   *
   * @returns true on success, false if released or `index` is out of range
   */
  set(index: number, value: T): boolean {
    if (this.data === null || !this.inBounds(this.data, index)) {
      return false;
    }
    this.data[index] = value;
    return true;
  }

  /**
   * Overwrite the element at `index` and hand back what was there.
   *
   * @returns The previous element, or undefined if released or `index` is out
   *   of range (in which case nothing is written)
   */
  replace(index: number, value: T): Maybe<T> {
    if (this.data === null || !this.inBounds(this.data, index)) {
      return undefined;
    }
    const previous = this.data[index];
    this.data[index] = value;
    return previous;
  }

  /**
   * Render the elements as `[e0, e1, ...]`, or an empty string once released.
   */
  format(options?: RenderOptions): string {
    if (this.data === null) {
      return '';
    }
    const config = resolveRenderConfig(options);
    return renderList(
      this.data.map((element) => this.binding.format(element)),
      config
    );
  }

  /**
   * Render a debug block with the element type, size and data.
   *
   * @example
   * ```typescript
   * names.debug();
   * // Array<string> {
   * //   size: 3,
   * //   data: [Alice, , ]
   * // }
   * ```
   */
  debug(options?: RenderOptions): string {
    const header = `Array<${this.binding.name}>`;
    if (this.data === null) {
      return renderReleased(header);
    }
    const config = resolveRenderConfig(options);
    return renderBlock(
      header,
      [
        ['size', String(this.data.length)],
        ['data', this.format(config)],
      ],
      config
    );
  }

  /**
   * Write format() output. Writes nothing once released.
   */
  print(writer: Writer = stdoutWriter, options?: RenderOptions): void {
    if (this.data === null) {
      return;
    }
    writer(this.format(options));
  }

  /**
   * Write format() output followed by a newline. Writes nothing once released.
   */
  println(writer: Writer = stdoutWriter, options?: RenderOptions): void {
    if (this.data === null) {
      return;
    }
    writer(`${this.format(options)}\n`);
  }

  private inBounds(data: readonly T[], index: number): boolean {
    return Number.isInteger(index) && index >= 0 && index < data.length;
  }
}
