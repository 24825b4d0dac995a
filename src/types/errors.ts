/**
 * Error values returned (never thrown) by container constructors.
 *
 * @module errors
 */

/**
 * Machine-readable failure codes.
 *
 * - `INVALID_SIZE`: a FixedArray was requested with a size that is not a
 *   non-negative integer within the array length limit
 * - `INVALID_BINDING`: a user-supplied TypeBinding failed validation
 */
export type ContainerErrorCode = 'INVALID_SIZE' | 'INVALID_BINDING';

/**
 * Standard error shape carried by Err results from this package.
 *
 * @example
 * ```typescript
 * const created = FixedArray.create(stringBinding, -1);
 * if (!created.ok) {
 *   console.error(`${created.error.code}: ${created.error.message}`);
 *   // INVALID_SIZE: Size must be a non-negative integer
 * }
 * ```
 */
export interface ContainerError {
  readonly code: ContainerErrorCode;
  readonly message: string;
}
