/**
 * Helpers for building ContainerError values.
 *
 * @module errors
 */

import { ZodError } from 'zod';
import { ContainerError, ContainerErrorCode } from '../types/errors';
import { Err } from './result';
import { Err as ErrType } from '../types/result';

/**
 * Join the issues of a ZodError into one line.
 *
 * Each issue renders as `path: message`; issues on the root value (empty
 * path) render as the bare message.
 *
 * @example
 * ```typescript
 * describeZodError(error) // => "name: Binding name is required, zero: Expected a function"
 * ```
 */
export function describeZodError(error: ZodError): string {
  return error.errors
    .map((issue) =>
      issue.path.length > 0
        ? `${issue.path.join('.')}: ${issue.message}`
        : issue.message
    )
    .join(', ');
}

/**
 * Create a failed Result carrying a ContainerError.
 */
export function containerError(
  code: ContainerErrorCode,
  message: string
): ErrType<ContainerError> {
  return Err({ code, message });
}
