/**
 * Text rendering for Result<T, E>.
 *
 * @module format/result
 */

import { Result } from '../types/result';
import { ResultBindings } from '../types/binding';
import { RenderOptions, resolveRenderConfig } from '../config';
import { Writer, stdoutWriter } from '../writer';
import { isReleased } from '../utils/result';
import { renderBlock, renderReleased } from './render';

function branchText<T, E>(
  result: Result<T, E>,
  bindings: ResultBindings<T, E>
): string {
  return result.ok
    ? bindings.ok.format(result.value)
    : bindings.err.format(result.error);
}

/**
 * Render a Result on one line.
 *
 * @returns `Ok { <value> }`, `Error { <error> }`, or an empty string for a
 *   released Result
 *
 * @example
 * ```typescript
 * formatResult(Ok("done"), { ok: stringBinding, err: stringBinding })
 * // => "Ok { done }"
 * ```
 */
export function formatResult<T, E>(
  result: Result<T, E>,
  bindings: ResultBindings<T, E>
): string {
  if (isReleased(result)) {
    return '';
  }
  const tag = result.ok ? 'Ok' : 'Error';
  return `${tag} { ${branchText(result, bindings)} }`;
}

/**
 * Render a Result as a multi-line debug block naming the variant and both
 * bound types.
 *
 * @example
 * ```typescript
 * debugResult(Err(ExitCode.CommandNotFound), { ok: outputBinding, err: exitCodeBinding })
 * // Result::Error<Output, ExitCode> {
 * //   is_ok: false,
 * //   value: Command Not Found
 * // }
 * ```
 */
export function debugResult<T, E>(
  result: Result<T, E>,
  bindings: ResultBindings<T, E>,
  options?: RenderOptions
): string {
  const types = `<${bindings.ok.name}, ${bindings.err.name}>`;
  if (isReleased(result)) {
    return renderReleased(`Result${types}`);
  }
  const variant = result.ok ? 'Ok' : 'Error';
  return renderBlock(
    `Result::${variant}${types}`,
    [
      ['is_ok', String(result.ok)],
      ['value', branchText(result, bindings)],
    ],
    resolveRenderConfig(options)
  );
}

/**
 * Write the one-line rendering of a Result. Writes nothing for a released
 * Result.
 */
export function printResult<T, E>(
  result: Result<T, E>,
  bindings: ResultBindings<T, E>,
  writer: Writer = stdoutWriter
): void {
  if (isReleased(result)) {
    return;
  }
  writer(formatResult(result, bindings));
}

/**
 * Write the one-line rendering of a Result followed by a newline. Writes
 * nothing for a released Result.
 */
export function printlnResult<T, E>(
  result: Result<T, E>,
  bindings: ResultBindings<T, E>,
  writer: Writer = stdoutWriter
): void {
  if (isReleased(result)) {
    return;
  }
  writer(`${formatResult(result, bindings)}\n`);
}
