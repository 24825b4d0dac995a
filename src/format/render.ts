/**
 * Text layout shared by the Result and FixedArray renderers.
 *
 * @module render
 */

import { RenderConfig } from '../config';

/**
 * Render already-formatted items as a bracketed list.
 *
 * @example
 * ```typescript
 * renderList(["1", "2"], { indent: 2, separator: ", " })  // => "[1, 2]"
 * renderList([], { indent: 2, separator: ", " })          // => "[]"
 * ```
 */
export function renderList(
  items: readonly string[],
  config: RenderConfig
): string {
  return `[${items.join(config.separator)}]`;
}

/**
 * Render a debug block: a header line, one indented `key: value` line per
 * field (comma-terminated except the last), and a closing brace.
 *
 * @example
 * ```typescript
 * renderBlock("Array<number>", [["size", "0"], ["data", "[]"]], config)
 * // Array<number> {
 * //   size: 0,
 * //   data: []
 * // }
 * ```
 */
export function renderBlock(
  header: string,
  fields: ReadonlyArray<readonly [string, string]>,
  config: RenderConfig
): string {
  const pad = ' '.repeat(config.indent);
  const body = fields.map(([key, text]) => `${pad}${key}: ${text}`).join(',\n');
  return body.length > 0 ? `${header} {\n${body}\n}` : `${header} {\n}`;
}

/**
 * Render the one-line placeholder for a released container.
 */
export function renderReleased(header: string): string {
  return `${header} { released }`;
}
