import { z } from 'zod';

export const RenderConfigSchema = z.object({
  indent: z.number().int().min(0).max(16).default(2),
  separator: z.string().default(', '),
});

export type RenderConfig = z.infer<typeof RenderConfigSchema>;

/**
 * Rendering options as callers pass them; every key is optional.
 */
export type RenderOptions = z.input<typeof RenderConfigSchema>;

/**
 * Apply defaults to rendering options.
 *
 * Throws a ZodError for invalid options (e.g. a negative indent).
 */
export function resolveRenderConfig(options?: RenderOptions): RenderConfig {
  return RenderConfigSchema.parse(options ?? {});
}
