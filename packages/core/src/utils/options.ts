import type { z } from 'zod';

/**
 * Validate a constructor options object. Invalid options are a wiring mistake
 * in the composition root, so this throws instead of returning a Result.
 *
 * @throws Error listing every zod issue
 */
export function parseOptions<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, input: unknown, label: string): T {
  const result = schema.safeParse(input ?? {});
  if (!result.success) {
    const errors = result.error.issues.map((e) => `  - ${e.path.join('.') || '(root)'}: ${e.message}`).join('\n');
    throw new Error(`Invalid ${label} options:\n${errors}`);
  }
  return result.data;
}
