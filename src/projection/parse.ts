import type { z } from 'zod';
import { ValidationError } from '../errors/ValidationError.js';
import { canonicalizeKeys } from './keys.js';

/**
 * Canonicalize the keys of `raw` and check it against `schema`.
 * @throws ValidationError naming `entity` and listing every schema issue.
 */
export function parseProjection<S extends z.ZodTypeAny>(
  schema: S,
  raw: unknown,
  entity: string,
): z.output<S> {
  const result = schema.safeParse(canonicalizeKeys(raw));
  if (!result.success) {
    throw ValidationError.fromZod(entity, result.error);
  }
  return result.data;
}
