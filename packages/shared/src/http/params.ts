/**
 * packages/shared/src/http/params.ts
 *
 * WHY:
 * - Every entity on both services is keyed by a positive integer id.
 * - `by-ids` endpoints accept `?ids=1,2,3` (and tolerate a repeated `ids` param).
 *
 * RULES:
 * - Use Zod for runtime validation; controllers turn failures into AppError.validationError.
 */

import { z } from 'zod';

// Decimal digits only: no sign, exponent, hex or leading zero, and no value past 2^53 - 1.
export const positiveIdSchema = z
  .string()
  .regex(/^[1-9]\d*$/, 'Expected a positive integer id')
  .transform(Number)
  .pipe(z.number().max(Number.MAX_SAFE_INTEGER, 'Id is out of range'));

export const idParamsSchema = z.object({
  id: positiveIdSchema,
});

function splitIds(raw: unknown): unknown {
  if (raw === undefined || raw === null) return [];

  const parts: unknown[] = Array.isArray(raw) ? raw : [raw];

  return parts
    .flatMap((p) => (typeof p === 'string' ? p.split(',') : [p]))
    .map((p) => (typeof p === 'string' ? p.trim() : p))
    .filter((p) => p !== '');
}

export const idsQuerySchema = z.object({
  ids: z.preprocess(splitIds, z.array(positiveIdSchema)),
});

export type IdsQuery = z.infer<typeof idsQuerySchema>;
