/**
 * packages/shared/src/http/validate.ts
 *
 * WHY:
 * - Controllers validate params, query and body with Zod and must throw AppError,
 *   never let a raw ZodError escape with an unhelpful message.
 */

import type { z } from 'zod';
import { AppError } from './errors';

export const API_PREFIX = '/api/v1';

export function parseRequest<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  value: unknown,
  message: string,
): T {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw AppError.validationError(message, { issues: parsed.error.issues });
  }
  return parsed.data;
}
