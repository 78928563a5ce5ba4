/**
 * packages/shared/src/config/env.ts
 *
 * WHY:
 * - Both services parse the same families of env vars; the building blocks live here,
 *   each service's app/config.ts composes its own schema from them.
 *
 * TYPING:
 * - nodeEnv is a union ('development' | 'test' | 'production'), not a plain string,
 *   so invalid values ('prod', 'staging') are caught at startup by Zod.
 * - Booleans are parsed from 'true' | 'false' | '1' | '0' explicitly
 *   (z.coerce.boolean() would turn the string 'false' into true).
 */

import { z } from 'zod';
import { DEFAULT_PEER_TIMEOUT_MS } from '../peer/peer-http';

export const NodeEnvSchema = z.enum(['development', 'test', 'production']).default('development');

export const LogLevelSchema = z
  .enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'])
  .default('info');

export const StoreDriverSchema = z.enum(['postgres', 'memory']).default('postgres');

export const PeerTimeoutSchema = z.coerce.number().int().min(100).max(30_000).default(DEFAULT_PEER_TIMEOUT_MS);

export const EnvBooleanSchema = z
  .enum(['true', 'false', '1', '0'])
  .default('false')
  .transform((v) => v === 'true' || v === '1');

export type NodeEnv = z.infer<typeof NodeEnvSchema>;
export type StoreDriver = z.infer<typeof StoreDriverSchema>;

/**
 * DATABASE_URL is only mandatory when the Postgres store is selected.
 */
export function requireDatabaseUrlForPostgres(
  env: { STORE_DRIVER: StoreDriver; DATABASE_URL?: string },
  ctx: z.RefinementCtx,
): void {
  if (env.STORE_DRIVER === 'postgres' && !env.DATABASE_URL) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['DATABASE_URL'],
      message: 'DATABASE_URL is required when STORE_DRIVER=postgres',
    });
  }
}
