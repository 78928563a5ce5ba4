/**
 * services/company-service/src/app/config.ts
 *
 * WHY:
 * - Central place for env parsing + validation (12-factor friendly).
 * - Prevents "undefined env var" bugs at runtime.
 *
 * HOW TO USE:
 * - In dev, we load services/company-service/.env via dotenv.
 * - In prod, the platform injects env vars (no file).
 * - Tests call buildConfig({...}) with an explicit env object.
 */

import 'dotenv/config';
import { z } from 'zod';

import {
  EnvBooleanSchema,
  LogLevelSchema,
  NodeEnvSchema,
  PeerTimeoutSchema,
  StoreDriverSchema,
  requireDatabaseUrlForPostgres,
  type NodeEnv,
  type StoreDriver,
} from '@roster/shared/config/env';

const ConfigSchema = z
  .object({
    NODE_ENV: NodeEnvSchema,
    PORT: z.coerce.number().int().min(0).max(65_535).default(8082),

    LOG_LEVEL: LogLevelSchema,
    SERVICE_NAME: z.string().default('company-service'),

    STORE_DRIVER: StoreDriverSchema,
    DATABASE_URL: z.string().min(1).optional(),

    // Peer (user-service)
    USER_SERVICE_URL: z.string().url().default('http://localhost:8081'),
    PEER_TIMEOUT_MS: PeerTimeoutSchema,

    // Dev seed
    SEED_ON_START: EnvBooleanSchema,
  })
  .superRefine(requireDatabaseUrlForPostgres);

export type AppConfig = {
  nodeEnv: NodeEnv;
  port: number;

  logLevel: string;
  serviceName: string;

  storeDriver: StoreDriver;
  databaseUrl: string | null;

  userServiceUrl: string;
  peerTimeoutMs: number;

  seedOnStart: boolean;
};

export function buildConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = ConfigSchema.parse(env);

  return {
    nodeEnv: parsed.NODE_ENV,
    port: parsed.PORT,

    logLevel: parsed.LOG_LEVEL,
    serviceName: parsed.SERVICE_NAME,

    storeDriver: parsed.STORE_DRIVER,
    databaseUrl: parsed.DATABASE_URL ?? null,

    userServiceUrl: parsed.USER_SERVICE_URL,
    peerTimeoutMs: parsed.PEER_TIMEOUT_MS,

    seedOnStart: parsed.SEED_ON_START,
  };
}
