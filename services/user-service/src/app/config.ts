/**
 * services/user-service/src/app/config.ts
 *
 * WHY:
 * - Central place for env parsing + validation (12-factor friendly).
 * - Prevents "undefined env var" bugs at runtime.
 *
 * HOW TO USE:
 * - In dev, we load services/user-service/.env via dotenv.
 * - In prod, the platform injects env vars (no file).
 * - Tests call buildConfig({...}) with an explicit env object.
 */

import 'dotenv/config';
import { z } from 'zod';

import {
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
    PORT: z.coerce.number().int().min(0).max(65_535).default(8081),

    // Logging / service identity
    LOG_LEVEL: LogLevelSchema,
    SERVICE_NAME: z.string().default('user-service'),

    // Persistence
    STORE_DRIVER: StoreDriverSchema,
    DATABASE_URL: z.string().min(1).optional(),

    // Peer (company-service)
    COMPANY_SERVICE_URL: z.string().url().default('http://localhost:8082'),
    PEER_TIMEOUT_MS: PeerTimeoutSchema,
  })
  .superRefine(requireDatabaseUrlForPostgres);

export type AppConfig = {
  nodeEnv: NodeEnv;
  port: number;

  logLevel: string;
  serviceName: string;

  storeDriver: StoreDriver;
  databaseUrl: string | null;

  companyServiceUrl: string;
  peerTimeoutMs: number;
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

    companyServiceUrl: parsed.COMPANY_SERVICE_URL,
    peerTimeoutMs: parsed.PEER_TIMEOUT_MS,
  };
}
