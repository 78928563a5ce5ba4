/**
 * services/company-service/src/index.ts
 *
 * WHY:
 * - Single entrypoint for company-service.
 * - Keeps startup logic small: load config -> build app -> listen.
 */

import { createShutdown } from '@roster/shared/http/shutdown';
import { logger } from '@roster/shared/logger/logger';

import { buildApp } from './app/build-app';
import { buildConfig } from './app/config';

async function main(): Promise<void> {
  const config = buildConfig();
  const { app, close } = await buildApp(config);

  await app.listen({ port: config.port, host: '0.0.0.0' });

  logger.info('server.listening', {
    port: config.port,
    env: config.nodeEnv,
    service: config.serviceName,
  });

  const shutdown = createShutdown(close);

  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGTERM', () => void shutdown('SIGTERM'));
}

void main().catch((err: unknown) => {
  logger.error('server.fatal_startup_error', { err });
  process.exit(1);
});
