/**
 * packages/shared/src/http/shutdown.ts
 *
 * WHY:
 * - Both services stop the same way on SIGINT/SIGTERM: close the app and its
 *   resources, then exit.
 *
 * RULES:
 * - Never rejects: a failed close is logged as `server.shutdown_failed` and exits 1.
 */

import { logger } from '../logger/logger';

export function createShutdown(
  close: () => Promise<void>,
  exit: (code: number) => void = (code) => process.exit(code),
): (signal: string) => Promise<void> {
  return async (signal) => {
    logger.info('server.shutdown', { signal });
    try {
      await close();
    } catch (err: unknown) {
      logger.error('server.shutdown_failed', { signal, err });
      exit(1);
      return;
    }
    exit(0);
  };
}
