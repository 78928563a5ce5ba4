import { describe, it, expect, vi, afterEach } from 'vitest';

import { createShutdown } from '../../src/http/shutdown';
import { logger } from '../../src/logger/logger';

afterEach(() => {
  vi.restoreAllMocks();
});

describe('createShutdown', () => {
  it('closes, then exits 0', async () => {
    const close = vi.fn(async () => {});
    const exit = vi.fn();

    await createShutdown(close, exit)('SIGTERM');

    expect(close).toHaveBeenCalledTimes(1);
    expect(exit).toHaveBeenCalledTimes(1);
    expect(exit).toHaveBeenCalledWith(0);
  });

  it('logs a failed close and exits 1 without rejecting', async () => {
    const failure = new Error('pool already ended');
    const close = vi.fn(async () => {
      throw failure;
    });
    const exit = vi.fn();
    const error = vi.spyOn(logger, 'error');

    await expect(createShutdown(close, exit)('SIGINT')).resolves.toBeUndefined();

    expect(error).toHaveBeenCalledWith('server.shutdown_failed', { signal: 'SIGINT', err: failure });
    expect(exit).toHaveBeenCalledTimes(1);
    expect(exit).toHaveBeenCalledWith(1);
  });
});
