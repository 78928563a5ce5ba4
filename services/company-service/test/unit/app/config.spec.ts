import { describe, it, expect } from 'vitest';

import { buildConfig } from '../../../src/app/config';

describe('buildConfig', () => {
  it('applies defaults for the in-memory store', () => {
    expect(buildConfig({ STORE_DRIVER: 'memory' })).toEqual({
      nodeEnv: 'development',
      port: 8082,
      logLevel: 'info',
      serviceName: 'company-service',
      storeDriver: 'memory',
      databaseUrl: null,
      userServiceUrl: 'http://localhost:8081',
      peerTimeoutMs: 3000,
      seedOnStart: false,
    });
  });

  it('parses SEED_ON_START as a real boolean', () => {
    expect(buildConfig({ STORE_DRIVER: 'memory', SEED_ON_START: 'true' }).seedOnStart).toBe(true);
    expect(buildConfig({ STORE_DRIVER: 'memory', SEED_ON_START: 'false' }).seedOnStart).toBe(false);
    expect(() => buildConfig({ STORE_DRIVER: 'memory', SEED_ON_START: 'yes' })).toThrow();
  });

  it('requires DATABASE_URL for the postgres store', () => {
    expect(() => buildConfig({})).toThrow('DATABASE_URL is required when STORE_DRIVER=postgres');
  });
});
