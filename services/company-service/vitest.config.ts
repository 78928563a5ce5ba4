import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    name: 'company-service',
    globals: true,
    environment: 'node',
    include: ['test/**/*.spec.ts'],
    setupFiles: ['test/setup-env.ts'],
    clearMocks: true,
    restoreMocks: true,
  },
});
