/**
 * Test env defaults. Loaded by vitest before any test file imports the logger.
 * Tests always run on the in-memory store; nothing here reaches Postgres.
 */

process.env.NODE_ENV = 'test';
process.env.LOG_LEVEL = process.env.LOG_LEVEL ?? 'error';
process.env.SERVICE_NAME = 'company-service';
