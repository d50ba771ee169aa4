/**
 * backend/test/setup-env.ts
 *
 * Runs before every test file.
 * Tests never read a real .env: everything they need is set here.
 */

process.env.NODE_ENV = 'test';
process.env.LOG_LEVEL = process.env.LOG_LEVEL ?? 'error';
process.env.SERVICE_NAME = 'tenantguard-backend-test';
