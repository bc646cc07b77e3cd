/**
 * Global Jest setup for the service tests.
 *
 * Runs before any test module loads, so the logger singleton is created silent.
 * Set LOG_LEVEL explicitly to see logs while debugging a test.
 */

process.env.LOG_LEVEL = process.env.LOG_LEVEL ?? 'silent';

export {};
