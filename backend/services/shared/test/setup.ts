// backend/services/shared/test/setup.ts
/**
 * Hermetic defaults for tests ONLY (never in service code).
 * Runs before each spec file's imports, so the logger's LOG_LEVEL check passes.
 */
process.env.NODE_ENV ??= "test";
process.env.LOG_LEVEL ??= "silent";
