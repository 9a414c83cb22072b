// backend/services/product/src/config.ts
/**
 * Config:
 * - No dotenv loading here (bootstrap.ts loads env).
 * - No hardcoded defaults; all required vars must be present.
 * - Fail fast at import time if something is missing/invalid.
 * - Database settings are read by createDbClientFromEnv, not here.
 */

import { getEnv, requireNumber } from "@shared/config/env";

export const SERVICE_NAME = "product" as const;

export const REQUIRED_ENV = [
  "NODE_ENV",
  "LOG_LEVEL",
  "PRODUCT_PORT",
  "PRODUCT_DB_URI",
  "PRODUCT_DB_NAME",
] as const;

export type ProductConfig = {
  port: number;
  version?: string;
};

export function loadConfig(): ProductConfig {
  const port = requireNumber("PRODUCT_PORT");
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new Error(`Invalid PRODUCT_PORT: "${port}"`);
  }
  return { port, version: getEnv("npm_package_version") };
}
