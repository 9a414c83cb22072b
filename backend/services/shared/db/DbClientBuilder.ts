// backend/services/shared/db/DbClientBuilder.ts
/**
 * Construct a DbClient from required environment variables.
 *
 * Env (with prefix, e.g. { prefix: "PRODUCT" }):
 *   - PRODUCT_DB_DRIVER   optional, only "mongo"
 *   - PRODUCT_DB_URI      required
 *   - PRODUCT_DB_NAME     required
 * Without a prefix the same keys are read bare (DB_URI, DB_NAME, ...).
 */

import { DbClient } from "./DbClient";
import { MongoDbFactory } from "./mongo/MongoDbFactory";
import type { IDbFactory } from "./types";
import { getEnv, requireEnum, requireEnv } from "../config/env";

const DRIVERS = ["mongo"] as const;

function prefixKey(prefix: string | undefined, key: string): string {
  return prefix ? `${prefix.toUpperCase()}_${key}` : key;
}

export function createDbClientFromEnv(opts?: { prefix?: string }): DbClient {
  const p = opts?.prefix;

  const driverKey = prefixKey(p, "DB_DRIVER");
  const driver = requireEnum(driverKey, getEnv(driverKey) ?? "mongo", DRIVERS);

  let factory: IDbFactory;
  switch (driver) {
    case "mongo":
      factory = new MongoDbFactory();
      break;
    default:
      throw new Error(`Unsupported DB driver: ${String(driver)}`);
  }

  const uri = requireEnv(prefixKey(p, "DB_URI"));
  const dbName = requireEnv(prefixKey(p, "DB_NAME"));

  return new DbClient(factory, { uri, dbName });
}

export { DbClient } from "./DbClient";
