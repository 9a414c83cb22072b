// backend/services/product/index.ts
/**
 * Start-up: load env (bootstrap), init logs, connect the DB client, build the
 * app over a Mongo-backed pipeline, then start HTTP. Shutdown closes the
 * server first and the DB client second.
 */

import "./src/bootstrap";
import "./src/log.init";

import { createDbClientFromEnv } from "@shared/db/DbClientBuilder";
import { startHttpService } from "@shared/bootstrap/startHttpService";
import { logger } from "@shared/utils/logger";
import { createApp } from "./src/app";
import { SERVICE_NAME, loadConfig } from "./src/config";
import { MongoProductStore } from "./src/repo/MongoProductStore";
import { ProductPipeline } from "./src/services/ProductPipeline";

process.on("unhandledRejection", (reason) => {
  logger.error({ reason }, `[${SERVICE_NAME}] Unhandled Promise Rejection`);
});
process.on("uncaughtException", (err) => {
  logger.error({ err }, `[${SERVICE_NAME}] Uncaught Exception`);
});

async function start(): Promise<void> {
  const config = loadConfig();
  const db = createDbClientFromEnv({ prefix: "PRODUCT" });

  await db.connect();
  logger.info({ uri: db.redactedUri, db: db.dbName }, "mongo connected");

  const pipeline = new ProductPipeline({ store: new MongoProductStore(db) });
  const app = createApp({
    pipeline,
    serviceName: SERVICE_NAME,
    version: config.version,
    readiness: async () => {
      await db.ping();
      return { mongo: "ok" };
    },
  });

  startHttpService({
    app,
    port: config.port,
    serviceName: SERVICE_NAME,
    logger,
    onShutdown: () => db.close(),
  });
}

start().catch((err: unknown) => {
  logger.error({ err }, `failed to start ${SERVICE_NAME} service`);
  process.exit(1);
});
