// backend/services/product/src/log.init.ts
import { initLogger } from "@shared/utils/logger";
import { SERVICE_NAME } from "./config";

/**
 * Side-effect module: tags every line of the shared logger with
 * { service: "product" }. Import once, right after bootstrap.
 */
initLogger(SERVICE_NAME);
