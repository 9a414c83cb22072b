// backend/services/product/src/app.ts
/**
 * Express assembly:
 *   httpLogger → cors/json → health (open) → /products → 404 → error funnel
 *
 * Dependencies come in through `createApp`, so tests build the same app over
 * an in-memory store.
 */

import express, { type Express } from "express";
import { makeHttpLogger } from "@shared/middleware/httpLogger";
import { coreMiddleware } from "@shared/middleware/core";
import {
  errorProblemJson,
  notFoundProblemJson,
} from "@shared/middleware/problemJson";
import { createHealthRouter, type ReadinessFn } from "@shared/health";
import { productRoutes } from "./routes/productRoutes";
import type { ProductPipeline } from "./services/ProductPipeline";

export const PRODUCTS_PATH = "/products";

export interface CreateAppOptions {
  pipeline: ProductPipeline;
  serviceName: string;
  readiness?: ReadinessFn;
  version?: string;
}

export function createApp(opts: CreateAppOptions): Express {
  const app = express();
  app.disable("x-powered-by");

  app.use(makeHttpLogger(opts.serviceName));
  app.use(coreMiddleware());

  app.use(
    createHealthRouter({
      service: opts.serviceName,
      version: opts.version,
      readiness: opts.readiness,
    })
  );

  app.use(PRODUCTS_PATH, productRoutes(opts.pipeline));

  app.use(notFoundProblemJson([PRODUCTS_PATH, "/health"]));
  app.use(errorProblemJson());

  return app;
}
