// backend/services/product/src/controllers/product/handlers/create.ts
import type { RequestHandler } from "express";
import { asyncHandler } from "@shared/middleware/asyncHandler";
import { respond } from "@shared/contracts/common";
import { logger } from "@shared/utils/logger";
import { zProductDto } from "../../../contracts/product.contract";
import type { ProductPipeline } from "../../../services/ProductPipeline";

export function create(pipeline: ProductPipeline): RequestHandler {
  return asyncHandler(async (req, res) => {
    logger.debug({ requestId: req.id }, "[product.controller.create] enter");
    const created = await pipeline.create(req.body);
    respond(res, zProductDto, created, 201);
  });
}
