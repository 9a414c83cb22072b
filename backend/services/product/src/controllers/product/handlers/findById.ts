// backend/services/product/src/controllers/product/handlers/findById.ts
import type { RequestHandler } from "express";
import { asyncHandler } from "@shared/middleware/asyncHandler";
import { respond } from "@shared/contracts/common";
import { logger } from "@shared/utils/logger";
import { zProductDto } from "../../../contracts/product.contract";
import type { ProductPipeline } from "../../../services/ProductPipeline";

export function findById(pipeline: ProductPipeline): RequestHandler {
  return asyncHandler(async (req, res) => {
    const { id } = req.params;
    logger.debug({ requestId: req.id, id }, "[product.controller.findById] enter");
    const found = await pipeline.retrieve(id);
    respond(res, zProductDto, found);
  });
}
