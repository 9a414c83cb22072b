// backend/services/product/src/controllers/product/handlers/update.ts
import type { RequestHandler } from "express";
import { asyncHandler } from "@shared/middleware/asyncHandler";
import { respond } from "@shared/contracts/common";
import { logger } from "@shared/utils/logger";
import { zProductDto } from "../../../contracts/product.contract";
import type { ProductPipeline } from "../../../services/ProductPipeline";

/** PUT is a full replacement; there is no partial update route. */
export function update(pipeline: ProductPipeline): RequestHandler {
  return asyncHandler(async (req, res) => {
    const { id } = req.params;
    logger.debug({ requestId: req.id, id }, "[product.controller.update] enter");
    const updated = await pipeline.update(id, req.body);
    respond(res, zProductDto, updated);
  });
}
