// backend/services/product/src/controllers/product/handlers/remove.ts
import type { RequestHandler } from "express";
import { asyncHandler } from "@shared/middleware/asyncHandler";
import { respond } from "@shared/contracts/common";
import { logger } from "@shared/utils/logger";
import { zDeleteResultDto } from "../../../contracts/product.contract";
import type { ProductPipeline } from "../../../services/ProductPipeline";

export function remove(pipeline: ProductPipeline): RequestHandler {
  return asyncHandler(async (req, res) => {
    const { id } = req.params;
    logger.debug({ requestId: req.id, id }, "[product.controller.remove] enter");
    const out = await pipeline.remove(id);
    // 200 with a body, not 204
    respond(res, zDeleteResultDto, out);
  });
}
