// backend/services/product/src/controllers/product/handlers/list.ts
import type { RequestHandler } from "express";
import { asyncHandler } from "@shared/middleware/asyncHandler";
import { respond } from "@shared/contracts/common";
import { logger } from "@shared/utils/logger";
import { zProductListDto } from "../../../contracts/product.contract";
import type { ProductPipeline } from "../../../services/ProductPipeline";

export function list(pipeline: ProductPipeline): RequestHandler {
  return asyncHandler(async (req, res) => {
    logger.debug({ requestId: req.id }, "[product.controller.list] enter");
    const out = await pipeline.list();
    respond(res, zProductListDto, out);
  });
}
