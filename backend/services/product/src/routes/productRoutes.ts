// backend/services/product/src/routes/productRoutes.ts
import { Router } from "express";
import type { ProductPipeline } from "../services/ProductPipeline";
import {
  create,
  findById,
  list,
  remove,
  update,
} from "../controllers/product";

/**
 * Mounted at /products. Express' non-strict routing makes the trailing slash
 * optional on every path.
 * - No PATCH: PUT /:id is a full replacement.
 */
export function productRoutes(pipeline: ProductPipeline): Router {
  const router = Router();

  // one-liners only; no logic here
  router.get("/", list(pipeline));
  router.post("/", create(pipeline));
  router.get("/:id", findById(pipeline));
  router.put("/:id", update(pipeline));
  router.delete("/:id", remove(pipeline));

  return router;
}
