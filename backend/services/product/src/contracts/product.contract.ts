// backend/services/product/src/contracts/product.contract.ts
/**
 * Wire contract for product responses. Handlers send every payload through
 * `respond()` with one of these schemas, so a mapper bug surfaces as a 500
 * instead of a malformed body.
 */

import { z } from "zod";
import { zIsoUtcMillis, zObjectIdHex } from "@shared/contracts/common";

/** Fixed-point decimal text with exactly two fraction digits. */
export const zPriceText = z
  .string()
  .regex(/^\d+\.\d{2}$/, "Expected decimal text with 2 places");

export const zProductDto = z.object({
  id: zObjectIdHex,
  name: z.string(),
  description: z.string(),
  price: zPriceText,
  quantity: z.number().int().nonnegative(),
  category: z.string(),
  created_at: zIsoUtcMillis,
  updated_at: zIsoUtcMillis,
});
export type ProductDto = z.infer<typeof zProductDto>;

export const zProductListDto = z.object({
  count: z.number().int().nonnegative(),
  results: z.array(zProductDto),
});
export type ProductListDto = z.infer<typeof zProductListDto>;

export const zDeleteResultDto = z.object({
  message: z.literal("Product deleted successfully"),
});
export type DeleteResultDto = z.infer<typeof zDeleteResultDto>;
