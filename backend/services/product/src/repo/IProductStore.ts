// backend/services/product/src/repo/IProductStore.ts
import type { ObjectId } from "mongodb";
import type { ProductFields } from "../validators/product.validator";

/** A validated product plus its timestamps; what the pipeline writes. */
export type ProductRecord = ProductFields & {
  created_at: Date;
  updated_at: Date;
};

/** A record as read back, with its store-assigned id. */
export type StoredProduct = ProductRecord & { id: ObjectId };

/**
 * Persistence seam for products. Implementations never validate; any
 * driver or connectivity failure surfaces as StoreUnavailableError.
 */
export interface IProductStore {
  insert(record: ProductRecord): Promise<ObjectId>;
  findById(id: ObjectId): Promise<StoredProduct | null>;
  /** Natural store order, fully materialized. */
  findAll(): Promise<StoredProduct[]>;
  /** Full replacement; false when no document matched. */
  replaceById(id: ObjectId, record: ProductRecord): Promise<boolean>;
  /** false when nothing was removed. */
  deleteById(id: ObjectId): Promise<boolean>;
}
