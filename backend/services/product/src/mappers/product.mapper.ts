// backend/services/product/src/mappers/product.mapper.ts
import { Decimal128, type WithId } from "mongodb";
import type { ProductRecord, StoredProduct } from "../repo/IProductStore";
import type { ProductDto } from "../contracts/product.contract";
import { encodeProductId } from "../id/productId";

/** Shape of a document in the `products` collection; the driver adds `_id`. */
export type ProductDocument = {
  name: string;
  description: string;
  price: Decimal128;
  quantity: number;
  category: string;
  created_at: Date;
  updated_at: Date;
};

export function recordToDocument(record: ProductRecord): ProductDocument {
  return {
    name: record.name,
    description: record.description,
    price: Decimal128.fromString(record.price),
    quantity: record.quantity,
    category: record.category,
    created_at: record.created_at,
    updated_at: record.updated_at,
  };
}

export function documentToStored(doc: WithId<ProductDocument>): StoredProduct {
  return {
    id: doc._id,
    name: doc.name,
    description: doc.description,
    // Decimal128 keeps the exponent it was written with ("10.00" stays "10.00")
    price: doc.price.toString(),
    quantity: doc.quantity,
    category: doc.category,
    created_at: doc.created_at,
    updated_at: doc.updated_at,
  };
}

export function storedToDto(product: StoredProduct): ProductDto {
  return {
    id: encodeProductId(product.id),
    name: product.name,
    description: product.description,
    price: product.price,
    quantity: product.quantity,
    category: product.category,
    created_at: product.created_at.toISOString(),
    updated_at: product.updated_at.toISOString(),
  };
}
