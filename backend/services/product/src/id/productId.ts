// backend/services/product/src/id/productId.ts
import { ObjectId } from "mongodb";
import { OBJECT_ID_RE } from "@shared/contracts/common";
import { InvalidIdentifierError } from "../errors";

/**
 * Wire id -> ObjectId. Only the 24-hex form is accepted; ObjectId.isValid()
 * would also take any 12-character string, which is not a wire id.
 */
export function decodeProductId(wireId: string): ObjectId {
  if (!OBJECT_ID_RE.test(wireId)) throw new InvalidIdentifierError(wireId);
  return ObjectId.createFromHexString(wireId);
}

export function encodeProductId(id: ObjectId): string {
  return id.toHexString();
}
