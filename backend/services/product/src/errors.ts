// backend/services/product/src/errors.ts
/**
 * Product error taxonomy. Each class maps to exactly one HTTP status via the
 * shared Problem+JSON funnel; handlers never build error bodies themselves.
 */

import { ServiceError } from "@shared/http/errors";

/** field name -> ordered, human-readable messages */
export type FieldErrors = Record<string, string[]>;

export class ValidationFailedError extends ServiceError {
  public readonly fieldErrors: FieldErrors;

  public constructor(fieldErrors: FieldErrors) {
    super({
      status: 400,
      code: "VALIDATION_FAILED",
      title: "Bad Request",
      detail: "Validation failed",
      extras: { errors: fieldErrors },
    });
    this.fieldErrors = fieldErrors;
  }
}

export class InvalidIdentifierError extends ServiceError {
  public constructor(public readonly wireId: string) {
    super({
      status: 400,
      code: "INVALID_IDENTIFIER",
      title: "Bad Request",
      detail: "Invalid product ID format",
    });
  }
}

export class NotFoundError extends ServiceError {
  public constructor(public readonly wireId: string) {
    super({
      status: 404,
      code: "NOT_FOUND",
      title: "Not Found",
      detail: "Product not found",
    });
  }
}

export type StoreOp =
  | "insert"
  | "findById"
  | "findAll"
  | "replaceById"
  | "deleteById";

const STORE_OP_DETAIL: Record<StoreOp, string> = {
  insert: "Failed to create product",
  findById: "Failed to retrieve product",
  findAll: "Failed to retrieve products",
  replaceById: "Failed to update product",
  deleteById: "Failed to delete product",
};

/** Driver/connectivity failure. The driver's own message stays in `cause`, off the wire. */
export class StoreUnavailableError extends ServiceError {
  public constructor(public readonly op: StoreOp, cause?: unknown) {
    super({
      status: 500,
      code: "STORE_UNAVAILABLE",
      title: "Internal Server Error",
      detail: STORE_OP_DETAIL[op],
      cause,
    });
  }
}
