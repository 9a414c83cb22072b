// backend/services/product/src/services/ProductPipeline.ts
/**
 * Product lifecycle orchestration: validate, decode the id, call the store,
 * stamp timestamps, and shape the wire payload.
 *
 * Every failure is thrown as a ServiceError subclass; handlers only forward
 * them. Validation and id-decoding failures never reach the store.
 * The pipeline holds no per-request state, so one instance serves all requests.
 */

import type { Logger } from "pino";
import { logger as rootLogger } from "@shared/utils/logger";
import { NotFoundError, ValidationFailedError } from "../errors";
import { decodeProductId, encodeProductId } from "../id/productId";
import { storedToDto } from "../mappers/product.mapper";
import {
  validateProduct,
  type ProductFields,
} from "../validators/product.validator";
import type { IProductStore, ProductRecord } from "../repo/IProductStore";
import type {
  DeleteResultDto,
  ProductDto,
  ProductListDto,
} from "../contracts/product.contract";

export type Clock = () => Date;

export interface ProductPipelineDeps {
  store: IProductStore;
  clock?: Clock;
  log?: Logger;
}

/**
 * Next `updated_at` for a replaced document. Stays strictly after the previous
 * value even when the clock has not advanced past it.
 */
export function nextUpdatedAt(now: Date, previous: Date): Date {
  return now.getTime() > previous.getTime()
    ? now
    : new Date(previous.getTime() + 1);
}

export class ProductPipeline {
  private readonly store: IProductStore;
  private readonly clock: Clock;
  private readonly log: Logger;

  public constructor(deps: ProductPipelineDeps) {
    this.store = deps.store;
    this.clock = deps.clock ?? (() => new Date());
    this.log = (deps.log ?? rootLogger).child({ component: "ProductPipeline" });
  }

  public async create(body: unknown): Promise<ProductDto> {
    const fields = this.validate(body);
    const now = this.clock();
    const record: ProductRecord = { ...fields, created_at: now, updated_at: now };

    const id = await this.store.insert(record);
    this.log.info({ id: encodeProductId(id) }, "product created");
    return storedToDto({ id, ...record });
  }

  public async retrieve(wireId: string): Promise<ProductDto> {
    const id = decodeProductId(wireId);
    const found = await this.store.findById(id);
    if (!found) throw new NotFoundError(wireId);
    return storedToDto(found);
  }

  public async list(): Promise<ProductListDto> {
    const all = await this.store.findAll();
    return { count: all.length, results: all.map(storedToDto) };
  }

  /** Full replacement: every writable field comes from the body. */
  public async update(wireId: string, body: unknown): Promise<ProductDto> {
    const fields = this.validate(body);
    const id = decodeProductId(wireId);

    const existing = await this.store.findById(id);
    if (!existing) throw new NotFoundError(wireId);

    const record: ProductRecord = {
      ...fields,
      created_at: existing.created_at,
      updated_at: nextUpdatedAt(this.clock(), existing.updated_at),
    };

    // deleted between the read and the replace
    const matched = await this.store.replaceById(id, record);
    if (!matched) throw new NotFoundError(wireId);

    const updated = await this.store.findById(id);
    if (!updated) throw new NotFoundError(wireId);

    this.log.info({ id: wireId }, "product updated");
    return storedToDto(updated);
  }

  public async remove(wireId: string): Promise<DeleteResultDto> {
    const id = decodeProductId(wireId);
    const removed = await this.store.deleteById(id);
    if (!removed) throw new NotFoundError(wireId);

    this.log.info({ id: wireId }, "product deleted");
    return { message: "Product deleted successfully" };
  }

  private validate(body: unknown): ProductFields {
    const result = validateProduct(body);
    if (!result.ok) {
      this.log.debug({ fields: Object.keys(result.errors) }, "validation failed");
      throw new ValidationFailedError(result.errors);
    }
    return result.value;
  }
}
