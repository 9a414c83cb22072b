// backend/services/product/src/repo/MongoProductStore.ts
/**
 * IProductStore over the native MongoDB driver.
 *
 * The collection handle is resolved per call through the injected DbClient,
 * which connects lazily and pools internally; this class holds no other state.
 * Only driver failures become StoreUnavailableError; documents are mapped
 * after the driver call returns.
 */

import type { Collection, ObjectId } from "mongodb";
import type { Logger } from "pino";
import type { DbClient } from "@shared/db/DbClient";
import { logger as rootLogger } from "@shared/utils/logger";
import { StoreUnavailableError, type StoreOp } from "../errors";
import {
  documentToStored,
  recordToDocument,
  type ProductDocument,
} from "../mappers/product.mapper";
import type {
  IProductStore,
  ProductRecord,
  StoredProduct,
} from "./IProductStore";

export const PRODUCTS_COLLECTION = "products";

export class MongoProductStore implements IProductStore {
  private readonly db: DbClient;
  private readonly log: Logger;

  public constructor(db: DbClient, log?: Logger) {
    this.db = db;
    this.log = (log ?? rootLogger).child({ component: "MongoProductStore" });
  }

  public insert(record: ProductRecord): Promise<ObjectId> {
    return this.run("insert", async (col) => {
      const res = await col.insertOne(recordToDocument(record));
      return res.insertedId;
    });
  }

  public async findById(id: ObjectId): Promise<StoredProduct | null> {
    const doc = await this.run("findById", (col) => col.findOne({ _id: id }));
    return doc ? documentToStored(doc) : null;
  }

  public async findAll(): Promise<StoredProduct[]> {
    const docs = await this.run("findAll", (col) => col.find({}).toArray());
    return docs.map(documentToStored);
  }

  public replaceById(id: ObjectId, record: ProductRecord): Promise<boolean> {
    return this.run("replaceById", async (col) => {
      const res = await col.replaceOne({ _id: id }, recordToDocument(record));
      return res.matchedCount === 1;
    });
  }

  public deleteById(id: ObjectId): Promise<boolean> {
    return this.run("deleteById", async (col) => {
      const res = await col.deleteOne({ _id: id });
      return res.deletedCount === 1;
    });
  }

  private async run<T>(
    op: StoreOp,
    fn: (col: Collection<ProductDocument>) => Promise<T>
  ): Promise<T> {
    try {
      const col = await this.db.getCollection<ProductDocument>(
        PRODUCTS_COLLECTION
      );
      return await fn(col);
    } catch (err) {
      this.log.warn(
        { op, db: this.db.dbName, err },
        "product store operation failed"
      );
      throw new StoreUnavailableError(op, err);
    }
  }
}
