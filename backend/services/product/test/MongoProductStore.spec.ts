// backend/services/product/test/MongoProductStore.spec.ts
import { Collection, Decimal128, FindCursor, ObjectId } from "mongodb";
import { afterAll, afterEach, describe, expect, it, vi } from "vitest";
import { DbClient } from "@shared/db/DbClient";
import { StoreUnavailableError } from "../src/errors";
import { recordToDocument } from "../src/mappers/product.mapper";
import { MongoProductStore } from "../src/repo/MongoProductStore";
import { DetachedDbFactory } from "./helpers/DetachedDbFactory";
import { UnreachableDbFactory } from "./helpers/UnreachableDbFactory";

const record = {
  name: "Laptop",
  description: "",
  price: "999.99",
  quantity: 50,
  category: "Electronics",
  created_at: new Date("2024-03-01T12:00:00.000Z"),
  updated_at: new Date("2024-03-01T12:00:00.000Z"),
};

function unreachableStore() {
  const factory = new UnreachableDbFactory();
  const db = new DbClient(factory, {
    uri: "mongodb://127.0.0.1:27017",
    dbName: "products_test",
  });
  return { store: new MongoProductStore(db), factory };
}

type StoreCall = (store: MongoProductStore) => Promise<unknown>;

const id = new ObjectId();

const cases: Array<[string, StoreCall, string]> = [
  ["insert", (s) => s.insert(record), "Failed to create product"],
  ["findById", (s) => s.findById(id), "Failed to retrieve product"],
  ["findAll", (s) => s.findAll(), "Failed to retrieve products"],
  ["replaceById", (s) => s.replaceById(id, record), "Failed to update product"],
  ["deleteById", (s) => s.deleteById(id), "Failed to delete product"],
];

describe("MongoProductStore when the server is unreachable", () => {
  it.each(cases)("%s raises StoreUnavailableError", async (op, call, detail) => {
    const { store } = unreachableStore();
    const err = await call(store).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(StoreUnavailableError);
    expect(err).toMatchObject({ op, status: 500, code: "STORE_UNAVAILABLE" });
    expect(err).toHaveProperty("message", detail);
  });

  it("keeps the driver error as the cause, off the problem body", async () => {
    const { store } = unreachableStore();
    const err = await store.findAll().catch((e: unknown) => e);
    if (!(err instanceof StoreUnavailableError)) throw new Error("expected StoreUnavailableError");

    expect(err.cause).toBeInstanceOf(Error);
    expect(err.cause).toHaveProperty(
      "message",
      "Server selection timed out after 2000 ms"
    );
    expect(err.toProblem("req-1")).toEqual({
      type: "about:blank",
      title: "Internal Server Error",
      status: 500,
      code: "STORE_UNAVAILABLE",
      detail: "Failed to retrieve products",
      instance: "req-1",
    });
  });

  it("retries the connection on the next call", async () => {
    const { store, factory } = unreachableStore();
    await store.findAll().catch(() => undefined);
    await store.findAll().catch(() => undefined);
    expect(factory.connectCalls).toBe(2);
  });
});

describe("MongoProductStore against the driver", () => {
  const factory = new DetachedDbFactory();
  const store = new MongoProductStore(
    new DbClient(factory, {
      uri: "mongodb://127.0.0.1:27017",
      dbName: "products_test",
    })
  );
  const stored = { _id: id, ...recordToDocument(record) };

  afterEach(() => {
    vi.restoreAllMocks();
  });

  afterAll(async () => {
    await factory.close();
  });

  it("insert writes a Decimal128 price and returns the driver's id", async () => {
    const insertOne = vi
      .spyOn(Collection.prototype, "insertOne")
      .mockResolvedValueOnce({ acknowledged: true, insertedId: id });

    await expect(store.insert(record)).resolves.toBe(id);
    expect(insertOne).toHaveBeenCalledTimes(1);
    const [doc] = insertOne.mock.calls[0];
    expect(doc).toMatchObject({ name: "Laptop", quantity: 50 });
    expect(doc.price).toBeInstanceOf(Decimal128);
    expect(doc.price.toString()).toBe("999.99");
  });

  it("findById maps the stored document", async () => {
    const findOne = vi
      .spyOn(Collection.prototype, "findOne")
      .mockResolvedValueOnce(stored);

    await expect(store.findById(id)).resolves.toEqual({ id, ...record });
    expect(findOne).toHaveBeenCalledWith({ _id: id });
  });

  it("findById answers null for a missing document", async () => {
    vi.spyOn(Collection.prototype, "findOne").mockResolvedValueOnce(null);
    await expect(store.findById(id)).resolves.toBeNull();
  });

  it("findAll maps every document", async () => {
    const other = new ObjectId();
    vi.spyOn(FindCursor.prototype, "toArray").mockResolvedValueOnce([
      stored,
      { ...stored, _id: other, name: "Mouse", price: Decimal128.fromString("25.00") },
    ]);

    const all = await store.findAll();
    expect(all.map((p) => [p.id, p.name, p.price])).toEqual([
      [id, "Laptop", "999.99"],
      [other, "Mouse", "25.00"],
    ]);
  });

  it("replaceById reports whether a document matched", async () => {
    const base = {
      acknowledged: true,
      modifiedCount: 0,
      upsertedCount: 0,
      upsertedId: null,
    };
    const replaceOne = vi
      .spyOn(Collection.prototype, "replaceOne")
      .mockResolvedValueOnce({ ...base, matchedCount: 1 })
      .mockResolvedValueOnce({ ...base, matchedCount: 0 });

    await expect(store.replaceById(id, record)).resolves.toBe(true);
    await expect(store.replaceById(id, record)).resolves.toBe(false);
    expect(replaceOne.mock.calls[0][0]).toEqual({ _id: id });
  });

  it("deleteById reports whether a document was removed", async () => {
    vi.spyOn(Collection.prototype, "deleteOne")
      .mockResolvedValueOnce({ acknowledged: true, deletedCount: 1 })
      .mockResolvedValueOnce({ acknowledged: true, deletedCount: 0 });

    await expect(store.deleteById(id)).resolves.toBe(true);
    await expect(store.deleteById(id)).resolves.toBe(false);
  });

  it("does not report a malformed document as a store outage", async () => {
    vi.spyOn(Collection.prototype, "findOne").mockResolvedValueOnce({
      _id: id,
      name: "Laptop",
    });

    const err = await store.findById(id).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(TypeError);
    expect(err).not.toBeInstanceOf(StoreUnavailableError);
  });
});
