// backend/services/shared/db/mongo/MongoDbFactory.ts
/**
 * MongoDB-specific factory implementing IDbFactory, injected into DbClient.
 * Owns the single MongoClient for the process; the driver pools connections.
 */

import { MongoClient, type Collection, type Db, type Document } from "mongodb";
import type { IDbConnectionInfo, IDbFactory } from "../types";

// bounds how long a request waits on a dead cluster
const SERVER_SELECTION_TIMEOUT_MS = 2000;

export class MongoDbFactory implements IDbFactory {
  private client: MongoClient | null = null;

  public async connect(info: IDbConnectionInfo): Promise<void> {
    if (this.client) return;
    const client = new MongoClient(info.uri, {
      serverSelectionTimeoutMS: SERVER_SELECTION_TIMEOUT_MS,
    });
    await client.connect();
    this.client = client;
  }

  public async close(): Promise<void> {
    if (!this.client) return;
    try {
      await this.client.close();
    } finally {
      this.client = null;
    }
  }

  public isConnected(): boolean {
    return this.client !== null;
  }

  public getDb(dbName: string): Db {
    if (!this.client) throw new Error("[MongoDbFactory] not connected");
    if (!dbName) throw new Error("[MongoDbFactory] dbName required");
    return this.client.db(dbName);
  }

  public getCollection<TSchema extends Document = Document>(
    name: string,
    dbName: string
  ): Collection<TSchema> {
    return this.getDb(dbName).collection<TSchema>(name);
  }
}
