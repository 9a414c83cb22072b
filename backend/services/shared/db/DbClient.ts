// backend/services/shared/db/DbClient.ts
/**
 * Thin, reusable wrapper around a driver-specific IDbFactory.
 * Owns connection lifecycle + lazy connect; exposes typed helpers.
 *
 * Use one DbClient per service/process.
 */

import type { Collection, Document } from "mongodb";
import { redactUri } from "../config/env";
import type { IDbConnectionInfo, IDbFactory } from "./types";

export class DbClient {
  private readonly factory: IDbFactory;
  private readonly info: IDbConnectionInfo;

  constructor(factory: IDbFactory, info: IDbConnectionInfo) {
    this.factory = factory;
    this.info = info;
  }

  public get dbName(): string {
    return this.info.dbName;
  }

  /** Connection string with credentials masked, for logs. */
  public get redactedUri(): string {
    return redactUri(this.info.uri);
  }

  /** Explicit connect (safe to call multiple times). */
  public async connect(): Promise<void> {
    if (this.factory.isConnected()) return;
    await this.factory.connect(this.info);
    if (!this.factory.isConnected()) {
      throw new Error(
        "[DbClient] factory reported not connected after connect()"
      );
    }
  }

  public async getCollection<TSchema extends Document = Document>(
    name: string
  ): Promise<Collection<TSchema>> {
    await this.connect();
    return this.factory.getCollection<TSchema>(name, this.info.dbName);
  }

  /** Round-trip to the server; used by readiness probes. */
  public async ping(): Promise<void> {
    await this.connect();
    await this.factory.getDb(this.info.dbName).command({ ping: 1 });
  }

  /** Close the connection (safe to call multiple times). */
  public async close(): Promise<void> {
    await this.factory.close();
  }

  public isConnected(): boolean {
    return this.factory.isConnected();
  }
}
