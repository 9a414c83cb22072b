// backend/services/shared/db/types.ts
/**
 * Interfaces for the DB client + factory so services depend on abstractions.
 */

import type { Collection, Db, Document } from "mongodb";

export interface IDbConnectionInfo {
  uri: string;
  dbName: string;
}

export interface IDbFactory {
  /** Establish a connection (idempotent). */
  connect(info: IDbConnectionInfo): Promise<void>;

  /** Close the connection (idempotent). */
  close(): Promise<void>;

  isConnected(): boolean;

  /** Throws if not connected. */
  getDb(dbName: string): Db;

  /** Throws if not connected. */
  getCollection<TSchema extends Document = Document>(
    name: string,
    dbName: string
  ): Collection<TSchema>;
}
