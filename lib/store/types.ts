import type { EventRecord } from "@/lib/scrapers/types";

/** A persisted record: keyed by (source, title, dateStart). */
export interface StoredEvent extends EventRecord {
  /** Refreshed on every upsert. */
  scrapedAt: Date;
  /** Set once, when the key is first seen. */
  insertedAt: Date;
}

export interface EventStore {
  /** Idempotent. Throws StoreUnavailableError when the backend cannot be reached. */
  init(): Promise<void>;
  /** Insert or refresh each record; returns how many were written. */
  upsert(records: readonly EventRecord[]): Promise<number>;
  /** Events from the start of today on, by start then insertion order. */
  queryFuture(now?: Date): Promise<StoredEvent[]>;
  distinctCategories(now?: Date): Promise<string[]>;
  distinctLocations(now?: Date): Promise<string[]>;
}

export class StoreUnavailableError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "StoreUnavailableError";
  }
}
