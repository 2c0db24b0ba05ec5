import { Timestamp, type CollectionReference, type Firestore } from "firebase-admin/firestore";
import { DEFAULT_TIMEZONE } from "@/types";
import { getEventsCollection } from "@/lib/config/env";
import { getAdminDb } from "@/lib/firebase/admin";
import type { EventRecord } from "@/lib/scrapers/types";
import { startOfDayInTimeZone } from "@/lib/scrapers/timezone";
import {
  compareStored,
  distinctSorted,
  fromFirestoreDoc,
  recordId,
  toFirestoreDoc,
  updateFields,
  upsertEach,
} from "./storedEvent";
import { StoreUnavailableError, type EventStore, type StoredEvent } from "./types";

export interface FirestoreStoreOptions {
  /** Defaults to the admin client from the environment. */
  db?: Firestore;
  collection?: string;
  timeZone?: string;
  clock?: () => Date;
}

export class FirestoreEventStore implements EventStore {
  private db: Firestore | null;
  private readonly collectionName: string;
  private readonly timeZone: string;
  private readonly clock: () => Date;

  constructor(options: FirestoreStoreOptions = {}) {
    this.db = options.db ?? null;
    this.collectionName = options.collection ?? getEventsCollection();
    this.timeZone = options.timeZone ?? DEFAULT_TIMEZONE;
    this.clock = options.clock ?? (() => new Date());
  }

  async init(): Promise<void> {
    if (!this.db) this.db = getAdminDb();
    if (!this.db) {
      throw new StoreUnavailableError(
        "Firestore is not configured (set FIREBASE_PROJECT_ID and a service account)"
      );
    }
  }

  private events(): CollectionReference {
    if (!this.db) throw new StoreUnavailableError("store used before init()");
    return this.db.collection(this.collectionName);
  }

  async upsert(records: readonly EventRecord[]): Promise<number> {
    const col = this.events();
    const db = col.firestore;
    return upsertEach(records, async (record) => {
      const ref = col.doc(recordId(record));
      const now = this.clock();
      await db.runTransaction(async (tx) => {
        const snap = await tx.get(ref);
        if (snap.exists) {
          tx.update(ref, { ...updateFields(record, now) });
        } else {
          tx.create(ref, toFirestoreDoc(record, now));
        }
      });
    });
  }

  async queryFuture(now: Date = this.clock()): Promise<StoredEvent[]> {
    const from = Timestamp.fromDate(startOfDayInTimeZone(now, this.timeZone));
    const snap = await this.events().where("dateStart", ">=", from).orderBy("dateStart", "asc").get();
    const out: StoredEvent[] = [];
    for (const doc of snap.docs) {
      const event = fromFirestoreDoc(doc.data());
      if (event) out.push(event);
    }
    return out.sort(compareStored);
  }

  async distinctCategories(now?: Date): Promise<string[]> {
    return distinctSorted((await this.queryFuture(now)).map((e) => e.category));
  }

  async distinctLocations(now?: Date): Promise<string[]> {
    return distinctSorted((await this.queryFuture(now)).map((e) => e.location));
  }
}
