import { DEFAULT_TIMEZONE } from "@/types";
import type { EventRecord } from "@/lib/scrapers/types";
import { startOfDayInTimeZone } from "@/lib/scrapers/timezone";
import { compareStored, distinctSorted, recordId, upsertEach } from "./storedEvent";
import type { EventStore, StoredEvent } from "./types";

export interface MemoryStoreOptions {
  timeZone?: string;
  clock?: () => Date;
}

/** Process-local store with the Firestore store's semantics; dry runs and tests. */
export class MemoryEventStore implements EventStore {
  private readonly rows = new Map<string, StoredEvent>();
  private readonly timeZone: string;
  private readonly clock: () => Date;

  constructor(options: MemoryStoreOptions = {}) {
    this.timeZone = options.timeZone ?? DEFAULT_TIMEZONE;
    this.clock = options.clock ?? (() => new Date());
  }

  async init(): Promise<void> {}

  get size(): number {
    return this.rows.size;
  }

  async upsert(records: readonly EventRecord[]): Promise<number> {
    return upsertEach(records, async (record) => this.write(record));
  }

  private write(record: EventRecord): void {
    if (Number.isNaN(record.dateStart.getTime())) throw new Error("invalid dateStart");
    const id = recordId(record);
    const now = this.clock();
    const existing = this.rows.get(id);
    if (existing) {
      this.rows.set(id, {
        ...existing,
        description: record.description,
        location: record.location,
        category: record.category,
        imageUrl: record.imageUrl,
        url: record.url,
        price: record.price,
        tags: [...record.tags],
        scrapedAt: now,
      });
      return;
    }
    this.rows.set(id, { ...record, tags: [...record.tags], scrapedAt: now, insertedAt: now });
  }

  async queryFuture(now: Date = this.clock()): Promise<StoredEvent[]> {
    const from = startOfDayInTimeZone(now, this.timeZone).getTime();
    return [...this.rows.values()].filter((e) => e.dateStart.getTime() >= from).sort(compareStored);
  }

  async distinctCategories(now?: Date): Promise<string[]> {
    return distinctSorted((await this.queryFuture(now)).map((e) => e.category));
  }

  async distinctLocations(now?: Date): Promise<string[]> {
    return distinctSorted((await this.queryFuture(now)).map((e) => e.location));
  }
}
