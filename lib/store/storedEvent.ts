import { Timestamp, type DocumentData } from "firebase-admin/firestore";
import type { EventRecord } from "@/lib/scrapers/types";
import type { StoredEvent } from "./types";

/** Firestore does not allow undefined; every field is present. */
export interface FirestoreEventDoc {
  title: string;
  dateStart: Timestamp;
  dateEnd: Timestamp | null;
  description: string;
  location: string;
  category: string;
  imageUrl: string;
  price: string;
  city: string;
  source: string;
  url: string;
  tags: string[];
  scrapedAt: Timestamp;
  insertedAt: Timestamp;
}

/** Fields refreshed when a key is seen again; city and dateEnd keep their first value. */
export interface EventUpdateFields {
  description: string;
  location: string;
  category: string;
  imageUrl: string;
  url: string;
  price: string;
  tags: string[];
  scrapedAt: Timestamp;
}

function compactUtc(date: Date): string {
  return date.toISOString().slice(0, 16).replace(/[-:T]/g, "");
}

/** Firestore ids are limited to 1500 bytes. */
const MAX_TITLE_IN_ID = 1200;

/**
 * Stable document id for (source, title, dateStart): source, start minute
 * (UTC), the URI-encoded title and a hash of the full key. The title keeps
 * ids apart when the hash collides.
 */
export function storedEventId(source: string, title: string, dateStart: Date): string {
  const str = `${source}:${title}:${dateStart.toISOString()}`;
  let hash = 0;
  for (let i = 0; i < str.length; i++) {
    const c = str.charCodeAt(i);
    hash = (hash << 5) - hash + c;
    hash |= 0;
  }
  const encodedTitle = encodeURIComponent(title).slice(0, MAX_TITLE_IN_ID);
  return `${source}_${compactUtc(dateStart)}_${encodedTitle}_${Math.abs(hash).toString(36)}`;
}

export function recordId(record: Pick<EventRecord, "source" | "title" | "dateStart">): string {
  return storedEventId(record.source, record.title, record.dateStart);
}

export function toFirestoreDoc(record: EventRecord, now: Date): FirestoreEventDoc {
  const stamp = Timestamp.fromDate(now);
  return {
    title: record.title,
    dateStart: Timestamp.fromDate(record.dateStart),
    dateEnd: record.dateEnd ? Timestamp.fromDate(record.dateEnd) : null,
    description: record.description,
    location: record.location,
    category: record.category,
    imageUrl: record.imageUrl,
    price: record.price,
    city: record.city,
    source: record.source,
    url: record.url,
    tags: [...record.tags],
    scrapedAt: stamp,
    insertedAt: stamp,
  };
}

export function updateFields(record: EventRecord, now: Date): EventUpdateFields {
  return {
    description: record.description,
    location: record.location,
    category: record.category,
    imageUrl: record.imageUrl,
    url: record.url,
    price: record.price,
    tags: [...record.tags],
    scrapedAt: Timestamp.fromDate(now),
  };
}

function toDate(value: unknown): Date | null {
  if (value instanceof Timestamp) return value.toDate();
  if (value instanceof Date) return value;
  return null;
}

function str(value: unknown): string {
  return typeof value === "string" ? value : "";
}

/** Read a stored document; documents without a title or start are skipped. */
export function fromFirestoreDoc(data: DocumentData): StoredEvent | null {
  const dateStart = toDate(data.dateStart);
  const title = str(data.title);
  if (!dateStart || !title) return null;
  const scrapedAt = toDate(data.scrapedAt) ?? dateStart;
  const tags: unknown = data.tags;
  return {
    title,
    dateStart,
    dateEnd: toDate(data.dateEnd),
    description: str(data.description),
    location: str(data.location),
    category: str(data.category),
    imageUrl: str(data.imageUrl),
    price: str(data.price),
    city: str(data.city),
    source: str(data.source),
    url: str(data.url),
    tags: Array.isArray(tags) ? tags.filter((t): t is string => typeof t === "string") : [],
    scrapedAt,
    insertedAt: toDate(data.insertedAt) ?? scrapedAt,
  };
}

/** Ascending by start, then by insertion. */
export function compareStored(a: StoredEvent, b: StoredEvent): number {
  return a.dateStart.getTime() - b.dateStart.getTime() || a.insertedAt.getTime() - b.insertedAt.getTime();
}

/** Non-empty, unique, sorted ascending. */
export function distinctSorted(values: Iterable<string>): string[] {
  const set = new Set<string>();
  for (const v of values) if (v) set.add(v);
  return [...set].sort();
}

/**
 * Write records one by one; a failing record is logged and skipped.
 * Returns the number written.
 */
export async function upsertEach(
  records: readonly EventRecord[],
  write: (record: EventRecord) => Promise<void>
): Promise<number> {
  let stored = 0;
  for (const record of records) {
    try {
      await write(record);
      stored++;
    } catch (e) {
      console.warn(
        `[store] upsert failed for ${record.source} "${record.title.slice(0, 40)}":`,
        e instanceof Error ? e.message : String(e)
      );
    }
  }
  return stored;
}
