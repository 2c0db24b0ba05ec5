import { DEFAULT_CITY } from "@/types";
import type { EventRecord, RawEvent } from "@/lib/scrapers/types";

export interface NormalizeOptions {
  /** Municipality for records that carry none. */
  city?: string;
}

function isValidDate(value: Date | null | undefined): value is Date {
  return value instanceof Date && !Number.isNaN(value.getTime());
}

function text(value: string | undefined): string {
  return value?.trim() ?? "";
}

/**
 * Validate a raw event and fill defaults: trimmed strings, empty strings for
 * missing fields, the configured city. Returns null for an empty title or a
 * missing/invalid start.
 */
export function normalizeEvent(raw: RawEvent, options: NormalizeOptions = {}): EventRecord | null {
  const title = raw.title.replace(/\s+/g, " ").trim();
  if (!title || !isValidDate(raw.dateStart)) return null;

  return {
    title,
    dateStart: raw.dateStart,
    dateEnd: isValidDate(raw.dateEnd) ? raw.dateEnd : null,
    description: text(raw.description),
    location: text(raw.location),
    category: text(raw.category),
    imageUrl: text(raw.imageUrl),
    price: text(raw.price),
    city: text(raw.city) || options.city || DEFAULT_CITY,
    source: raw.source,
    url: text(raw.url),
    tags: Array.isArray(raw.tags) ? raw.tags.map((t) => t.trim()).filter(Boolean) : [],
  };
}

/** Normalize a batch, dropping invalid records. */
export function normalizeEvents(raws: readonly RawEvent[], options: NormalizeOptions = {}): EventRecord[] {
  const out: EventRecord[] = [];
  for (const raw of raws) {
    const record = normalizeEvent(raw, options);
    if (record) out.push(record);
  }
  return out;
}
