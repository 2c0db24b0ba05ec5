import type { EventSourceRef, MergedEvent } from "@/lib/reconcile/mergeEvents";

/** One entry of `events.json`, as the HTML shell reads it. */
export interface CatalogEntry {
  title: string;
  date_start: string;
  date_end: string | null;
  description: string;
  location: string;
  city: string;
  category: string;
  image_url: string;
  url: string;
  price: string;
  source: string;
  tags: string[];
  sources: EventSourceRef[];
}

export function toCatalogEntry(event: MergedEvent): CatalogEntry {
  return {
    title: event.title,
    date_start: event.dateStart.toISOString(),
    date_end: event.dateEnd ? event.dateEnd.toISOString() : null,
    description: event.description,
    location: event.location,
    city: event.city,
    category: event.category,
    image_url: event.imageUrl,
    url: event.url,
    price: event.price,
    source: event.source,
    tags: [...event.tags],
    sources: event.sources.map((s) => ({ source: s.source, url: s.url })),
  };
}

export function serializeCatalog(events: readonly MergedEvent[]): string {
  return `${JSON.stringify(events.map(toCatalogEntry), null, 2)}\n`;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function str(value: unknown): string {
  return typeof value === "string" ? value : "";
}

function strings(value: unknown): string[] {
  return Array.isArray(value) ? value.filter((v): v is string => typeof v === "string") : [];
}

function sourceRefs(value: unknown): EventSourceRef[] {
  if (!Array.isArray(value)) return [];
  return value.filter(isRecord).map((s) => ({ source: str(s.source), url: str(s.url) }));
}

function toEntry(value: unknown): CatalogEntry | null {
  if (!isRecord(value)) return null;
  const title = str(value.title);
  const dateStart = str(value.date_start);
  if (!title || Number.isNaN(Date.parse(dateStart))) return null;
  const dateEnd = typeof value.date_end === "string" ? value.date_end : null;
  return {
    title,
    date_start: dateStart,
    date_end: dateEnd,
    description: str(value.description),
    location: str(value.location),
    city: str(value.city),
    category: str(value.category),
    image_url: str(value.image_url),
    url: str(value.url),
    price: str(value.price),
    source: str(value.source),
    tags: strings(value.tags),
    sources: sourceRefs(value.sources),
  };
}

/**
 * Read a published catalog back. Throws on malformed JSON or a non-array;
 * entries without a title or a parseable start are dropped.
 */
export function parseCatalog(json: string): CatalogEntry[] {
  const data: unknown = JSON.parse(json);
  if (!Array.isArray(data)) throw new Error("catalog is not a JSON array");
  const out: CatalogEntry[] = [];
  for (const item of data) {
    const entry = toEntry(item);
    if (entry) out.push(entry);
  }
  return out;
}
