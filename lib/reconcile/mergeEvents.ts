import { DEFAULT_TIMEZONE } from "@/types";
import type { EventRecord } from "@/lib/scrapers/types";
import { dateKeyInTimeZone } from "@/lib/scrapers/timezone";

export interface EventSourceRef {
  source: string;
  url: string;
}

/** One catalog entry: the primary record's fields plus every source that listed it. */
export interface MergedEvent extends EventRecord {
  sources: EventSourceRef[];
}

export interface MergeOptions {
  timeZone?: string;
}

/** "Jazz Night", "JAZZ  NIGHT!!" and "Jäzz Night" compare equal. */
export function normalizeTitle(title: string): string {
  return title
    .toLowerCase()
    .trim()
    .normalize("NFKD")
    .replace(/\p{M}/gu, "")
    .replace(/[^a-z0-9 ]+/g, " ")
    .replace(/\s+/g, " ")
    .trim();
}

export function groupKey(event: Pick<EventRecord, "title" | "dateStart">, timeZone = DEFAULT_TIMEZONE): string {
  return `${normalizeTitle(event.title)}|${dateKeyInTimeZone(event.dateStart, timeZone)}`;
}

type PreferredField = "imageUrl" | "location" | "category" | "price";

function firstNonEmpty(group: readonly EventRecord[], field: PreferredField): string {
  return group.find((e) => e[field])?.[field] ?? "";
}

/** Longest description; the earliest member wins a tie. */
function longestDescription(group: readonly EventRecord[]): string {
  let best = "";
  for (const e of group) {
    if (e.description.length > best.length) best = e.description;
  }
  return best;
}

function toSourceRef(e: EventRecord): EventSourceRef {
  return { source: e.source, url: e.url };
}

/**
 * Fold listings of the same event (same normalised title on the same
 * calendar day) into one entry. Groups keep arrival order; the result is
 * sorted by start.
 */
export function mergeEvents(events: readonly EventRecord[], options: MergeOptions = {}): MergedEvent[] {
  const timeZone = options.timeZone ?? DEFAULT_TIMEZONE;
  const groups = new Map<string, EventRecord[]>();
  for (const event of events) {
    const key = groupKey(event, timeZone);
    const group = groups.get(key);
    if (group) group.push(event);
    else groups.set(key, [event]);
  }

  const merged: MergedEvent[] = [];
  let folded = 0;
  for (const group of groups.values()) {
    const [primary] = group;
    if (group.length === 1) {
      merged.push({ ...primary, sources: [toSourceRef(primary)] });
      continue;
    }
    folded += group.length - 1;
    merged.push({
      ...primary,
      description: longestDescription(group),
      imageUrl: firstNonEmpty(group, "imageUrl"),
      location: firstNonEmpty(group, "location"),
      category: firstNonEmpty(group, "category"),
      price: firstNonEmpty(group, "price"),
      sources: group.map(toSourceRef),
    });
  }

  merged.sort((a, b) => a.dateStart.getTime() - b.dateStart.getTime());
  if (folded > 0) {
    console.info(`[publish] merged ${folded} duplicate listings into ${merged.length} events`);
  }
  return merged;
}
