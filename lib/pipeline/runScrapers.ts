import { normalizeEvents } from "@/lib/normalize/normalizeEvent";
import type { EventStore } from "@/lib/store/types";
import type { PageFetcher, ParseContext, RawEvent, Scraper } from "@/lib/scrapers/types";
import { dateKeyInTimeZone } from "@/lib/scrapers/timezone";

export interface RunDeps {
  client: PageFetcher;
  store: EventStore;
  context: ParseContext;
}

export interface SourceRunResult {
  sourceId: string;
  ok: boolean;
  /** Raw records parsed from every page. */
  fetched: number;
  /** Records left after validation. */
  valid: number;
  stored: number;
  errors: string[];
}

export interface RunSummary {
  results: SourceRunResult[];
  totalStored: number;
  failed: string[];
}

/** First record per (title, calendar day); later pages repeat earlier ones. */
export function dedupeByTitleAndDay(events: readonly RawEvent[], timeZone: string): RawEvent[] {
  const seen = new Set<string>();
  const out: RawEvent[] = [];
  for (const event of events) {
    if (!event.dateStart) continue;
    const key = `${event.title}|${dateKeyInTimeZone(event.dateStart, timeZone)}`;
    if (seen.has(key)) continue;
    seen.add(key);
    out.push(event);
  }
  return out;
}

/**
 * Fetch, parse, validate and store one source. Anything thrown is recorded
 * on the result; the source then contributes nothing.
 */
export async function runScraper(scraper: Scraper, deps: RunDeps): Promise<SourceRunResult> {
  const result: SourceRunResult = { sourceId: scraper.id, ok: false, fetched: 0, valid: 0, stored: 0, errors: [] };
  try {
    const docs = await scraper.fetch(deps.client);
    let raws: RawEvent[] = [];
    for (const doc of docs) {
      raws.push(...scraper.parse(doc, deps.context));
    }
    if (scraper.dedupeAcrossDocuments) {
      raws = dedupeByTitleAndDay(raws, deps.context.timeZone);
    }
    result.fetched = raws.length;

    const records = normalizeEvents(raws, { city: deps.context.city });
    result.valid = records.length;
    if (records.length < raws.length) {
      console.warn(`[scrape] ${scraper.id}: dropped ${raws.length - records.length} records without title or date`);
    }

    result.stored = await deps.store.upsert(records);
    if (result.stored < records.length) {
      result.errors.push(`${records.length - result.stored} records could not be stored`);
    }
    result.ok = true;
    if (raws.length === 0) {
      console.warn(`[scrape] ${scraper.id}: no events found`);
    } else {
      console.info(`[scrape] ${scraper.id}: ${result.stored} of ${raws.length} events stored`);
    }
  } catch (e) {
    result.errors.push(e instanceof Error ? e.message : String(e));
    console.error(`[scrape] ${scraper.id} failed:`, e);
  }
  return result;
}

/** Run sources one after another; a failing source never stops the run. */
export async function runScrapers(scrapers: readonly Scraper[], deps: RunDeps): Promise<RunSummary> {
  const results: SourceRunResult[] = [];
  for (const scraper of scrapers) {
    console.info(`[scrape] running ${scraper.name} (${scraper.id})`);
    results.push(await runScraper(scraper, deps));
  }
  const totalStored = results.reduce((sum, r) => sum + r.stored, 0);
  const failed = results.filter((r) => !r.ok).map((r) => r.sourceId);
  console.info(
    `[scrape] done: ${totalStored} events stored from ${results.length - failed.length}/${results.length} sources`
  );
  if (failed.length > 0) {
    console.warn(`[scrape] failed sources: ${failed.join(", ")}`);
  }
  return { results, totalStored, failed };
}
