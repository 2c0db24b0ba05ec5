/**
 * Run every registered source (or the ones named with --source) and store
 * the results.
 *
 *   npm run scrape -- --dry-run --source stereo prime
 */
import { program } from "commander";
import { loadRuntimeConfig } from "@/lib/config/env";
import { runScrapers } from "@/lib/pipeline/runScrapers";
import { createPageFetcher } from "@/lib/scrapers/fetchHtml";
import { selectScrapers } from "@/lib/scrapers/registry";
import { registerAllScrapers } from "@/lib/scrapers/sources";
import { FirestoreEventStore } from "@/lib/store/firestoreStore";
import { MemoryEventStore } from "@/lib/store/memoryStore";
import { StoreUnavailableError, type EventStore } from "@/lib/store/types";

interface ScrapeOptions {
  dryRun: boolean;
  source: string[];
}

registerAllScrapers();

async function main(): Promise<number> {
  program
    .name("scrape")
    .option("--dry-run", "parse and validate without writing to Firestore", false)
    .option("--source <ids...>", "only run these sources", [])
    .parse(process.argv);
  const opts = program.opts<ScrapeOptions>();

  const { selected, unknown } = selectScrapers(opts.source);
  if (unknown.length > 0) {
    console.error(`[scrape] unknown source(s): ${unknown.join(", ")}`);
    return 1;
  }

  const config = loadRuntimeConfig();
  const store: EventStore = opts.dryRun
    ? new MemoryEventStore({ timeZone: config.timeZone })
    : new FirestoreEventStore({ timeZone: config.timeZone });

  try {
    await store.init();
  } catch (e) {
    if (e instanceof StoreUnavailableError) {
      console.error(`[store] ${e.message}`);
      return 1;
    }
    throw e;
  }

  console.info(`[scrape] ${selected.length} sources${opts.dryRun ? " (dry run)" : ""}`);
  const summary = await runScrapers(selected, {
    client: createPageFetcher(config.fetch),
    store,
    context: { now: new Date(), timeZone: config.timeZone, city: config.city },
  });

  for (const r of summary.results) {
    const status = r.ok ? "ok" : "FAILED";
    console.info(
      `[scrape] ${r.sourceId.padEnd(20)} ${status.padEnd(6)} fetched=${r.fetched} valid=${r.valid} stored=${r.stored}`
    );
  }
  return 0;
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (e: unknown) => {
    console.error("[scrape] fatal:", e);
    process.exitCode = 1;
  }
);
