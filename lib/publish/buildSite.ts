import { mkdir, readFile, writeFile } from "fs/promises";
import { join } from "path";
import { DEFAULT_TIMEZONE } from "@/types";
import { mergeEvents } from "@/lib/reconcile/mergeEvents";
import type { EventStore } from "@/lib/store/types";
import { serializeCatalog } from "./catalog";

export const DEFAULT_TEMPLATE_PATH = join(__dirname, "..", "..", "templates", "index.html");

export interface BuildSiteOptions {
  store: EventStore;
  siteDir: string;
  now?: Date;
  timeZone?: string;
  templatePath?: string;
}

export interface SiteSummary {
  siteDir: string;
  events: number;
  categories: number;
  sources: number;
}

/** The shell formats dates in the catalog's zone. */
export function renderShell(template: string, timeZone: string): string {
  return template.replaceAll("{{TIME_ZONE}}", timeZone);
}

/**
 * Write `events.json` (upcoming events, duplicates merged) and the HTML
 * shell that renders it.
 */
export async function buildSite(options: BuildSiteOptions): Promise<SiteSummary> {
  const { store, siteDir } = options;
  const now = options.now ?? new Date();
  const timeZone = options.timeZone ?? DEFAULT_TIMEZONE;

  const stored = await store.queryFuture(now);
  const events = mergeEvents(stored, { timeZone });

  await mkdir(siteDir, { recursive: true });
  const jsonPath = join(siteDir, "events.json");
  await writeFile(jsonPath, serializeCatalog(events), "utf-8");
  console.info(`[publish] wrote ${events.length} events to ${jsonPath}`);

  const htmlPath = join(siteDir, "index.html");
  const template = await readFile(options.templatePath ?? DEFAULT_TEMPLATE_PATH, "utf-8");
  await writeFile(htmlPath, renderShell(template, timeZone), "utf-8");
  console.info(`[publish] wrote ${htmlPath}`);

  const summary: SiteSummary = {
    siteDir,
    events: events.length,
    categories: new Set(events.map((e) => e.category).filter(Boolean)).size,
    sources: new Set(events.map((e) => e.source)).size,
  };
  console.info(
    `[publish] done: ${summary.events} events, ${summary.categories} categories, ${summary.sources} sources`
  );
  return summary;
}
