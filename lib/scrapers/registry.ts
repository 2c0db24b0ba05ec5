import type { Scraper } from "./types";

const scrapers: Scraper[] = [];

/** Register a source; a second registration under the same id is ignored. */
export function registerScraper(scraper: Scraper): void {
  if (scrapers.some((s) => s.id === scraper.id)) return;
  scrapers.push(scraper);
}

export function getScrapers(): Scraper[] {
  return [...scrapers];
}

export function getScraperById(id: string): Scraper | undefined {
  return scrapers.find((s) => s.id === id);
}

export interface ScraperSelection {
  selected: Scraper[];
  unknown: string[];
}

/** Resolve ids given on the command line; no ids selects every source. */
export function selectScrapers(ids: readonly string[]): ScraperSelection {
  if (ids.length === 0) return { selected: getScrapers(), unknown: [] };
  const selected: Scraper[] = [];
  const unknown: string[] = [];
  for (const id of ids) {
    const scraper = getScraperById(id);
    if (!scraper) unknown.push(id);
    else if (!selected.includes(scraper)) selected.push(scraper);
  }
  return { selected, unknown };
}
