import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import { MemoryEventStore } from "@/lib/store/memoryStore";
import type { PageFetcher, ParseContext, RawEvent, Scraper } from "@/lib/scrapers/types";
import { dedupeByTitleAndDay, runScraper, runScrapers } from "./runScrapers";

const context: ParseContext = {
  now: new Date("2026-03-01T12:00:00Z"),
  timeZone: "Europe/Berlin",
  city: "Bielefeld",
};

const client: PageFetcher = { fetchHtml: async () => "<html></html>" };

function fakeScraper(id: string, pages: Record<string, RawEvent[]>, overrides: Partial<Scraper> = {}): Scraper {
  return {
    id,
    name: id,
    baseUrl: "https://example.test",
    fetch: async () => Object.keys(pages).map((url) => ({ url, html: "" })),
    parse: (doc) => pages[doc.url] ?? [],
    ...overrides,
  };
}

function raw(title: string, iso: string | null, source = "a"): RawEvent {
  return { title, dateStart: iso ? new Date(iso) : null, source };
}

describe("dedupeByTitleAndDay", () => {
  it("keeps the first record per title and day", () => {
    const out = dedupeByTitleAndDay(
      [
        raw("Konzert", "2026-03-15T19:00:00Z"),
        raw("Konzert", "2026-03-15T20:00:00Z"),
        raw("Konzert", "2026-03-16T19:00:00Z"),
        raw("Ohne", null),
      ],
      "Europe/Berlin"
    );
    expect(out.map((e) => e.dateStart?.toISOString())).toEqual([
      "2026-03-15T19:00:00.000Z",
      "2026-03-16T19:00:00.000Z",
    ]);
  });
});

describe("runScraper", () => {
  beforeEach(() => {
    vi.spyOn(console, "info").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("parses every page, drops invalid records and stores the rest", async () => {
    const store = new MemoryEventStore({ clock: () => context.now });
    const scraper = fakeScraper("a", {
      "https://example.test/1": [raw("Konzert", "2026-03-15T19:00:00Z"), raw("  ", "2026-03-15T19:00:00Z")],
      "https://example.test/2": [raw("Lesung", "2026-03-16T18:00:00Z"), raw("Ohne Datum", null)],
    });
    const result = await runScraper(scraper, { client, store, context });
    expect(result).toEqual({ sourceId: "a", ok: true, fetched: 4, valid: 2, stored: 2, errors: [] });
    const rows = await store.queryFuture(context.now);
    expect(rows.map((r) => [r.title, r.city])).toEqual([
      ["Konzert", "Bielefeld"],
      ["Lesung", "Bielefeld"],
    ]);
  });

  it("dedupes across pages when the source asks for it", async () => {
    const store = new MemoryEventStore({ clock: () => context.now });
    const scraper = fakeScraper(
      "a",
      {
        "https://example.test/1": [raw("Konzert", "2026-03-15T19:00:00Z")],
        "https://example.test/2": [raw("Konzert", "2026-03-15T19:00:00Z")],
      },
      { dedupeAcrossDocuments: true }
    );
    const result = await runScraper(scraper, { client, store, context });
    expect(result.fetched).toBe(1);
    expect(result.stored).toBe(1);
  });

  it("records a failing source without throwing", async () => {
    const store = new MemoryEventStore();
    const scraper = fakeScraper("broken", {}, {
      fetch: async () => {
        throw new Error("HTTP 404: https://example.test/");
      },
    });
    const result = await runScraper(scraper, { client, store, context });
    expect(result).toEqual({
      sourceId: "broken",
      ok: false,
      fetched: 0,
      valid: 0,
      stored: 0,
      errors: ["HTTP 404: https://example.test/"],
    });
  });
});

describe("runScrapers", () => {
  beforeEach(() => {
    vi.spyOn(console, "info").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("keeps going after a failing source and sums the stored counts", async () => {
    const store = new MemoryEventStore({ clock: () => context.now });
    const order: string[] = [];
    const track = (scraper: Scraper): Scraper => ({
      ...scraper,
      fetch: async (c) => {
        order.push(scraper.id);
        return scraper.fetch(c);
      },
    });
    const summary = await runScrapers(
      [
        track(fakeScraper("a", { "https://a.test/": [raw("Eins", "2026-03-15T19:00:00Z", "a")] })),
        track(
          fakeScraper("b", {}, {
            parse: () => {
              throw new Error("unexpected markup");
            },
            fetch: async () => [{ url: "https://b.test/", html: "" }],
          })
        ),
        track(
          fakeScraper("c", {
            "https://c.test/": [raw("Zwei", "2026-03-16T19:00:00Z", "c"), raw("Drei", "2026-03-17T19:00:00Z", "c")],
          })
        ),
      ],
      { client, store, context }
    );
    expect(order).toEqual(["a", "b", "c"]);
    expect(summary.totalStored).toBe(3);
    expect(summary.failed).toEqual(["b"]);
    expect(summary.results.map((r) => r.ok)).toEqual([true, false, true]);
    expect(summary.results[1].errors).toEqual(["unexpected markup"]);
  });
});
