import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import { mkdtempSync, readFileSync, rmSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import type { EventRecord } from "@/lib/scrapers/types";
import { MemoryEventStore } from "@/lib/store/memoryStore";
import { buildSite, renderShell } from "./buildSite";
import { parseCatalog } from "./catalog";

const now = new Date("2026-03-01T12:00:00.000Z");

function record(overrides: Partial<EventRecord>): EventRecord {
  return {
    title: "Jazz Night",
    dateStart: new Date("2026-03-15T18:30:00.000Z"),
    dateEnd: null,
    description: "",
    location: "",
    category: "",
    imageUrl: "",
    price: "",
    city: "Bielefeld",
    source: "stereo",
    url: "",
    tags: [],
    ...overrides,
  };
}

describe("buildSite", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "events-site-"));
    vi.spyOn(console, "info").mockImplementation(() => {});
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  it("writes merged upcoming events and the HTML shell", async () => {
    const store = new MemoryEventStore({ clock: () => now });
    await store.upsert([
      record({ title: "Jazz Night", category: "Konzert", url: "https://a.example/1" }),
      record({ title: "JAZZ NIGHT", source: "bielefeld_jetzt", url: "https://b.example/2" }),
      record({ title: "Poetry Slam", source: "nrzp", category: "Lesung", dateStart: new Date("2026-03-10T19:00:00.000Z") }),
      record({ title: "Vorbei", dateStart: new Date("2026-02-01T19:00:00.000Z") }),
    ]);

    const siteDir = join(dir, "site");
    const summary = await buildSite({ store, siteDir, now });
    expect(summary).toEqual({ siteDir, events: 2, categories: 2, sources: 2 });

    const entries = parseCatalog(readFileSync(join(siteDir, "events.json"), "utf-8"));
    expect(entries.map((e) => e.title)).toEqual(["Poetry Slam", "Jazz Night"]);
    expect(entries[1].sources).toEqual([
      { source: "stereo", url: "https://a.example/1" },
      { source: "bielefeld_jetzt", url: "https://b.example/2" },
    ]);

    const html = readFileSync(join(siteDir, "index.html"), "utf-8");
    expect(html).toContain('fetch("events.json")');
    expect(html).toContain('<html lang="de" data-time-zone="Europe/Berlin">');
  });

  it("writes the configured zone into the shell", async () => {
    const store = new MemoryEventStore({ clock: () => now });
    const siteDir = join(dir, "site");
    await buildSite({ store, siteDir, now, timeZone: "Europe/Vienna" });
    const html = readFileSync(join(siteDir, "index.html"), "utf-8");
    expect(html).toContain('data-time-zone="Europe/Vienna"');
    expect(html).not.toContain("{{TIME_ZONE}}");
  });
});

describe("renderShell", () => {
  it("fills every zone placeholder", () => {
    expect(renderShell("{{TIME_ZONE}}|{{TIME_ZONE}}", "UTC")).toBe("UTC|UTC");
  });
});
