import { describe, it, expect } from "vitest";
import { readFileSync } from "node:fs";
import { join } from "node:path";
import { bielefeldJetztScraper } from "./bielefeldjetzt";
import type { ParseContext } from "../types";

const FIXTURE_HTML = readFileSync(join(__dirname, "bielefeldjetzt-fixture.html"), "utf-8");

const context: ParseContext = {
  now: new Date("2026-03-01T12:00:00Z"),
  timeZone: "Europe/Berlin",
  city: "Bielefeld",
};

describe("Bielefeld Jetzt scraper", () => {
  const events = bielefeldJetztScraper.parse({ url: "https://bielefeld-jetzt.de/events", html: FIXTURE_HTML }, context);

  it("parses dated cards and drops the undated one", () => {
    expect(events.map((e) => e.title)).toEqual(["Jazz Night", "Flohmarkt am Siegfriedplatz"]);
  });

  it("reads a fully populated card", () => {
    const first = events[0]!;
    expect(first.dateStart!.toISOString()).toBe("2026-03-15T18:30:00.000Z");
    expect(first.url).toBe("https://bielefeld-jetzt.de/events/jazz-night");
    expect(first.imageUrl).toBe("https://bielefeld-jetzt.de/img/jazz.jpg");
    expect(first.description).toBe("Live-Jazz im Foyer.");
    expect(first.location).toBe("Neue Schmiede");
    expect(first.category).toBe("Konzert");
    expect(first.source).toBe("bielefeld_jetzt");
  });

  it("falls back to a labelled venue and leaves missing fields empty", () => {
    const second = events[1]!;
    expect(second.dateStart!.toISOString()).toBe("2026-03-21T09:00:00.000Z");
    expect(second.location).toBe("Siegfriedplatz");
    expect(second.description).toBe("Trödel und Kaffee.");
    expect(second.url).toBe("");
    expect(second.category).toBe("");
    expect(second.imageUrl).toBe("");
  });
});
