import { describe, it, expect } from "vitest";
import {
  extractJsonLdEvents,
  jsonLdImage,
  jsonLdLocation,
  jsonLdToRawEvents,
  parseJsonLdBlock,
  titleFromJsonLdEvent,
} from "./jsonLdEvent";

function page(...blocks: string[]): string {
  return `<html><head>${blocks.map((b) => `<script type="application/ld+json">${b}</script>`).join("")}</head><body></body></html>`;
}

describe("JSON-LD extraction", () => {
  it("parses a block with a trailing comma", () => {
    expect(parseJsonLdBlock('{"name":"X",}')).toEqual({ name: "X" });
    expect(parseJsonLdBlock("{not json")).toBeNull();
  });

  it("walks arrays and @graph and matches event types", () => {
    const html = page(
      '[{"@type":"Event","name":"A"},{"@type":"Organization","name":"Org"}]',
      '{"@graph":[{"@type":["Thing","MusicEvent"],"name":"B"}]}',
      "{broken",
      '{"@type":"DanceEvent","name":"C",}'
    );
    expect(extractJsonLdEvents(html).map((e) => e.name)).toEqual(["A", "B", "C"]);
  });

  it("uses the performer when the event has no name", () => {
    expect(titleFromJsonLdEvent({ performer: [{ name: "Die Band" }] })).toBe("Die Band");
    expect(titleFromJsonLdEvent({ name: "<b>Konzert</b>" })).toBe("Konzert");
  });

  it("reads location variants", () => {
    expect(jsonLdLocation("Forum")).toBe("Forum");
    expect(jsonLdLocation({ name: "Stadthalle" })).toBe("Stadthalle");
    expect(
      jsonLdLocation({ address: { name: "Kulturhaus", streetAddress: "Hauptstr. 1", addressLocality: "Bielefeld" } })
    ).toBe("Kulturhaus, Hauptstr. 1, Bielefeld");
    expect(jsonLdLocation({ address: "Niederwall 23" })).toBe("Niederwall 23");
    expect(jsonLdLocation([{ name: "Erster" }, { name: "Zweiter" }])).toBe("Erster");
    expect(jsonLdLocation(null)).toBe("");
  });

  it("reads image variants", () => {
    expect(jsonLdImage("a.jpg")).toBe("a.jpg");
    expect(jsonLdImage(["b.jpg", "c.jpg"])).toBe("b.jpg");
    expect(jsonLdImage({ url: "d.jpg" })).toBe("d.jpg");
    expect(jsonLdImage(42)).toBe("");
  });

  it("maps nodes to raw events and skips nodes without a start", () => {
    const events = jsonLdToRawEvents(
      [
        { "@type": "Event", name: "Mit Datum", startDate: "2026-05-01T20:00:00", endDate: "2026-05-01T23:00:00", url: "/e/1" },
        { "@type": "Event", name: "Ohne Datum" },
      ],
      { source: "test", baseUrl: "https://example.de", timeZone: "Europe/Berlin", location: "Default", category: "Kultur" }
    );
    expect(events).toHaveLength(1);
    expect(events[0]).toMatchObject({
      title: "Mit Datum",
      location: "Default",
      category: "Kultur",
      url: "https://example.de/e/1",
      source: "test",
    });
    expect(events[0]!.dateStart!.toISOString()).toBe("2026-05-01T18:00:00.000Z");
    expect(events[0]!.dateEnd!.toISOString()).toBe("2026-05-01T21:00:00.000Z");
  });

  it("keeps the instant of a start given in UTC", () => {
    const [event] = jsonLdToRawEvents([{ "@type": "Event", name: "UTC", startDate: "2026-03-15T18:30:00Z" }], {
      source: "test",
      baseUrl: "https://example.de",
      timeZone: "Europe/Berlin",
    });
    expect(event!.dateStart!.toISOString()).toBe("2026-03-15T18:30:00.000Z");
  });
});
