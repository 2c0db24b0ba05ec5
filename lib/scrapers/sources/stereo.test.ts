import { describe, it, expect } from "vitest";
import { stereoScraper } from "./stereo";
import type { ParseContext } from "../types";

const context: ParseContext = {
  now: new Date("2026-03-01T12:00:00Z"),
  timeZone: "Europe/Berlin",
  city: "Bielefeld",
};

const URL = "https://stereo-bielefeld.de/programm/";

describe("Stereo scraper", () => {
  it("prefers JSON-LD and applies the venue defaults", () => {
    const ld = {
      "@type": ["Event", "DanceEvent"],
      name: "Ü30 Party",
      startDate: "2026-03-07T22:00:00",
      description: "x".repeat(600),
      image: { url: "https://stereo-bielefeld.de/img/ue30.jpg" },
    };
    const html = `<script type="application/ld+json">${JSON.stringify(ld)}</script>
      <article class="event"><h3>Ignored Card</h3><span class="date">07.03.2026</span></article>`;
    const events = stereoScraper.parse({ url: URL, html }, context);
    expect(events).toHaveLength(1);
    const [event] = events;
    expect(event!.title).toBe("Ü30 Party");
    expect(event!.location).toBe("Stereo Bielefeld");
    expect(event!.category).toBe("Party");
    expect(event!.description).toHaveLength(500);
    expect(event!.imageUrl).toBe("https://stereo-bielefeld.de/img/ue30.jpg");
    expect(event!.dateStart!.toISOString()).toBe("2026-03-07T21:00:00.000Z");
  });

  it("falls back to cards", () => {
    const html = `<article class="event"><h3>Techno Tuesday</h3><span class="date">10.03.2026 23:00</span><a href="/programm/techno-tuesday">Info</a></article>`;
    const events = stereoScraper.parse({ url: URL, html }, context);
    expect(events).toHaveLength(1);
    expect(events[0]).toMatchObject({
      title: "Techno Tuesday",
      url: "https://stereo-bielefeld.de/programm/techno-tuesday",
      location: "Stereo Bielefeld",
      category: "Party",
    });
    expect(events[0]!.dateStart!.toISOString()).toBe("2026-03-10T22:00:00.000Z");
  });
});
