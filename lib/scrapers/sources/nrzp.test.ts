import { describe, it, expect } from "vitest";
import { nrzpScraper } from "./nrzp";
import type { ParseContext } from "../types";

const context: ParseContext = {
  now: new Date("2026-03-01T12:00:00Z"),
  timeZone: "Europe/Berlin",
  city: "Bielefeld",
};

const URL = "https://nrzp.de/programm";

describe("Nr.z.P. scraper", () => {
  it("parses Elementor posts with a badge category", () => {
    const html = `<article class="elementor-post">
      <h3 class="elementor-post__title"><a href="https://nrzp.de/event/drone-night/">Drone Night</a></h3>
      <time datetime="2026-03-28T20:00">28.03.</time>
      <span>Experimental</span>
    </article>`;
    const events = nrzpScraper.parse({ url: URL, html }, context);
    expect(events).toHaveLength(1);
    expect(events[0]).toMatchObject({
      title: "Drone Night",
      url: "https://nrzp.de/event/drone-night/",
      location: "Nr.z.P. Bielefeld",
      category: "Experimental",
    });
    expect(events[0]!.dateStart!.toISOString()).toBe("2026-03-28T19:00:00.000Z");
  });

  it("falls back to dated links", () => {
    const html = `<div class="programm-liste">
      <div><a href="/programm/noise-abend">Noise Abend</a> – 20.03.2026</div>
      <div><a href="#">Nach oben</a> 21.03.2026</div>
      <div><a href="/impressum">Impressum</a></div>
    </div>`;
    const events = nrzpScraper.parse({ url: URL, html }, context);
    expect(events).toEqual([
      {
        title: "Noise Abend",
        dateStart: new Date("2026-03-19T23:00:00.000Z"),
        location: "Nr.z.P. Bielefeld",
        category: "Subkultur",
        imageUrl: "",
        source: "nrzp",
        url: "https://nrzp.de/programm/noise-abend",
        tags: [],
      },
    ]);
  });
});
