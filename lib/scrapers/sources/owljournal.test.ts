import { describe, it, expect } from "vitest";
import { owlJournalScraper } from "./owljournal";
import type { ParseContext } from "../types";

const context: ParseContext = {
  now: new Date("2026-03-01T12:00:00Z"),
  timeZone: "Europe/Berlin",
  city: "Bielefeld",
};

const HTML = `<html><body>
<article>
  <h2 class="entry-title"><a href="https://www.owl-journal.de/event/kunstnacht/">Kunstnacht</a></h2>
  <div class="datum">Samstag, 28. März 2026</div>
  <div class="entry-summary">Galerien öffnen bis Mitternacht.</div>
  <span class="ort">Kunsthalle Bielefeld</span>
  <span class="category">Kunst</span>
</article>
<article><h2>Ohne Termin</h2></article>
</body></html>`;

describe("OWL Journal scraper", () => {
  it("parses article cards without a category", () => {
    const events = owlJournalScraper.parse(
      { url: "https://www.owl-journal.de/veranstaltungen/bielefeld/", html: HTML },
      context
    );
    expect(events).toHaveLength(1);
    expect(events[0]).toMatchObject({
      title: "Kunstnacht",
      url: "https://www.owl-journal.de/event/kunstnacht/",
      description: "Galerien öffnen bis Mitternacht.",
      location: "Kunsthalle Bielefeld",
      category: "",
      source: "owl_journal",
    });
    expect(events[0]!.dateStart!.toISOString()).toBe("2026-03-27T23:00:00.000Z");
  });
});
