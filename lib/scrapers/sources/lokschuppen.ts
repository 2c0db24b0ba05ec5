import * as cheerio from "cheerio";
import type { Element } from "domhandler";
import type { ParseContext, RawEvent, Scraper, SourceDocument } from "../types";
import { parseEventDateInZone } from "../germanDate";
import { jsonLdStrategy } from "../extract/cards";
import { extractImage, findFirst } from "../extract/fields";
import { blockText, cleanText, resolveUrl } from "../extract/text";

const BASE_URL = "https://www.lokschuppen-bielefeld.de";
const EVENTS_URL = `${BASE_URL}/event/`;
const FALLBACK_URL = `${BASE_URL}/veranstaltungen/`;
const VENUE = "Lokschuppen Bielefeld";

const ARCHIVE = ".events-archive, .events-grid";
const RE_DAY = /(\d{1,2}\.\d{1,2}\.\d{4})/;
const RE_STATUS_SUFFIX = /(?:Tickets\s*kaufen|Ausverkauft|Abgesagt|Nur Abendkasse|Verschoben.*?)$/i;

export function countArchiveEvents(html: string): number {
  const $ = cheerio.load(html);
  return $(ARCHIVE).first().find("div.event").length;
}

function parseEventDiv($card: cheerio.Cheerio<Element>, context: ParseContext): RawEvent | null {
  const $titleDiv = $card.find("span.details").first().find("div").first();
  if (!$titleDiv.length) return null;

  // Title and date share one block: "Title\n01.03.2026\nTickets kaufen"
  const fullText = cleanText(blockText($titleDiv));
  if (!fullText) return null;
  const dateMatch = fullText.match(RE_DAY);
  const title = dateMatch ? fullText.slice(0, dateMatch.index).trim() : fullText;
  if (title.length < 2) return null;

  const dateStart =
    (dateMatch ? parseEventDateInZone(dateMatch[1], context.timeZone) : null) ??
    parseEventDateInZone(blockText($card), context.timeZone);
  if (!dateStart) return null;

  let description = "";
  if (dateMatch) {
    const afterDate = fullText
      .slice((dateMatch.index ?? 0) + dateMatch[0].length)
      .trim()
      .replace(RE_STATUS_SUFFIX, "")
      .trim();
    if (afterDate && afterDate !== title) description = afterDate;
  }

  const $link = findFirst($card, ["a.img, a[href*='/event/']", "a[href]"]);
  return {
    title,
    dateStart,
    description,
    location: VENUE,
    imageUrl: extractImage($card, BASE_URL),
    source: "lokschuppen",
    url: resolveUrl($link?.attr("href"), BASE_URL),
  };
}

function parseArchive(doc: SourceDocument, context: ParseContext): RawEvent[] {
  const $ = cheerio.load(doc.html);
  const events: RawEvent[] = [];
  $(ARCHIVE)
    .first()
    .find("div.event")
    .each((_, el) => {
      const event = parseEventDiv($(el), context);
      if (event) events.push(event);
    });
  return events;
}

export const lokschuppenScraper: Scraper = {
  id: "lokschuppen",
  name: "Lokschuppen Bielefeld",
  baseUrl: BASE_URL,
  dedupeAcrossDocuments: true,

  /** The event archive; the JSON-LD listing only when the archive is empty or unreachable. */
  async fetch(client) {
    const docs: SourceDocument[] = [];
    try {
      const html = await client.fetchHtml(EVENTS_URL);
      docs.push({ url: EVENTS_URL, html });
      if (countArchiveEvents(html) > 0) return docs;
    } catch (e) {
      console.warn(`[scrape] lokschuppen: ${EVENTS_URL} failed:`, e instanceof Error ? e.message : String(e));
    }
    docs.push({ url: FALLBACK_URL, html: await client.fetchHtml(FALLBACK_URL) });
    return docs;
  },

  parse(doc, context) {
    if (doc.url === FALLBACK_URL) {
      return jsonLdStrategy({
        source: "lokschuppen",
        baseUrl: BASE_URL,
        timeZone: context.timeZone,
        location: VENUE,
      })(cheerio.load(doc.html));
    }
    return parseArchive(doc, context);
  },
};
