import * as cheerio from "cheerio";
import type { Element } from "domhandler";
import type { ParseContext, RawEvent, Scraper } from "../types";
import { isValidDateParts, parseEventDateInZone, toEventDate } from "../germanDate";
import { extractLocation } from "../extract/fields";
import { blockText, cleanText, resolveUrl } from "../extract/text";
import { fetchPages } from "../fetchPages";

const BASE_URL = "https://www.buo-bielefeld.de";
const PATHS = ["/theater/kalender", "/philharmoniker/kalender"];

const EVENT_LINK = 'a[href*="/theater/veranstaltung/"], a[href*="/philharmoniker/veranstaltung/"]';
const DEFAULT_VENUE = "Theater Bielefeld";
const DEFAULT_CATEGORY = "Theater & Musik";

/** `So., 01.03.2026 19:30 Uhr` */
const RE_BUO_DATE = /(?:Mo|Di|Mi|Do|Fr|Sa|So)\.,?\s*(\d{1,2})\.(\d{1,2})\.(\d{4})\s+(\d{1,2}):(\d{2})\s*(?:Uhr)?/i;

export function parseBuoDate(text: string, timeZone: string): Date | null {
  const m = text.match(RE_BUO_DATE);
  if (m) {
    const parts = {
      year: Number(m[3]),
      month: Number(m[2]),
      day: Number(m[1]),
      hour: Number(m[4]),
      minute: Number(m[5]),
    };
    if (isValidDateParts(parts)) return toEventDate(parts, timeZone);
  }
  return parseEventDateInZone(text, timeZone);
}

/** Grids that wrap more than one event are layout containers, not events. */
function isLeafEventGrid($: cheerio.CheerioAPI, $grid: cheerio.Cheerio<Element>): boolean {
  if (!$grid.find(EVENT_LINK).length) return false;
  const inner = $grid.find("div.grid").filter((_, el) => $(el).find('a[href*="/veranstaltung/"]').length > 0);
  return inner.length <= 1;
}

function parseGrid(
  $: cheerio.CheerioAPI,
  $grid: cheerio.Cheerio<Element>,
  context: ParseContext
): RawEvent | null {
  const $titleLink = $grid.find('h2 a[href*="/veranstaltung/"]').first();
  const title = cleanText($titleLink.text());
  if (title.length < 3) return null;

  const dateStart = parseBuoDate(blockText($grid), context.timeZone);
  if (!dateStart) return null;

  const tags: string[] = [];
  $grid.find("ul li").each((_, li) => {
    const text = cleanText($(li).text());
    if (text && text.length < 30) tags.push(text);
  });

  return {
    title,
    dateStart,
    description: cleanText($grid.find("h3").first().text()),
    location: extractLocation($, $grid) || DEFAULT_VENUE,
    category: tags.length ? tags.join(" / ") : DEFAULT_CATEGORY,
    source: "buo",
    url: resolveUrl($titleLink.attr("href"), BASE_URL),
  };
}

export const buoScraper: Scraper = {
  id: "buo",
  name: "Bühnen und Orchester Bielefeld",
  baseUrl: BASE_URL,
  dedupeAcrossDocuments: true,

  async fetch(client) {
    return fetchPages(
      client,
      PATHS.map((path) => `${BASE_URL}${path}`),
      "buo"
    );
  },

  parse(doc, context) {
    const $ = cheerio.load(doc.html);
    const events: RawEvent[] = [];
    $("div.grid").each((_, el) => {
      const $grid = $(el);
      if (!isLeafEventGrid($, $grid)) return;
      const event = parseGrid($, $grid, context);
      if (event) events.push(event);
    });
    return events;
  },
};
