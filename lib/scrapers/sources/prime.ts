import * as cheerio from "cheerio";
import type { Element } from "domhandler";
import type { ParseContext, RawEvent, Scraper } from "../types";
import { inferYear, isValidDateParts, lookupGermanMonth, toEventDate, type EventDateParts } from "../germanDate";
import { extractImage, findFirst } from "../extract/fields";
import { cleanText, resolveUrl } from "../extract/text";
import { fetchPage } from "../fetchPages";

const BASE_URL = "https://www.prime-night.de";
const EVENTS_URL = `${BASE_URL}/events`;
const VENUE = "Prime Club Bielefeld";

/** Detail slugs end in the event date: `/events/ladies-night-06-03-2026`. */
const RE_SLUG_DATE = /-(\d{2})-(\d{2})-(\d{4})\/?$/;

export function dateFromSlug(href: string): EventDateParts | null {
  const m = href.match(RE_SLUG_DATE);
  if (!m) return null;
  const parts = { year: Number(m[3]), month: Number(m[2]), day: Number(m[1]), hour: 0, minute: 0 };
  return isValidDateParts(parts) ? parts : null;
}

/**
 * Calendar badge (day + short month) with the year from the slug, or
 * inferred from the reference date; the slug date alone as a fallback.
 */
export function snippetDate(dayText: string, monthText: string, href: string, context: ParseContext): Date | null {
  const slug = dateFromSlug(href);
  const day = Number.parseInt(dayText, 10);
  const month = lookupGermanMonth(monthText);
  if (Number.isInteger(day) && month) {
    const parts = slug
      ? { year: slug.year, month, day, hour: 0, minute: 0 }
      : inferYear({ day, month }, context.now, undefined, context.timeZone);
    if (parts && isValidDateParts(parts)) return toEventDate(parts, context.timeZone);
  }
  return slug ? toEventDate(slug, context.timeZone) : null;
}

function parseSnippet($card: cheerio.Cheerio<Element>, context: ParseContext): RawEvent | null {
  const title = cleanText(findFirst($card, ["h4.title, h4, h3.title"])?.text());
  if (title.length < 3) return null;

  const $link = findFirst($card, ['a[href*="/events/"]', "a[href]"]);
  const href = $link?.attr("href")?.trim() ?? "";

  const dateStart = snippetDate(
    cleanText($card.find(".event-date-cal-day").first().text()),
    cleanText($card.find(".event-date-cal-month").first().text()),
    href,
    context
  );
  if (!dateStart) return null;

  return {
    title,
    dateStart,
    location: VENUE,
    category: "Party",
    imageUrl: extractImage($card, BASE_URL),
    source: "prime",
    url: resolveUrl(href, BASE_URL),
  };
}

export const primeScraper: Scraper = {
  id: "prime",
  name: "Prime Club",
  baseUrl: BASE_URL,

  async fetch(client) {
    return fetchPage(client, EVENTS_URL);
  },

  parse(doc, context) {
    const $ = cheerio.load(doc.html);
    const events: RawEvent[] = [];
    $("div.event-snippet").each((_, el) => {
      const event = parseSnippet($(el), context);
      if (event) events.push(event);
    });
    return events;
  },
};
