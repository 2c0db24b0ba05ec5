/**
 * NW.de publishes editorial articles about events in Ostwestfalen-Lippe.
 * Listing pages only link to articles; date, venue and price sit in the
 * article body, usually in an info box like
 *
 *   Samstag, 7.3., 21 Uhr, Hechelei, Bielefeld;
 *   Karten (ab 52,50 €): ...
 *
 * The city comes from that box or from the article text, not the URL.
 */
import * as cheerio from "cheerio";
import owlCities from "../data/owl-cities.json";
import type { ParseContext, RawEvent, Scraper } from "../types";
import {
  inferYear,
  isValidDateParts,
  lookupGermanMonth,
  parseEventDateInZone,
  toEventDate,
} from "../germanDate";
import { extractImage } from "../extract/fields";
import { blockText, cleanText, resolveUrl, truncate } from "../extract/text";
import { fetchPages } from "../fetchPages";
import { startOfDayInTimeZone } from "../timezone";

const BASE_URL = "https://www.nw.de";
const KULTUR_PAGES = 3;
const MAX_ARTICLES = 60;
const DESCRIPTION_LENGTH = 300;

export const OWL_CITIES: readonly string[] = owlCities;

const WEEKDAY = "(?:Montag|Dienstag|Mittwoch|Donnerstag|Freitag|Samstag|Sonntag)";
const MONTH_WORD = "([A-Za-zÄÖÜäöüß]+)";

/** "Freitag, 6.3., 19.30 Uhr, Heristo Arena, Halle;" */
const RE_INFO_BOX = new RegExp(
  `${WEEKDAY}[,\\s]+(\\d{1,2})\\.(\\d{1,2})\\.[,\\s]+(\\d{1,2})(?:\\.(\\d{2}))?\\s*Uhr` +
    `[,\\s]+([^,;.]+)[,\\s]+([^,;.\\n]+?)\\s*[;.\\n]`,
  "gi"
);

/** "Freitag, 6. März 2026, 19.30 Uhr" */
const RE_WEEKDAY_FULL = new RegExp(
  `${WEEKDAY}[,\\s]+(\\d{1,2})\\.\\s*${MONTH_WORD}\\s+(\\d{4})` +
    `(?:[,\\s]+(?:um\\s+)?(\\d{1,2})(?:[:.](\\d{2}))?\\s*Uhr)?`,
  "i"
);

/** "am 6. April 2026", "Beginn: 20.03.2026 19:30" */
const RE_KEYWORD_DATES = [
  /(?:am|Ab|Beginn|Start|Einlass)[:\s]+(\d{1,2}\.\s*[A-Za-zÄÖÜäöüß]+\s+\d{4}(?:[,\s]+(?:um\s+)?\d{1,2}[:.]\d{2}\s*(?:Uhr)?)?)/i,
  /(?:am|Ab|Beginn|Start|Einlass)[:\s]+(\d{1,2}\.\d{1,2}\.\d{4}(?:\s+\d{1,2}[:.]\d{2})?)/i,
];

const RE_MONTH_DATE = new RegExp(
  `(\\d{1,2})\\.\\s*${MONTH_WORD}\\s+(\\d{4})(?:[,\\s]+(?:um\\s+)?(\\d{1,2})[:.](\\d{2})\\s*(?:Uhr)?)?`,
  "g"
);

const RE_KARTEN_PRICE = /Karten\s*\(([^)]+?(\d+[,.]\d{2})\s*€)\)/;
const RE_PRICE = /((?:ab|Ab)\s+)?(\d+[,.]\d{2})\s*(?:Euro|€)/;

const RE_VENUE =
  /(?:in der|im|Ort:|Veranstaltungsort:)\s+((?:[A-ZÄÖÜ][a-zäöüß]+[\s-]*){1,4}(?:Halle|Forum|Theater|Museum|Stadion|Arena|Park|Kirche|Zentrum|Haus))/;

const CATEGORY_KEYWORDS: ReadonlyArray<readonly [string, string]> = [
  ["konzert", "Konzert"],
  ["comedy", "Comedy"],
  ["kabarett", "Comedy"],
  ["theater", "Theater"],
  ["musical", "Musical"],
  ["oper", "Oper"],
  ["kino", "Kino"],
  ["film", "Kino"],
  ["party", "Party"],
  ["festival", "Festival"],
  ["lesung", "Lesung"],
  ["ausstellung", "Ausstellung"],
  ["kunst", "Kunst"],
];

export function listingUrls(): string[] {
  const urls = [`${BASE_URL}/events`, `${BASE_URL}/events/city/bielefeld`];
  for (let page = 1; page <= KULTUR_PAGES; page++) {
    const path = "/nachrichten/kultur/kultur";
    urls.push(page > 1 ? `${BASE_URL}${path}?em_index_page=${page}` : `${BASE_URL}${path}`);
  }
  return urls;
}

/** Article links (`/nachrichten/.../12345678_Title.html`) in document order, unique. */
export function collectArticleUrls(html: string, baseUrl = BASE_URL): string[] {
  const $ = cheerio.load(html);
  const urls: string[] = [];
  $("a[href]").each((_, el) => {
    const href = $(el).attr("href")?.trim() ?? "";
    if (!href.includes("/nachrichten/") || !href.endsWith(".html")) return;
    const full = resolveUrl(href, baseUrl);
    if (!urls.includes(full)) urls.push(full);
  });
  return urls;
}

/** Events that ended before yesterday are stale articles. */
function cutoffFor(context: ParseContext): Date {
  return new Date(startOfDayInTimeZone(context.now, context.timeZone).getTime() - 86_400_000);
}

export interface InfoBox {
  date: Date;
  venue: string;
  city: string;
}

/** First info box whose (year-inferred) date is not in the past. */
export function parseInfoBox(text: string, context: ParseContext): InfoBox | null {
  const cutoff = cutoffFor(context);
  for (const m of text.matchAll(RE_INFO_BOX)) {
    const parts = inferYear(
      { day: Number(m[1]), month: Number(m[2]), hour: Number(m[3]), minute: m[4] ? Number(m[4]) : 0 },
      context.now,
      undefined,
      context.timeZone
    );
    if (!parts) continue;
    const date = toEventDate(parts, context.timeZone);
    if (date < cutoff) continue;
    return { date, venue: m[5].trim(), city: m[6].trim() };
  }
  return null;
}

/** "Karten (ab 52,50 €)" → "ab 52,50 Euro"; then any "ab 18,00 Euro". */
export function findPrice(text: string): string {
  const karten = text.match(RE_KARTEN_PRICE);
  if (karten) return karten[1].replace("€", "Euro").trim();
  const plain = text.match(RE_PRICE);
  if (plain) return `${plain[1] ?? ""}${plain[2]} Euro`.trim();
  return "";
}

function monthMatchToDate(
  day: string,
  monthName: string,
  year: string,
  hour: string | undefined,
  minute: string | undefined,
  timeZone: string
): Date | null {
  const month = lookupGermanMonth(monthName);
  if (!month) return null;
  const parts = {
    year: Number(year),
    month,
    day: Number(day),
    hour: hour ? Number(hour) : 0,
    minute: minute ? Number(minute) : 0,
  };
  return isValidDateParts(parts) ? toEventDate(parts, timeZone) : null;
}

/**
 * Event date from free text when there is no info box: weekday with full
 * date, then a keyword ("am", "Beginn") before a date, then any future
 * month-name date. Publication dates in the past are skipped.
 */
export function findEventDate(text: string, context: ParseContext): Date | null {
  const cutoff = cutoffFor(context);
  const tz = context.timeZone;

  const weekday = text.match(RE_WEEKDAY_FULL);
  if (weekday) {
    const date = monthMatchToDate(weekday[1], weekday[2], weekday[3], weekday[4], weekday[5], tz);
    if (date && date >= cutoff) return date;
  }

  for (const re of RE_KEYWORD_DATES) {
    const m = text.match(re);
    if (!m) continue;
    const date = parseEventDateInZone(m[1], tz);
    if (date && date >= cutoff) return date;
  }

  for (const m of text.matchAll(RE_MONTH_DATE)) {
    const date = monthMatchToDate(m[1], m[2], m[3], m[4], m[5], tz);
    if (date && date >= cutoff) return date;
  }
  return null;
}

export function findCity(title: string, body: string, fallback: string): string {
  const combined = `${title} ${body.slice(0, 2000)}`;
  return OWL_CITIES.find((city) => combined.includes(city)) ?? fallback;
}

export function findVenue(text: string): string {
  return text.match(RE_VENUE)?.[1].trim() ?? "";
}

export function categoryFor(keywords: string, text: string): string {
  const combined = `${keywords} ${text.slice(0, 500)}`.toLowerCase();
  return CATEGORY_KEYWORDS.find(([keyword]) => combined.includes(keyword))?.[1] ?? "Kultur";
}

function articleDescription($: cheerio.CheerioAPI): string {
  const meta = $('meta[name="description"]').attr("content")?.trim();
  if (meta) return truncate(meta, DESCRIPTION_LENGTH);
  const $paragraphs = $("article p, .article-body p, main p");
  for (let i = 0; i < $paragraphs.length; i++) {
    const text = cleanText($paragraphs.eq(i).text());
    if (text.length > 20) return truncate(text, DESCRIPTION_LENGTH);
  }
  return "";
}

function articleImage($: cheerio.CheerioAPI): string {
  const og = $('meta[property="og:image"]').attr("content")?.trim();
  if (og) return og;
  return extractImage($("article, main").first(), BASE_URL);
}

/** One article page → at most one event. */
export function parseArticle(html: string, url: string, context: ParseContext): RawEvent | null {
  const $ = cheerio.load(html);
  const title = cleanText($("h1, .article-title, .headline, [itemprop='headline']").first().text());
  if (title.length < 5) return null;

  const $body = $("article, .article-body, .article-content, .story-body, main").first();
  const bodyText = $body.length ? blockText($body) : blockText($.root());

  const common = {
    title,
    source: "nw_events",
    url,
    description: articleDescription($),
    category: categoryFor($('meta[name="keywords"]').attr("content") ?? "", bodyText),
    imageUrl: articleImage($),
    price: findPrice(bodyText),
  };

  const info = parseInfoBox(bodyText, context);
  if (info) {
    return { ...common, dateStart: info.date, location: info.venue, city: info.city };
  }

  const dateStart = findEventDate(bodyText, context);
  if (!dateStart) return null;
  return {
    ...common,
    dateStart,
    location: findVenue(bodyText),
    city: findCity(title, bodyText, context.city),
  };
}

export const nwEventsScraper: Scraper = {
  id: "nw_events",
  name: "Neue Westfälische",
  baseUrl: BASE_URL,

  /** Listing pages first, then up to MAX_ARTICLES linked articles. */
  async fetch(client) {
    const listings = await fetchPages(client, listingUrls(), "nw_events");
    const articleUrls: string[] = [];
    for (const listing of listings) {
      for (const url of collectArticleUrls(listing.html)) {
        if (!articleUrls.includes(url)) articleUrls.push(url);
      }
    }
    console.info(`[scrape] nw_events: ${articleUrls.length} article links`);
    return fetchPages(client, articleUrls.slice(0, MAX_ARTICLES), "nw_events");
  },

  parse(doc, context) {
    const event = parseArticle(doc.html, doc.url, context);
    return event ? [event] : [];
  },
};
