import * as cheerio from "cheerio";
import type { Scraper } from "../types";
import { cardStrategy, firstNonEmpty, jsonLdStrategy } from "../extract/cards";
import { fetchPage } from "../fetchPages";

const BASE_URL = "https://kulturamt-bielefeld.de";
const CALENDAR_URL = `${BASE_URL}/kultur-erleben/veranstaltungskalender/`;
const DEFAULT_CATEGORY = "Kultur";

export const kulturamtScraper: Scraper = {
  id: "kulturamt",
  name: "Kulturamt Bielefeld",
  baseUrl: BASE_URL,

  async fetch(client) {
    return fetchPage(client, CALENDAR_URL);
  },

  parse(doc, context) {
    const $ = cheerio.load(doc.html);
    return firstNonEmpty($, [
      cardStrategy({
        source: "kulturamt",
        baseUrl: BASE_URL,
        context,
        containers: [
          "article, .event-item, .event-card, .event, .veranstaltung, .termin, [class*='event'], " +
            "[class*='veranstaltung'], [class*='termin'], .card, .entry, .list-item, .teaser",
        ],
        title: ["h2, h3, h4, .title, .titel, [class*='title'], [class*='titel'], a[href]"],
        date: ["time, .datum, .date, [class*='date'], [class*='datum']"],
        description: ["p, .beschreibung, .text, .description, [class*='desc'], [class*='text']"],
        category: [".kategorie, .category, [class*='category'], [class*='kategorie']"],
        defaultCategory: DEFAULT_CATEGORY,
      }),
      jsonLdStrategy({
        source: "kulturamt",
        baseUrl: BASE_URL,
        timeZone: context.timeZone,
        category: DEFAULT_CATEGORY,
      }),
    ]);
  },
};
