import * as cheerio from "cheerio";
import type { Scraper } from "../types";
import { cardStrategy, firstNonEmpty, jsonLdStrategy, type CardSpec } from "../extract/cards";
import { fetchPages } from "../fetchPages";

const BASE_URL = "https://www.bielefeld-marketing.de";
const PATHS = ["/events", "/termine/tickets"];

const GENERIC_CONTAINERS =
  "article, .event-item, .event-card, .event, .veranstaltung, .termin, .termin-item, " +
  "[class*='event'], [class*='veranstaltung'], .card, .list-item, .teaser";

export const bielefeldMarketingScraper: Scraper = {
  id: "bielefeld_marketing",
  name: "Bielefeld Marketing",
  baseUrl: BASE_URL,
  dedupeAcrossDocuments: true,

  async fetch(client) {
    return fetchPages(
      client,
      PATHS.map((path) => `${BASE_URL}${path}`),
      "bielefeld_marketing"
    );
  },

  parse(doc, context) {
    const $ = cheerio.load(doc.html);
    const card: Omit<CardSpec, "containers"> = {
      source: "bielefeld_marketing",
      baseUrl: BASE_URL,
      context,
      // Headings before field wrappers; a wrapping link is the last resort.
      title: ["h2, h3, h4", ".titel, .title, [class*='title'], [class*='titel']", "a[href]"],
      date: ["time, .datum, .date, [class*='date'], [class*='datum']"],
      description: ["p, .beschreibung, .text, .teaser-text, [class*='desc'], [class*='text']"],
      category: [".kategorie, .category, [class*='category'], [class*='kategorie']"],
      imageInParent: true,
    };
    return firstNonEmpty($, [
      cardStrategy({ ...card, containers: [".veranstaltung.masonry-view-item"] }),
      cardStrategy({ ...card, containers: [GENERIC_CONTAINERS] }),
      jsonLdStrategy({ source: "bielefeld_marketing", baseUrl: BASE_URL, timeZone: context.timeZone }),
    ]);
  },
};
