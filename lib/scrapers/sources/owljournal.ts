import * as cheerio from "cheerio";
import type { Scraper } from "../types";
import { cardStrategy } from "../extract/cards";
import { fetchPage } from "../fetchPages";

const BASE_URL = "https://www.owl-journal.de";
const LISTING_URL = `${BASE_URL}/veranstaltungen/bielefeld/`;

export const owlJournalScraper: Scraper = {
  id: "owl_journal",
  name: "OWL Journal",
  baseUrl: BASE_URL,

  async fetch(client) {
    return fetchPage(client, LISTING_URL);
  },

  parse(doc, context) {
    const $ = cheerio.load(doc.html);
    return cardStrategy({
      source: "owl_journal",
      baseUrl: BASE_URL,
      context,
      containers: ["article, .event-item, .veranstaltung"],
      title: ["h2, h3, .entry-title, .title"],
      date: ["time, .event-date, .date, .datum"],
      description: ["p, .entry-summary, .excerpt"],
      category: false,
    })($);
  },
};
