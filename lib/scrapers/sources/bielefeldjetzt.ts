import * as cheerio from "cheerio";
import type { Scraper } from "../types";
import { cardStrategy } from "../extract/cards";
import { fetchPage } from "../fetchPages";

const BASE_URL = "https://bielefeld-jetzt.de";
const EVENTS_URL = `${BASE_URL}/events`;

export const bielefeldJetztScraper: Scraper = {
  id: "bielefeld_jetzt",
  name: "Bielefeld Jetzt",
  baseUrl: BASE_URL,

  async fetch(client) {
    return fetchPage(client, EVENTS_URL);
  },

  parse(doc, context) {
    const $ = cheerio.load(doc.html);
    return cardStrategy({
      source: "bielefeld_jetzt",
      baseUrl: BASE_URL,
      context,
      containers: ["article.event, .event-item, .event-card"],
      title: ["h2, h3, .event-title, .title"],
      date: ["time, .event-date, .date"],
      description: ["p, .event-description, .description"],
      category: [".event-category, .category, .tag"],
    })($);
  },
};
