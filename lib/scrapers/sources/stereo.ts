import * as cheerio from "cheerio";
import type { Scraper } from "../types";
import { cardStrategy, firstNonEmpty, jsonLdStrategy } from "../extract/cards";
import { fetchPage } from "../fetchPages";

const BASE_URL = "https://stereo-bielefeld.de";
const PROGRAM_URL = `${BASE_URL}/programm/`;
const VENUE = "Stereo Bielefeld";

export const stereoScraper: Scraper = {
  id: "stereo",
  name: "Stereo Bielefeld",
  baseUrl: BASE_URL,

  async fetch(client) {
    return fetchPage(client, PROGRAM_URL);
  },

  parse(doc, context) {
    const $ = cheerio.load(doc.html);
    return firstNonEmpty($, [
      jsonLdStrategy({
        source: "stereo",
        baseUrl: BASE_URL,
        timeZone: context.timeZone,
        location: VENUE,
        category: "Party",
        maxDescription: 500,
      }),
      cardStrategy({
        source: "stereo",
        baseUrl: BASE_URL,
        context,
        containers: ["article, .event-item, .event-card, .event, [class*='event'], .card, .entry"],
        title: ["h2, h3, h4, .title, a[href]"],
        date: ["time, .date, .datum, [class*='date']"],
        category: false,
        defaultCategory: "Party",
        fixedLocation: VENUE,
      }),
    ]);
  },
};
