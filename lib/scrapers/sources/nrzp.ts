import * as cheerio from "cheerio";
import type { Element } from "domhandler";
import type { Scraper } from "../types";
import { cardStrategy, firstNonEmpty, jsonLdStrategy, linkStrategy } from "../extract/cards";
import { cleanText } from "../extract/text";
import { fetchPage } from "../fetchPages";

const BASE_URL = "https://nrzp.de";
const PROGRAM_URL = `${BASE_URL}/programm`;
const VENUE = "Nr.z.P. Bielefeld";
const DEFAULT_CATEGORY = "Subkultur";

/** Short label text (Elementor badges) used as the category. */
export function badgeCategory($card: cheerio.Cheerio<Element>): string {
  const $labels = $card.find("span, .category, [class*='category'], [class*='tag']");
  for (let i = 0; i < $labels.length; i++) {
    const text = cleanText($labels.eq(i).text());
    if (text && text.length < 30) return text;
  }
  return "";
}

export const nrzpScraper: Scraper = {
  id: "nrzp",
  name: "Nr.z.P.",
  baseUrl: BASE_URL,

  async fetch(client) {
    return fetchPage(client, PROGRAM_URL);
  },

  parse(doc, context) {
    const $ = cheerio.load(doc.html);
    return firstNonEmpty($, [
      cardStrategy({
        source: "nrzp",
        baseUrl: BASE_URL,
        context,
        containers: [
          "article, .event-item, .event-card, .event, [class*='event'], .elementor-post, " +
            ".card, .entry, .wp-block-post, .elementor-element a[href]",
        ],
        title: ["h2, h3, h4, .title, .event-title, [class*='title'], a[href]"],
        date: ["time, .date, .datum, [class*='date'], [class*='datum']"],
        description: ["p, .description, .text, [class*='desc']"],
        category: false,
        fixedLocation: VENUE,
        refine: (event, $card) => ({ ...event, category: badgeCategory($card) || DEFAULT_CATEGORY }),
      }),
      linkStrategy({
        source: "nrzp",
        baseUrl: BASE_URL,
        context,
        location: VENUE,
        category: DEFAULT_CATEGORY,
      }),
      jsonLdStrategy({
        source: "nrzp",
        baseUrl: BASE_URL,
        timeZone: context.timeZone,
        fixedLocation: VENUE,
        category: DEFAULT_CATEGORY,
      }),
    ]);
  },
};
