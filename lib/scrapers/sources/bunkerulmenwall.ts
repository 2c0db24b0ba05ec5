import * as cheerio from "cheerio";
import type { Element } from "domhandler";
import type { Scraper } from "../types";
import { cardStrategy, firstNonEmpty, jsonLdStrategy } from "../extract/cards";
import { cleanText } from "../extract/text";
import { fetchPage } from "../fetchPages";

const BASE_URL = "https://bunker-ulmenwall.org";
const VENUE = "Bunker Ulmenwall";
const DEFAULT_CATEGORY = "Kultur";

/** Genre line such as `Jazz | Improvisation`: the first genre is the category. */
export function genreFromCard($card: cheerio.Cheerio<Element>): string {
  const $paragraphs = $card.find("p");
  for (let i = 0; i < $paragraphs.length; i++) {
    const text = cleanText($paragraphs.eq(i).text());
    if (text.includes("|") && text.length < 100) {
      return text.split("|")[0].trim();
    }
  }
  return "";
}

export const bunkerUlmenwallScraper: Scraper = {
  id: "bunker_ulmenwall",
  name: "Bunker Ulmenwall",
  baseUrl: BASE_URL,

  async fetch(client) {
    return fetchPage(client, BASE_URL);
  },

  parse(doc, context) {
    const $ = cheerio.load(doc.html);
    return firstNonEmpty($, [
      cardStrategy({
        source: "bunker_ulmenwall",
        baseUrl: BASE_URL,
        context,
        containers: [
          ".kb-post-list-item, article, .event-item, .event, [class*='event'], " +
            "[class*='post-list-item'], .entry, .card, li.wp-block-post",
        ],
        title: ["h2, h3, h4, .title, .entry-title, [class*='title'], a[href]"],
        date: ["time, .date, .datum, [class*='date'], [class*='datum']"],
        description: ["p, .description, .excerpt, [class*='desc'], [class*='excerpt']"],
        category: false,
        fixedLocation: VENUE,
        refine: (event, $card) => ({ ...event, category: genreFromCard($card) || DEFAULT_CATEGORY }),
      }),
      jsonLdStrategy({
        source: "bunker_ulmenwall",
        baseUrl: BASE_URL,
        timeZone: context.timeZone,
        fixedLocation: VENUE,
        category: DEFAULT_CATEGORY,
      }),
    ]);
  },
};
