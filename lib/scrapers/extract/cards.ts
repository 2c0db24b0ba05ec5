import type * as cheerio from "cheerio";
import type { Element } from "domhandler";
import { parseEventDateInZone } from "../germanDate";
import { extractJsonLdEvents, jsonLdToRawEvents, type JsonLdRecordOptions } from "../jsonLdEvent";
import type { ParseContext, RawEvent } from "../types";
import {
  DATE_SELECTORS,
  extractCategory,
  extractImage,
  extractLocation,
  extractPrice,
  findFirst,
  findText,
  parseDateElement,
} from "./fields";
import { blockText, cleanText, resolveUrl } from "./text";

type CheerioAPI = cheerio.CheerioAPI;

/** A strategy turns a loaded page into records; an empty result means "try the next one". */
export type Strategy = ($: CheerioAPI) => RawEvent[];

/** Run strategies in order and keep the first non-empty result. */
export function firstNonEmpty($: CheerioAPI, strategies: readonly Strategy[]): RawEvent[] {
  for (const strategy of strategies) {
    const events = strategy($);
    if (events.length > 0) return events;
  }
  return [];
}

export interface CardSpec {
  source: string;
  baseUrl: string;
  context: ParseContext;
  /** Container selector lists; the first list that matches anything is used. */
  containers: readonly string[];
  title: readonly string[];
  link?: readonly string[];
  date?: readonly string[];
  description?: readonly string[];
  /** Selector lists for the category; `false` skips category extraction. */
  category?: readonly string[] | false;
  /** Venue for single-venue sites; skips location extraction. */
  fixedLocation?: string;
  defaultCategory?: string;
  minTitleLength?: number;
  /** Look for the image in the card's parent too (masonry layouts). */
  imageInParent?: boolean;
  tags?: readonly string[];
  /** Per-source adjustments; return null to drop the card. */
  refine?: (event: RawEvent, $card: cheerio.Cheerio<Element>, $: CheerioAPI) => RawEvent | null;
}

export function selectContainers($: CheerioAPI, lists: readonly string[]): cheerio.Cheerio<Element> {
  for (const selector of lists) {
    const $found = $<Element, string>(selector);
    if ($found.length) return $found;
  }
  return $<Element, string>([]);
}

/**
 * Parse one event container: title, link, date (element, then whole card
 * text), description, venue, category, price and image.
 */
export function parseCard($: CheerioAPI, $card: cheerio.Cheerio<Element>, spec: CardSpec): RawEvent | null {
  const minTitle = spec.minTitleLength ?? 3;
  const $title = findFirst($card, spec.title);
  const title = cleanText($title?.text());
  if (title.length < minTitle) return null;

  const $link = findFirst($card, spec.link ?? ["a[href]"]);
  const url = resolveUrl($link?.attr("href"), spec.baseUrl);

  const tz = spec.context.timeZone;
  const dateStart =
    parseDateElement(findFirst($card, spec.date ?? DATE_SELECTORS), tz) ??
    parseEventDateInZone(blockText($card), tz);
  if (!dateStart) return null;

  const description = spec.description ? findText($card, spec.description, 1) : "";
  const location = spec.fixedLocation ?? extractLocation($, $card);
  const category =
    spec.category === false ? "" : extractCategory($card, spec.category);

  const event: RawEvent = {
    title,
    dateStart,
    description,
    location,
    category: category || spec.defaultCategory || "",
    imageUrl: extractImage($card, spec.baseUrl, spec.imageInParent),
    price: extractPrice($card),
    source: spec.source,
    url,
    tags: spec.tags ? [...spec.tags] : [],
  };
  return spec.refine ? spec.refine(event, $card, $) : event;
}

/** Structural strategy: every container parsed with the card spec. */
export function cardStrategy(spec: CardSpec): Strategy {
  return ($) => {
    const events: RawEvent[] = [];
    selectContainers($, spec.containers).each((_, el) => {
      const event = parseCard($, $(el), spec);
      if (event) events.push(event);
    });
    return events;
  };
}

/** JSON-LD strategy over every ld+json block of the page. */
export function jsonLdStrategy(options: JsonLdRecordOptions): Strategy {
  return ($) => jsonLdToRawEvents(extractJsonLdEvents($), options);
}

export interface LinkScanOptions {
  source: string;
  baseUrl: string;
  context: ParseContext;
  location?: string;
  category?: string;
}

/**
 * Link-only layouts: every anchor whose parent text holds a parseable date
 * becomes a minimal record (anchor text + date). Repeated texts are skipped.
 */
export function linkStrategy(options: LinkScanOptions): Strategy {
  return ($) => {
    const events: RawEvent[] = [];
    const seen = new Set<string>();
    $("a[href]").each((_, el) => {
      const $a = $(el);
      const href = $a.attr("href")?.trim() ?? "";
      if (!href || href === "#") return;
      const text = cleanText($a.text());
      if (text.length < 3 || seen.has(text)) return;

      const $parent = $a.parent();
      if (!$parent.length) return;
      const dateStart = parseEventDateInZone(blockText($parent), options.context.timeZone);
      if (!dateStart) return;

      seen.add(text);
      events.push({
        title: text,
        dateStart,
        location: options.location ?? "",
        category: options.category ?? "",
        imageUrl: extractImage($a, options.baseUrl),
        source: options.source,
        url: resolveUrl(href, options.baseUrl),
        tags: [],
      });
    });
    return events;
  };
}
