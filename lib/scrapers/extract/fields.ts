import type * as cheerio from "cheerio";
import type { AnyNode, Element } from "domhandler";
import { parseEventDateInZone } from "../germanDate";
import { jsonLdLocation, parseJsonLdBlock } from "../jsonLdEvent";
import { CATEGORY_LABELS, LOCATION_LABELS, PRICE_LABELS, findLabeledValue } from "./labels";
import { blockText, cleanText, resolveUrl } from "./text";

type CheerioAPI = cheerio.CheerioAPI;
type CheerioEl<T extends AnyNode = AnyNode> = cheerio.Cheerio<T>;

export const LOCATION_SELECTORS = [
  ".event-location, .location, .venue, .ort, .veranstaltungsort, [itemprop='location']",
  "[class*='location'], [class*='venue']",
];

export const CATEGORY_SELECTORS = [
  ".event-category, .kategorie, .category, .tag",
  "[class*='category'], [class*='kategorie']",
];

export const PRICE_SELECTORS = [".price, .preis, .eintritt", "[class*='price'], [class*='preis']"];

export const DATE_SELECTORS = ["time, .event-date, .datum, .date", "[class*='date'], [class*='datum']"];

/**
 * Try selector lists in order; the first list with a match inside `$scope`
 * wins and its first element (document order) is returned.
 */
export function findFirst<T extends AnyNode>(
  $scope: CheerioEl<T>,
  selectorLists: readonly string[]
): CheerioEl<Element> | null {
  for (const selector of selectorLists) {
    const $match = $scope.find(selector).first();
    if ($match.length) return $match;
  }
  return null;
}

/** First non-empty cleaned text among the selector lists. */
export function findText<T extends AnyNode>(
  $scope: CheerioEl<T>,
  selectorLists: readonly string[],
  minLength = 1
): string {
  for (const selector of selectorLists) {
    const $all = $scope.find(selector);
    for (let i = 0; i < $all.length; i++) {
      const text = cleanText($all.eq(i).text());
      if (text.length >= minLength) return text;
    }
  }
  return "";
}

/** `datetime` attribute first, then the element text. */
export function parseDateElement<T extends AnyNode>($el: CheerioEl<T> | null, timeZone: string): Date | null {
  if (!$el || !$el.length) return null;
  const attr = $el.attr("datetime");
  if (attr) {
    const fromAttr = parseEventDateInZone(attr, timeZone);
    if (fromAttr) return fromAttr;
  }
  return parseEventDateInZone(cleanText($el.text()), timeZone);
}

/**
 * Venue of a card: structural selectors, then `Ort:`-style labels in the
 * card text, then a JSON-LD block inside the card.
 */
export function extractLocation<T extends AnyNode>($: CheerioAPI, $card: CheerioEl<T>): string {
  const structural = findText($card, LOCATION_SELECTORS, 2);
  if (structural) return structural;

  const labeled = findLabeledValue(blockText($card), LOCATION_LABELS);
  if (labeled) return labeled;

  const scripts = $card.find('script[type="application/ld+json"]');
  for (let i = 0; i < scripts.length; i++) {
    const parsed = parseJsonLdBlock($(scripts[i]).text());
    if (parsed && typeof parsed === "object" && "location" in parsed) {
      const location = jsonLdLocation(parsed.location);
      if (location) return location;
    }
  }
  return "";
}

/** Category text, then `Kategorie:`-style labels. Capped at 60 chars of structural text. */
export function extractCategory<T extends AnyNode>(
  $card: CheerioEl<T>,
  selectorLists: readonly string[] = CATEGORY_SELECTORS
): string {
  const structural = findText($card, selectorLists, 2);
  if (structural && structural.length <= 60) return structural;
  return findLabeledValue(blockText($card), CATEGORY_LABELS) ?? "";
}

export function extractPrice<T extends AnyNode>($card: CheerioEl<T>): string {
  const structural = findText($card, PRICE_SELECTORS, 1);
  if (structural) return structural;
  return findLabeledValue(blockText($card), PRICE_LABELS) ?? "";
}

const IMAGE_ATTRS = ["data-lazy-src", "data-src", "src"] as const;

function imageSource($img: CheerioEl<Element>): string {
  for (const attr of IMAGE_ATTRS) {
    const value = $img.attr(attr)?.trim();
    if (value && !value.startsWith("data:")) return value;
  }
  return "";
}

function firstImage<T extends AnyNode>($scope: CheerioEl<T>, baseUrl: string): string {
  const $imgs = $scope.find("img");
  for (let i = 0; i < $imgs.length; i++) {
    const src = imageSource($imgs.eq(i));
    if (src) return resolveUrl(src, baseUrl);
  }
  return "";
}

/** First image of the card, or of its parent when `checkParent` is set. */
export function extractImage<T extends AnyNode>($card: CheerioEl<T>, baseUrl: string, checkParent = false): string {
  const own = firstImage($card, baseUrl);
  if (own || !checkParent) return own;
  return firstImage($card.parent(), baseUrl);
}
