/**
 * schema.org Event data from JSON-LD blocks. Sites embed these next to (or
 * instead of) their visible listings; they are the fallback when no event
 * containers match.
 */
import * as cheerio from "cheerio";
import { JSON_LD_EVENT_TYPES } from "@/types";
import { parseEventDateInZone } from "./germanDate";
import { cleanText, resolveUrl, stripTags, truncate } from "./extract/text";
import type { RawEvent } from "./types";

export type JsonLdNode = Record<string, unknown>;

const EVENT_TYPES = new Set<string>(JSON_LD_EVENT_TYPES);

function isObject(value: unknown): value is JsonLdNode {
  return value != null && typeof value === "object" && !Array.isArray(value);
}

function asString(value: unknown): string {
  return typeof value === "string" ? value.trim() : "";
}

function isEventNode(obj: JsonLdNode): boolean {
  const type = obj["@type"];
  if (typeof type === "string") return EVENT_TYPES.has(type);
  if (Array.isArray(type)) return type.some((t) => EVENT_TYPES.has(String(t)));
  return false;
}

function collectEvents(value: unknown, out: JsonLdNode[]): void {
  if (Array.isArray(value)) {
    for (const item of value) collectEvents(item, out);
    return;
  }
  if (!isObject(value)) return;
  if (isEventNode(value)) out.push(value);
  const graph = value["@graph"];
  if (Array.isArray(graph)) collectEvents(graph, out);
}

/** Drop commas right before a closing bracket: `{"name":"X",}`. */
export function sanitizeJsonLd(raw: string): string {
  return raw
    .trim()
    .replace(/^<!\[CDATA\[|\]\]>$/g, "")
    .replace(/,(\s*[}\]])/g, "$1");
}

/** Parse one block; malformed JSON yields null. */
export function parseJsonLdBlock(raw: string): unknown {
  try {
    return JSON.parse(sanitizeJsonLd(raw));
  } catch {
    return null;
  }
}

/** Every Event-typed node of every ld+json block, in document order. */
export function extractJsonLdEvents(source: string | cheerio.CheerioAPI): JsonLdNode[] {
  const $ = typeof source === "string" ? cheerio.load(source) : source;
  const events: JsonLdNode[] = [];
  $('script[type="application/ld+json"]').each((_, el) => {
    const parsed = parseJsonLdBlock($(el).text());
    if (parsed !== null) collectEvents(parsed, events);
  });
  return events;
}

/**
 * Title: event name, then first performer name.
 */
export function titleFromJsonLdEvent(ld: JsonLdNode): string {
  const name = stripTags(asString(ld.name));
  if (name.length > 1) return name;
  const performer = Array.isArray(ld.performer) ? ld.performer[0] : ld.performer;
  if (isObject(performer)) return cleanText(asString(performer.name));
  return "";
}

function joinAddress(address: unknown): string {
  if (typeof address === "string") return cleanText(address);
  if (!isObject(address)) return "";
  return [address.name, address.streetAddress, address.addressLocality]
    .map((part) => cleanText(asString(part)))
    .filter(Boolean)
    .join(", ");
}

/**
 * Location as text. Accepts a string, `{name, address}` (address string or
 * PostalAddress-like object) or an array (first element).
 */
export function jsonLdLocation(value: unknown): string {
  if (Array.isArray(value)) return value.length > 0 ? jsonLdLocation(value[0]) : "";
  if (typeof value === "string") return cleanText(value);
  if (!isObject(value)) return "";
  const name = cleanText(asString(value.name));
  return name || joinAddress(value.address);
}

/** Image URL from a string, an array or an ImageObject. */
export function jsonLdImage(value: unknown): string {
  if (Array.isArray(value)) return value.length > 0 ? jsonLdImage(value[0]) : "";
  if (typeof value === "string") return value.trim();
  if (isObject(value)) return asString(value.url) || asString(value.contentUrl);
  return "";
}

export interface JsonLdRecordOptions {
  source: string;
  baseUrl: string;
  timeZone: string;
  /** Used when the node carries no location. */
  location?: string;
  /** Replaces the node's location entirely (single-venue sites). */
  fixedLocation?: string;
  category?: string;
  maxDescription?: number;
  tags?: string[];
}

/** Map Event nodes to raw events; nodes without a parseable start are skipped. */
export function jsonLdToRawEvents(nodes: JsonLdNode[], options: JsonLdRecordOptions): RawEvent[] {
  const events: RawEvent[] = [];
  for (const node of nodes) {
    const dateStart = parseEventDateInZone(asString(node.startDate), options.timeZone);
    if (!dateStart) continue;
    const description = stripTags(asString(node.description));
    events.push({
      title: titleFromJsonLdEvent(node),
      dateStart,
      dateEnd: parseEventDateInZone(asString(node.endDate), options.timeZone),
      description: options.maxDescription ? truncate(description, options.maxDescription) : description,
      location: options.fixedLocation ?? (jsonLdLocation(node.location) || options.location || ""),
      category: options.category ?? "",
      imageUrl: resolveUrl(jsonLdImage(node.image), options.baseUrl),
      source: options.source,
      url: resolveUrl(asString(node.url), options.baseUrl),
      tags: options.tags ? [...options.tags] : [],
    });
  }
  return events;
}
