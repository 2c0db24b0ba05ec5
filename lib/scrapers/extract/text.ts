import type * as cheerio from "cheerio";
import type { AnyNode } from "domhandler";

const BLOCK_TAGS = "p, div, li, dd, dt, tr, h1, h2, h3, h4, h5, h6, section, article, header, footer, address";

/** Collapse runs of whitespace and trim. */
export function cleanText(value: string | null | undefined): string {
  if (!value) return "";
  return value.replace(/\s+/g, " ").trim();
}

export function truncate(value: string, max: number): string {
  return value.length > max ? value.slice(0, max).trimEnd() : value;
}

/** Strip tags from an HTML fragment (JSON-LD descriptions carry markup). */
export function stripTags(value: string): string {
  return cleanText(value.replace(/<br\s*\/?>/gi, " ").replace(/<[^>]+>/g, " "));
}

/**
 * Resolve a link against the source's base: `//host/x` gets the scheme,
 * `/x` the origin, `x` the origin plus a slash.
 */
export function resolveUrl(href: string | null | undefined, baseUrl: string): string {
  const h = href?.trim() ?? "";
  if (!h) return "";
  if (/^https?:\/\//i.test(h)) return h;
  const base = new URL(baseUrl);
  if (h.startsWith("//")) return `${base.protocol}${h}`;
  if (h.startsWith("/")) return `${base.origin}${h}`;
  return `${base.origin}/${h}`;
}

/**
 * Element text with line breaks kept at <br> and block boundaries, one
 * cleaned line per row. Label scanning needs the breaks.
 */
export function blockText<T extends AnyNode>($el: cheerio.Cheerio<T>): string {
  const $clone = $el.clone();
  $clone.find("script, style").remove();
  $clone.find("br").replaceWith("\n");
  $clone.find(BLOCK_TAGS).prepend("\n").append("\n");
  return $clone
    .text()
    .split(/\r?\n/)
    .map((line) => cleanText(line))
    .filter(Boolean)
    .join("\n");
}
