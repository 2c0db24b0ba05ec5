import type { PageFetcher, SourceDocument } from "./types";

/**
 * Fetch several pages of one source. A failing page is logged and skipped;
 * only when every page fails is the last error rethrown.
 */
export async function fetchPages(
  client: PageFetcher,
  urls: readonly string[],
  sourceId: string
): Promise<SourceDocument[]> {
  const docs: SourceDocument[] = [];
  let lastError: unknown = null;
  for (const url of urls) {
    try {
      docs.push({ url, html: await client.fetchHtml(url) });
    } catch (e) {
      lastError = e;
      console.warn(`[scrape] ${sourceId}: ${url} failed:`, e instanceof Error ? e.message : String(e));
    }
  }
  if (docs.length === 0 && lastError !== null) throw lastError;
  return docs;
}

/** Single-page sources. */
export async function fetchPage(client: PageFetcher, url: string): Promise<SourceDocument[]> {
  return [{ url, html: await client.fetchHtml(url) }];
}
