import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import { fetchPage, fetchPages } from "./fetchPages";
import { HttpError } from "./fetchHtml";
import type { PageFetcher } from "./types";

describe("fetchPages", () => {
  beforeEach(() => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("skips a failing page and keeps the others in order", async () => {
    const client: PageFetcher = {
      fetchHtml: vi.fn(async (url: string) => {
        if (url.endsWith("/2")) throw new HttpError(404, url);
        return `<p>${url}</p>`;
      }),
    };
    const docs = await fetchPages(client, ["https://x.test/1", "https://x.test/2", "https://x.test/3"], "x");
    expect(docs).toEqual([
      { url: "https://x.test/1", html: "<p>https://x.test/1</p>" },
      { url: "https://x.test/3", html: "<p>https://x.test/3</p>" },
    ]);
    expect(console.warn).toHaveBeenCalledWith(
      "[scrape] x: https://x.test/2 failed:",
      "HTTP 404: https://x.test/2"
    );
  });

  it("rethrows the last error when every page fails", async () => {
    const client: PageFetcher = {
      fetchHtml: async (url: string) => {
        throw new HttpError(500, url);
      },
    };
    await expect(fetchPages(client, ["https://x.test/a", "https://x.test/b"], "x")).rejects.toThrow(
      "HTTP 500: https://x.test/b"
    );
  });

  it("returns nothing for an empty url list", async () => {
    const client: PageFetcher = { fetchHtml: vi.fn(async () => "") };
    expect(await fetchPages(client, [], "x")).toEqual([]);
    expect(client.fetchHtml).not.toHaveBeenCalled();
  });
});

describe("fetchPage", () => {
  it("propagates the fetch error", async () => {
    const client: PageFetcher = {
      fetchHtml: async (url: string) => {
        throw new HttpError(503, url);
      },
    };
    await expect(fetchPage(client, "https://x.test/")).rejects.toBeInstanceOf(HttpError);
  });
});
