import type { PageFetcher } from "./types";

const DEFAULT_TIMEOUT_MS = 30_000;
const DEFAULT_MAX_RETRIES = 3;
const DEFAULT_RETRY_BASE_MS = 1_000;

const UA =
  "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36";

export class HttpError extends Error {
  constructor(
    readonly status: number,
    readonly url: string
  ) {
    super(`HTTP ${status}: ${url}`);
    this.name = "HttpError";
  }
}

/** 429 and 5xx are worth another try; so are network errors and timeouts. */
export function isTransientFailure(error: unknown): boolean {
  if (error instanceof HttpError) return error.status === 429 || error.status >= 500;
  return true;
}

export interface FetchOptions {
  timeoutMs?: number;
  maxRetries?: number;
  retryBaseMs?: number;
  /** Injected for tests. */
  fetchImpl?: typeof fetch;
  sleep?: (ms: number) => Promise<void>;
}

const wait = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

async function fetchOnce(url: string, timeoutMs: number, fetchImpl: typeof fetch): Promise<string> {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeoutMs);
  try {
    const res = await fetchImpl(url, {
      signal: controller.signal,
      redirect: "follow",
      headers: { "User-Agent": UA, "Accept-Language": "de-DE,de;q=0.9" },
    });
    if (!res.ok) {
      throw new HttpError(res.status, url);
    }
    return await res.text();
  } finally {
    clearTimeout(timeoutId);
  }
}

/**
 * Fetch HTML with a per-request timeout, retrying transient failures with
 * exponential backoff (base, 2x base, 4x base ...).
 */
export async function fetchHtml(url: string, options: FetchOptions = {}): Promise<string> {
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  const maxRetries = options.maxRetries ?? DEFAULT_MAX_RETRIES;
  const retryBaseMs = options.retryBaseMs ?? DEFAULT_RETRY_BASE_MS;
  const fetchImpl = options.fetchImpl ?? fetch;
  const sleep = options.sleep ?? wait;

  for (let attempt = 0; ; attempt++) {
    try {
      return await fetchOnce(url, timeoutMs, fetchImpl);
    } catch (e) {
      if (attempt >= maxRetries || !isTransientFailure(e)) throw e;
      const delay = retryBaseMs * 2 ** attempt;
      const msg = e instanceof Error ? e.message : String(e);
      console.warn(`[fetch] ${msg}; retry ${attempt + 1}/${maxRetries} in ${delay}ms`);
      await sleep(delay);
    }
  }
}

/** A fetcher bound to one set of options, handed to each scraper. */
export function createPageFetcher(options: FetchOptions = {}): PageFetcher {
  return {
    fetchHtml: (url: string) => fetchHtml(url, options),
  };
}
