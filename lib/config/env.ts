import { DEFAULT_CITY, DEFAULT_TIMEZONE } from "@/types";

/**
 * Environment-backed settings. Every getter falls back to its default when
 * the variable is missing or malformed.
 */

function readString(name: string): string | undefined {
  const raw = process.env[name]?.trim();
  return raw ? raw : undefined;
}

function readPositiveInt(name: string, fallback: number): number {
  const raw = readString(name);
  if (!raw) return fallback;
  const n = Number.parseInt(raw, 10);
  if (!Number.isFinite(n) || n < 0) return fallback;
  return n;
}

function isValidTimeZone(timeZone: string): boolean {
  try {
    new Intl.DateTimeFormat("en-CA", { timeZone });
    return true;
  } catch {
    return false;
  }
}

export function getCity(): string {
  return readString("EVENTS_CITY") ?? DEFAULT_CITY;
}

export function getTimeZone(): string {
  const tz = readString("EVENTS_TIMEZONE");
  if (tz && isValidTimeZone(tz)) return tz;
  return DEFAULT_TIMEZONE;
}

export function getFetchTimeoutMs(): number {
  return readPositiveInt("FETCH_TIMEOUT_MS", 30_000) || 30_000;
}

export function getFetchMaxRetries(): number {
  return readPositiveInt("FETCH_MAX_RETRIES", 3);
}

export function getFetchRetryBaseMs(): number {
  return readPositiveInt("FETCH_RETRY_BASE_MS", 1_000);
}

export function getSiteDir(): string {
  return readString("SITE_DIR") ?? "site";
}

export function getEventsCollection(): string {
  return readString("EVENTS_COLLECTION") ?? "events";
}

export interface RuntimeConfig {
  city: string;
  timeZone: string;
  siteDir: string;
  fetch: {
    timeoutMs: number;
    maxRetries: number;
    retryBaseMs: number;
  };
}

/** Snapshot of all settings, taken once by the entry points. */
export function loadRuntimeConfig(): Readonly<RuntimeConfig> {
  return Object.freeze({
    city: getCity(),
    timeZone: getTimeZone(),
    siteDir: getSiteDir(),
    fetch: Object.freeze({
      timeoutMs: getFetchTimeoutMs(),
      maxRetries: getFetchMaxRetries(),
      retryBaseMs: getFetchRetryBaseMs(),
    }),
  });
}
