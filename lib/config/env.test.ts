import { afterEach, describe, expect, it, vi } from "vitest";
import { getCity, getFetchMaxRetries, getTimeZone, loadRuntimeConfig } from "./env";

describe("env config", () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it("uses defaults when variables are missing", () => {
    vi.stubEnv("EVENTS_CITY", "");
    vi.stubEnv("EVENTS_TIMEZONE", "");
    expect(getCity()).toBe("Bielefeld");
    expect(getTimeZone()).toBe("Europe/Berlin");
  });

  it("falls back on an unknown timezone", () => {
    vi.stubEnv("EVENTS_TIMEZONE", "Mars/Olympus");
    expect(getTimeZone()).toBe("Europe/Berlin");
  });

  it("reads numeric settings and ignores garbage", () => {
    vi.stubEnv("FETCH_MAX_RETRIES", "5");
    expect(getFetchMaxRetries()).toBe(5);
    vi.stubEnv("FETCH_MAX_RETRIES", "lots");
    expect(getFetchMaxRetries()).toBe(3);
  });

  it("returns a frozen snapshot", () => {
    vi.stubEnv("EVENTS_CITY", "Gütersloh");
    vi.stubEnv("SITE_DIR", "out");
    const config = loadRuntimeConfig();
    expect(config.city).toBe("Gütersloh");
    expect(config.siteDir).toBe("out");
    expect(Object.isFrozen(config)).toBe(true);
  });
});
