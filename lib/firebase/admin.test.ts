import { afterEach, describe, it, expect, vi } from "vitest";
import { getAdminDb } from "./admin";

describe("getAdminDb", () => {
  afterEach(() => {
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
  });

  it("returns null once, without retrying, when no project is configured", () => {
    vi.stubEnv("FIREBASE_PROJECT_ID", "");
    vi.stubEnv("FIREBASE_SERVICE_ACCOUNT_PATH", "");
    vi.stubEnv("FIREBASE_SERVICE_ACCOUNT_KEY", "");
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const error = vi.spyOn(console, "error").mockImplementation(() => {});

    expect(getAdminDb()).toBeNull();
    expect(getAdminDb()).toBeNull();
    expect(error).toHaveBeenCalledTimes(1);
    expect(error).toHaveBeenCalledWith("[firebase] FIREBASE_PROJECT_ID is not set");
    expect(warn).toHaveBeenCalledTimes(1);
  });
});
