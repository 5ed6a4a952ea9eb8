import { describe, expect, it } from "vitest";

import { CacheConfigError, DEFAULT_MAX_ENTRIES, loadCacheConfig, parseCacheConfig } from "../src";

describe("cache config", () => {
  it("falls back to defaults when nothing is set", () => {
    expect(loadCacheConfig({})).toEqual({ maxEntries: DEFAULT_MAX_ENTRIES });
  });

  it("reads values from the environment", () => {
    expect(loadCacheConfig({ CACHE_MAX_ENTRIES: "250", LOG_LEVEL: "debug" })).toEqual({
      maxEntries: 250,
      logLevel: "debug"
    });
  });

  it("ignores blank variables", () => {
    expect(loadCacheConfig({ CACHE_MAX_ENTRIES: "  ", LOG_LEVEL: "" }).maxEntries).toBe(DEFAULT_MAX_ENTRIES);
  });

  it.each(["0", "-5", "2.5", "lots"])("rejects CACHE_MAX_ENTRIES=%s", (value) => {
    expect(() => loadCacheConfig({ CACHE_MAX_ENTRIES: value })).toThrow(CacheConfigError);
    expect(() => loadCacheConfig({ CACHE_MAX_ENTRIES: value })).toThrow(/^maxEntries: /);
  });

  it("rejects unknown log levels", () => {
    expect(() => loadCacheConfig({ LOG_LEVEL: "loud" })).toThrow(/^logLevel: /);
  });

  it("parses programmatic input", () => {
    expect(parseCacheConfig({ maxEntries: 3, logLevel: "warn" })).toEqual({ maxEntries: 3, logLevel: "warn" });
    expect(() => parseCacheConfig({ maxEntries: "many" })).toThrow(CacheConfigError);
  });
});
