import { describe, it, expect } from "vitest";
import { ConfigError, loadConfigFromEnv, resolveConfig } from "../src/config.js";

describe("resolveConfig()", () => {
  it("should fill every default", () => {
    expect(resolveConfig({})).toEqual({
      cacheCapacity: 1000,
      decayIntervalMs: 100,
      coherenceFloor: 0.1,
      neighborRadius: 5,
      emaAlpha: 0.1,
      realityFloor: 0.5,
      transformConcurrency: 8,
      contextWeight: 0.25,
      logLevel: "info",
    });
  });

  it("should keep supplied values", () => {
    const config = resolveConfig({ cacheCapacity: 10, realityFloor: 0.9 });
    expect(config.cacheCapacity).toBe(10);
    expect(config.realityFloor).toBe(0.9);
  });

  it("should throw INVALID_CONFIG naming the offending key", () => {
    let caught: unknown;
    try {
      resolveConfig({ cacheCapacity: -1 });
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(ConfigError);
    expect(caught).toMatchObject({ code: "INVALID_CONFIG" });
    expect(String(caught)).toContain("cacheCapacity");
  });

  it("should reject an EMA alpha of 0", () => {
    expect(() => resolveConfig({ emaAlpha: 0 })).toThrow(ConfigError);
  });

  it("should reject an unknown log level", () => {
    expect(() => resolveConfig({ logLevel: "verbose" })).toThrow(ConfigError);
  });
});

describe("loadConfigFromEnv()", () => {
  it("should read and coerce variables", () => {
    const config = loadConfigFromEnv({
      PARALLEL_STATE_CACHE_CAPACITY: "50",
      PARALLEL_STATE_REALITY_FLOOR: "0.25",
      PARALLEL_STATE_LOG_LEVEL: "debug",
    });
    expect(config.cacheCapacity).toBe(50);
    expect(config.realityFloor).toBe(0.25);
    expect(config.logLevel).toBe("debug");
    expect(config.neighborRadius).toBe(5);
  });

  it("should ignore blank variables", () => {
    expect(loadConfigFromEnv({ PARALLEL_STATE_CACHE_CAPACITY: " " }).cacheCapacity).toBe(1000);
  });

  it("should reject non-numeric values", () => {
    expect(() => loadConfigFromEnv({ PARALLEL_STATE_NEIGHBOR_RADIUS: "wide" })).toThrow(ConfigError);
  });
});
