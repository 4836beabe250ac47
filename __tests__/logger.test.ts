import { describe, it, expect } from "vitest";
import { componentLogger, createLogger, defaultLogger } from "../src/logger.js";

describe("defaultLogger()", () => {
  it("should return the same root on every call", () => {
    expect(defaultLogger()).toBe(defaultLogger());
  });
});

describe("componentLogger()", () => {
  it("should bind the component name", () => {
    const parent = createLogger({ level: "silent" });
    expect(componentLogger("cache", parent).bindings()).toMatchObject({ component: "cache" });
  });

  it("should inherit the parent's level", () => {
    const parent = createLogger({ level: "warn" });
    expect(componentLogger("cache", parent).level).toBe("warn");
  });

  it("should hang children without a parent off the shared root", () => {
    const root = defaultLogger();
    root.level = "error";
    try {
      expect(componentLogger("cache").level).toBe("error");
      expect(componentLogger("optimizer").level).toBe("error");
    } finally {
      root.level = "info";
    }
  });
});
