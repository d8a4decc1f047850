import { describe, expect, it } from "vitest";
import { createLogger, parseLogLevel, stripAnsi } from "./logger.js";

describe("parseLogLevel", () => {
  it("accepts level names in any case", () => {
    expect(parseLogLevel("debug")).toBe(2);
    expect(parseLogLevel(" WARN ")).toBe(4);
  });

  it("clamps numeric levels", () => {
    expect(parseLogLevel("3")).toBe(3);
    expect(parseLogLevel("9")).toBe(6);
    expect(parseLogLevel("-1")).toBe(0);
  });

  it("returns undefined for empty or unknown values", () => {
    expect(parseLogLevel(undefined)).toBeUndefined();
    expect(parseLogLevel("  ")).toBeUndefined();
    expect(parseLogLevel("verbose")).toBeUndefined();
  });
});

describe("stripAnsi", () => {
  it("removes color codes", () => {
    expect(stripAnsi("\x1b[31mred\x1b[0m text")).toBe("red text");
  });
});

describe("createLogger", () => {
  it("uses the given name and level", () => {
    const logger = createLogger({ type: "hidden", name: "patch-engine", minLevel: 2 });

    expect(logger.settings.name).toBe("patch-engine");
    expect(logger.settings.minLevel).toBe(2);
    expect(logger.settings.type).toBe("hidden");
  });
});
