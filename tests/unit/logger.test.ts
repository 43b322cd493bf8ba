import { describe, it, expect } from "vitest";

import { resolveLogLevel } from "../../src/logger.js";

describe("resolveLogLevel", () => {
  it("should accept known levels case-insensitively", () => {
    expect(resolveLogLevel("DEBUG")).toBe("debug");
    expect(resolveLogLevel(" warn ")).toBe("warn");
    expect(resolveLogLevel("silent")).toBe("silent");
  });

  it("should fall back to info", () => {
    expect(resolveLogLevel(undefined)).toBe("info");
    expect(resolveLogLevel("verbose")).toBe("info");
  });
});
