import { describe, expect, it } from "vitest";

import { loadConfig, parseIntegerLiteral } from "../src/config.js";

describe("config/loadConfig", () => {
  it("applies defaults", () => {
    expect(loadConfig({})).toEqual({
      LOG_LEVEL: "warn",
      TRANSFER_LENGTH: 512,
      MSOS20_FALLBACK_VENDOR_CODE: 0x02,
      COLOR: "auto",
    });
  });

  it("parses overrides", () => {
    const config = loadConfig({
      LOG_LEVEL: "debug",
      TRANSFER_LENGTH: "4096",
      MSOS20_FALLBACK_VENDOR_CODE: "0x20",
      COLOR: "never",
    });
    expect(config).toEqual({ LOG_LEVEL: "debug", TRANSFER_LENGTH: 4096, MSOS20_FALLBACK_VENDOR_CODE: 0x20, COLOR: "never" });
    expect(loadConfig({ MSOS20_FALLBACK_VENDOR_CODE: "17" }).MSOS20_FALLBACK_VENDOR_CODE).toBe(17);
  });

  it("rejects invalid values", () => {
    expect(() => loadConfig({ LOG_LEVEL: "verbose" })).toThrow(/Invalid configuration/);
    expect(() => loadConfig({ TRANSFER_LENGTH: "4" })).toThrow(/Invalid configuration/);
    expect(() => loadConfig({ TRANSFER_LENGTH: "70000" })).toThrow(/Invalid configuration/);
    expect(() => loadConfig({ MSOS20_FALLBACK_VENDOR_CODE: "0x100" })).toThrow(/must be a byte/);
    expect(() => loadConfig({ COLOR: "yes" })).toThrow(/Invalid configuration/);
  });

  it("returns a frozen object", () => {
    expect(Object.isFrozen(loadConfig({}))).toBe(true);
  });
});

describe("config/parseIntegerLiteral", () => {
  it("accepts decimal and 0x hex only", () => {
    expect(parseIntegerLiteral("42")).toBe(42);
    expect(parseIntegerLiteral(" 0x1F ")).toBe(0x1f);
    expect(parseIntegerLiteral("0X1f")).toBe(0x1f);
    expect(parseIntegerLiteral("010")).toBe(10);
    expect(parseIntegerLiteral("-1")).toBeNull();
    expect(parseIntegerLiteral("12abc")).toBeNull();
    expect(parseIntegerLiteral("0x")).toBeNull();
    expect(parseIntegerLiteral("")).toBeNull();
  });
});
