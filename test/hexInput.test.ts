import { describe, expect, it } from "vitest";

import { decodeDescriptorFile, parseHexDump } from "../src/transport/hexInput.js";

const text = (s: string) => new TextEncoder().encode(s);

describe("transport/parseHexDump", () => {
  it("accepts spaced, comma-separated, prefixed and run-together bytes", () => {
    expect(Array.from(parseHexDump("05 0f 3d 00") ?? [])).toEqual([0x05, 0x0f, 0x3d, 0x00]);
    expect(Array.from(parseHexDump("0x05, 0x0F,\n0x3D") ?? [])).toEqual([0x05, 0x0f, 0x3d]);
    expect(Array.from(parseHexDump("050f3d00\n0102") ?? [])).toEqual([0x05, 0x0f, 0x3d, 0x00, 0x01, 0x02]);
  });

  it("returns null for anything else", () => {
    expect(parseHexDump("")).toBeNull();
    expect(parseHexDump("05 0")).toBeNull();
    expect(parseHexDump("hello")).toBeNull();
  });
});

describe("transport/decodeDescriptorFile", () => {
  it("decodes text hex dumps", () => {
    expect(Array.from(decodeDescriptorFile(text("05 0f 05 00 00\n")))).toEqual([5, 0x0f, 5, 0, 0]);
  });

  it("passes raw bytes through", () => {
    const raw = Uint8Array.of(0x05, 0x0f, 0x05, 0x00, 0x00);
    expect(decodeDescriptorFile(raw)).toBe(raw);
  });

  it("passes printable text that is not hex through unchanged", () => {
    const raw = text("not hex");
    expect(decodeDescriptorFile(raw)).toBe(raw);
  });
});
