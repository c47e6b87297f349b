import { describe, expect, it } from "vitest";

import { ByteCursor, ByteCursorOutOfBoundsError } from "../src/usb/byteCursor.js";

describe("usb/ByteCursor", () => {
  it("reads little-endian fields at absolute offsets", () => {
    const cursor = new ByteCursor(Uint8Array.of(0xaa, 0x34, 0x12, 0x78, 0x56, 0x34, 0x12));
    expect(cursor.readU8(0)).toBe(0xaa);
    expect(cursor.readU16LE(1)).toBe(0x1234);
    expect(cursor.readU32LE(3)).toBe(0x12345678);
  });

  it("keeps u32 values with bit 31 set non-negative", () => {
    const cursor = new ByteCursor(Uint8Array.of(0x00, 0x00, 0x00, 0x80));
    expect(cursor.readU32LE(0)).toBe(0x80000000);
  });

  it("reports whether a read fits", () => {
    const cursor = new ByteCursor(new Uint8Array(4));
    expect(cursor.fits(0, 4)).toBe(true);
    expect(cursor.fits(2, 2)).toBe(true);
    expect(cursor.fits(3, 2)).toBe(false);
    expect(cursor.fits(-1, 1)).toBe(false);
    expect(cursor.fits(0, -1)).toBe(false);
    expect(cursor.fits(Number.NaN, 1)).toBe(false);
    expect(cursor.fits(4, 0)).toBe(true);
    expect(cursor.remaining(1)).toBe(3);
  });

  it("throws a typed error for out-of-bounds reads", () => {
    const cursor = new ByteCursor(Uint8Array.of(1, 2, 3));
    expect(() => cursor.readU16LE(2)).toThrow(ByteCursorOutOfBoundsError);
    try {
      cursor.readU32LE(1);
      throw new Error("expected readU32LE to throw");
    } catch (err) {
      expect(err).toBeInstanceOf(ByteCursorOutOfBoundsError);
      if (!(err instanceof ByteCursorOutOfBoundsError)) throw err;
      expect(err.offset).toBe(1);
      expect(err.width).toBe(4);
      expect(err.byteLength).toBe(3);
      expect(err.message).toBe("Read of 4 byte(s) at offset 1 is out of bounds (buffer is 3 bytes)");
    }
  });

  it("returns copies from readBytes", () => {
    const source = Uint8Array.of(1, 2, 3, 4);
    const copy = new ByteCursor(source).readBytes(1, 2);
    copy[0] = 0xff;
    expect(Array.from(copy)).toEqual([0xff, 3]);
    expect(Array.from(source)).toEqual([1, 2, 3, 4]);
  });
});
