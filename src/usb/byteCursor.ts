export class ByteCursorOutOfBoundsError extends RangeError {
  readonly offset: number;
  readonly width: number;
  readonly byteLength: number;

  constructor(offset: number, width: number, byteLength: number) {
    super(`Read of ${width} byte(s) at offset ${offset} is out of bounds (buffer is ${byteLength} bytes)`);
    this.name = "ByteCursorOutOfBoundsError";
    this.offset = offset;
    this.width = width;
    this.byteLength = byteLength;
  }
}

/**
 * Bounds-checked little-endian reader over a caller-owned buffer.
 *
 * All offsets are absolute. Readers throw {@link ByteCursorOutOfBoundsError} rather than returning
 * `undefined`, so callers are expected to check {@link ByteCursor.fits} before reading.
 */
export class ByteCursor {
  constructor(private readonly bytes: Uint8Array) {}

  get length(): number {
    return this.bytes.byteLength;
  }

  fits(offset: number, width: number): boolean {
    if (!Number.isSafeInteger(offset) || !Number.isSafeInteger(width)) return false;
    if (offset < 0 || width < 0) return false;
    return offset + width <= this.bytes.byteLength;
  }

  remaining(offset: number): number {
    return this.bytes.byteLength - offset;
  }

  readU8(offset: number): number {
    this.check(offset, 1);
    return this.bytes[offset] ?? 0;
  }

  readU16LE(offset: number): number {
    this.check(offset, 2);
    return this.readU8(offset) | (this.readU8(offset + 1) << 8);
  }

  readU32LE(offset: number): number {
    this.check(offset, 4);
    // `>>> 0` keeps bit 31 from turning the value negative.
    return (this.readU16LE(offset) | (this.readU16LE(offset + 2) << 16)) >>> 0;
  }

  /** Copies `count` bytes starting at `offset`. */
  readBytes(offset: number, count: number): Uint8Array {
    this.check(offset, count);
    return this.bytes.slice(offset, offset + count);
  }

  private check(offset: number, width: number): void {
    if (!this.fits(offset, width)) {
      throw new ByteCursorOutOfBoundsError(offset, width, this.bytes.byteLength);
    }
  }
}
