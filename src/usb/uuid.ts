export const PLATFORM_UUID_BYTES = 16;

export const WEBUSB_PLATFORM_UUID = "3408b638-09a9-47a0-8bfd-a0768815b665";
export const MS_OS_20_PLATFORM_UUID = "d8dd60df-4589-4cc7-9cd2-659d9e648a9f";

export type PlatformUuidKind = "webusb" | "msos20" | "unknown";

// Wire order -> display order. The first three fields are little-endian (DWORD, WORD, WORD); the
// trailing 8 bytes are stored as-is.
const DISPLAY_ORDER = [3, 2, 1, 0, 5, 4, 7, 6, 8, 9, 10, 11, 12, 13, 14, 15] as const;
const DASH_AFTER = new Set([3, 5, 7, 9]);

function hexByte(value: number): string {
  return (value & 0xff).toString(16).padStart(2, "0");
}

/**
 * Formats a platform capability UUID as `xxxxxxxx-xxxx-xxxx-xxxx-xxxxxxxxxxxx` (lowercase).
 */
export function formatPlatformUuid(bytes: Uint8Array): string {
  if (bytes.byteLength !== PLATFORM_UUID_BYTES) {
    throw new RangeError(`Platform UUID must be ${PLATFORM_UUID_BYTES} bytes (got ${bytes.byteLength})`);
  }
  let out = "";
  DISPLAY_ORDER.forEach((src, i) => {
    out += hexByte(bytes[src] ?? 0);
    if (DASH_AFTER.has(i)) out += "-";
  });
  return out;
}

/**
 * Inverse of {@link formatPlatformUuid}: encodes a canonical UUID string into its 16 wire bytes.
 */
export function encodePlatformUuid(uuid: string): Uint8Array {
  const match = /^([0-9a-f]{8})-([0-9a-f]{4})-([0-9a-f]{4})-([0-9a-f]{4})-([0-9a-f]{12})$/i.exec(uuid.trim());
  if (!match) {
    throw new Error(`Invalid platform UUID: ${uuid}`);
  }
  const hex = match.slice(1).join("");
  const display = new Uint8Array(PLATFORM_UUID_BYTES);
  for (let i = 0; i < PLATFORM_UUID_BYTES; i += 1) {
    display[i] = Number.parseInt(hex.slice(i * 2, i * 2 + 2), 16);
  }
  const wire = new Uint8Array(PLATFORM_UUID_BYTES);
  DISPLAY_ORDER.forEach((src, i) => {
    wire[src] = display[i] ?? 0;
  });
  return wire;
}

export function classifyPlatformUuidString(uuid: string): PlatformUuidKind {
  const normalized = uuid.toLowerCase();
  if (normalized === WEBUSB_PLATFORM_UUID) return "webusb";
  if (normalized === MS_OS_20_PLATFORM_UUID) return "msos20";
  return "unknown";
}

export function classifyPlatformUuid(bytes: Uint8Array): PlatformUuidKind {
  return classifyPlatformUuidString(formatPlatformUuid(bytes));
}
