/**
 * Formats bytes as a space-separated hex dump, `columns` bytes per row.
 *
 * Output is capped at `maxBytes`; anything past the cap is summarized with a `… (+N bytes)` line.
 */
export function formatHexBytes(bytes: Uint8Array, maxBytes = 4096, columns = 16): string {
  const limit = Math.max(0, maxBytes | 0);
  const cols = Math.max(1, columns | 0);
  const head = bytes.subarray(0, Math.min(bytes.byteLength, limit));

  let hex = "";
  head.forEach((b, i) => {
    if (i !== 0) hex += i % cols === 0 ? "\n" : " ";
    hex += b.toString(16).padStart(2, "0");
  });

  if (bytes.byteLength <= limit) return hex;
  const suffix = `… (+${bytes.byteLength - limit} bytes)`;
  return hex ? `${hex}\n${suffix}` : suffix;
}

// Out-of-range values are printed in full rather than masked, so bad inputs stay visible.
export function hex8(value: number): string {
  return `0x${value.toString(16).padStart(2, "0")}`;
}

export function hex16(value: number): string {
  return `0x${value.toString(16).padStart(4, "0")}`;
}

export function hex32(value: number): string {
  return `0x${(value >>> 0).toString(16).padStart(8, "0")}`;
}
