const HEX_RUN = /^(?:0x)?([0-9a-f]+)$/i;

/**
 * Parses a textual hex dump such as `05 0f 3d 00`, `0x05,0x0f`, or `050f3d00`.
 *
 * Tokens are separated by whitespace or commas; each must be an even-length run of hex digits with an
 * optional `0x` prefix. Returns `null` when the text is not a hex dump.
 */
export function parseHexDump(text: string): Uint8Array | null {
  const tokens = text.split(/[\s,]+/).filter((token) => token.length > 0);
  if (tokens.length === 0) return null;

  const out: number[] = [];
  for (const token of tokens) {
    const match = HEX_RUN.exec(token);
    const digits = match?.[1];
    if (!digits || digits.length % 2 !== 0) return null;
    for (let i = 0; i < digits.length; i += 2) {
      out.push(Number.parseInt(digits.slice(i, i + 2), 16));
    }
  }
  return Uint8Array.from(out);
}

function isPrintableText(bytes: Uint8Array): boolean {
  for (const b of bytes) {
    if (b === 0x09 || b === 0x0a || b === 0x0d) continue;
    if (b < 0x20 || b > 0x7e) return false;
  }
  return true;
}

/** Interprets file contents as a hex dump when it is one, otherwise as raw descriptor bytes. */
export function decodeDescriptorFile(contents: Uint8Array): Uint8Array {
  if (contents.byteLength === 0 || !isPrintableText(contents)) return contents;
  return parseHexDump(new TextDecoder("utf-8").decode(contents)) ?? contents;
}
