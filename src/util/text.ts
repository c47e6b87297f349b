const textEncoder = new TextEncoder();
const textDecoder = new TextDecoder("utf-8");

function isForbiddenCodePoint(code: number): boolean {
  return code <= 0x1f || code === 0x7f || code === 0x85 || code === 0x2028 || code === 0x2029;
}

/** Collapses whitespace/control characters into single spaces and trims. */
export function sanitizeOneLine(input: string): string {
  let out = "";
  let pendingSpace = false;
  for (const ch of input) {
    const code = ch.codePointAt(0) ?? 0;
    if (isForbiddenCodePoint(code) || /\s/u.test(ch)) {
      pendingSpace = out.length > 0;
      continue;
    }
    if (pendingSpace) {
      out += " ";
      pendingSpace = false;
    }
    out += ch;
  }
  return out;
}

/** Truncates to at most `maxBytes` of UTF-8 without splitting a code point. */
export function truncateUtf8(input: string, maxBytes: number): string {
  if (!Number.isInteger(maxBytes) || maxBytes <= 0) return "";
  const buf = new Uint8Array(maxBytes);
  const { read, written } = textEncoder.encodeInto(input, buf);
  if (read === input.length) return input;
  return written === 0 ? "" : textDecoder.decode(buf.subarray(0, written));
}

function errorMessageOf(err: unknown): string {
  if (typeof err === "string") return err;
  if (err instanceof Error) return err.message;
  if (typeof err === "object" && err !== null) {
    try {
      const message = "message" in err ? err.message : undefined;
      if (typeof message === "string") return message;
    } catch {
      // getters on foreign error objects can throw; fall through to the generic text
    }
    return "Error";
  }
  return String(err);
}

export function formatOneLineError(err: unknown, maxBytes: number, fallback = "Error"): string {
  return truncateUtf8(sanitizeOneLine(errorMessageOf(err)), maxBytes) || fallback;
}
