import { z } from "zod";

import { DEFAULT_TRANSFER_LENGTH } from "./transport/webUsbTransport.js";

const logLevels = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;
const colorModes = ["auto", "always", "never"] as const;

export type LogLevel = (typeof logLevels)[number];
export type ColorMode = (typeof colorModes)[number];

/** The fixed vendor request older tools issued for MS OS 2.0 when the BOS gave no vendor code. */
export const DEFAULT_MSOS20_FALLBACK_VENDOR_CODE = 0x02;

export type Config = Readonly<{
  LOG_LEVEL: LogLevel;
  TRANSFER_LENGTH: number;
  MSOS20_FALLBACK_VENDOR_CODE: number;
  COLOR: ColorMode;
}>;

type Env = Record<string, string | undefined>;

/** Parses a decimal or `0x`-prefixed hex integer. Anything else (octal, suffixes, signs) is rejected. */
export function parseIntegerLiteral(raw: string): number | null {
  const value = raw.trim();
  if (/^0x[0-9a-f]+$/i.test(value)) return Number.parseInt(value.slice(2), 16);
  if (/^[0-9]+$/.test(value)) return Number.parseInt(value, 10);
  return null;
}

const byteLiteral = z
  .string()
  .transform((value, ctx) => {
    const n = parseIntegerLiteral(value);
    if (n === null || n > 0xff) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "must be a byte (0-255, decimal or 0x hex)" });
      return z.NEVER;
    }
    return n;
  });

const envSchema = z.object({
  LOG_LEVEL: z.enum(logLevels).default("warn"),
  TRANSFER_LENGTH: z.coerce.number().int().min(5).max(0xffff).default(DEFAULT_TRANSFER_LENGTH),
  MSOS20_FALLBACK_VENDOR_CODE: byteLiteral.optional(),
  COLOR: z.enum(colorModes).default("auto"),
});

export function loadConfig(env: Env = process.env): Config {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new Error(`Invalid configuration:\n${parsed.error.message}`);
  }

  const raw = parsed.data;
  return Object.freeze({
    LOG_LEVEL: raw.LOG_LEVEL,
    TRANSFER_LENGTH: raw.TRANSFER_LENGTH,
    MSOS20_FALLBACK_VENDOR_CODE: raw.MSOS20_FALLBACK_VENDOR_CODE ?? DEFAULT_MSOS20_FALLBACK_VENDOR_CODE,
    COLOR: raw.COLOR,
  });
}
