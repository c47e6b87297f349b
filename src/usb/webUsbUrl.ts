import { ByteCursor } from "./byteCursor.js";
import { type AnalysisResult, runParse } from "./diagnostics.js";

export const WEBUSB_URL_DESCRIPTOR_TYPE = 0x03;
export const WEBUSB_URL_HEADER_BYTES = 3;

export const WEBUSB_URL_SCHEME_HTTP = 0;
export const WEBUSB_URL_SCHEME_HTTPS = 1;
export const WEBUSB_URL_SCHEME_NONE = 255;

export type WebUsbUrlScheme = "http" | "https" | "none" | "unknown";

export interface WebUsbUrlDescriptor {
  bLength: number;
  bDescriptorType: number;
  bScheme: number;
  scheme: WebUsbUrlScheme;
  urlSuffix: Uint8Array;
  /** Scheme prefix + suffix; `null` when the descriptor carries no URL bytes at all. */
  url: string | null;
}

const SCHEME_PREFIX: Record<WebUsbUrlScheme, string> = {
  http: "http://",
  https: "https://",
  none: "",
  unknown: "unknown://",
};

export function webUsbUrlScheme(bScheme: number): WebUsbUrlScheme {
  switch (bScheme) {
    case WEBUSB_URL_SCHEME_HTTP:
      return "http";
    case WEBUSB_URL_SCHEME_HTTPS:
      return "https";
    case WEBUSB_URL_SCHEME_NONE:
      return "none";
    default:
      return "unknown";
  }
}

const utf8 = new TextDecoder("utf-8");

/**
 * Decodes a WebUSB URL descriptor (GET_URL response).
 *
 * An unrecognized `bScheme` is not a diagnostic; the URL is still assembled with an `unknown://`
 * prefix so the suffix stays visible.
 */
export function parseWebUsbUrlDescriptor(bytes: Uint8Array): AnalysisResult<WebUsbUrlDescriptor> {
  return runParse((diagnostics) => {
    const cursor = new ByteCursor(bytes);
    const length = cursor.length;

    if (length < WEBUSB_URL_HEADER_BYTES) {
      diagnostics.fatal(
        "url-too-short",
        `WebUSB URL descriptor too short (${length} bytes, minimum ${WEBUSB_URL_HEADER_BYTES})`,
        0,
      );
      return null;
    }

    const bLength = cursor.readU8(0);
    const bDescriptorType = cursor.readU8(1);
    const bScheme = cursor.readU8(2);
    const scheme = webUsbUrlScheme(bScheme);

    const end = Math.min(length, bLength);
    const urlSuffix =
      end > WEBUSB_URL_HEADER_BYTES ? cursor.readBytes(WEBUSB_URL_HEADER_BYTES, end - WEBUSB_URL_HEADER_BYTES) : new Uint8Array(0);
    const url = length > WEBUSB_URL_HEADER_BYTES ? SCHEME_PREFIX[scheme] + utf8.decode(urlSuffix) : null;

    return { bLength, bDescriptorType, bScheme, scheme, urlSuffix, url };
  });
}
