import { formatOneLineError } from "../util/text.js";

export type TransportErrorKind =
  | "notFound"
  | "stall"
  | "timeout"
  | "disconnected"
  | "accessDenied"
  | "unsupported"
  | "other";

export interface TransportError {
  kind: TransportErrorKind;
  message: string;
}

export type TransportResult = { ok: true; data: Uint8Array } | { ok: false; error: TransportError };

const MAX_TRANSPORT_ERROR_BYTES = 512;

export function transportOk(data: Uint8Array): TransportResult {
  return { ok: true, data };
}

export function transportErr(kind: TransportErrorKind, message: string): TransportResult {
  return { ok: false, error: { kind, message } };
}

function errorName(err: unknown): string | undefined {
  if (typeof err !== "object" || err === null || !("name" in err)) return undefined;
  try {
    const name = err.name;
    return typeof name === "string" ? name : undefined;
  } catch {
    return undefined;
  }
}

function errorCause(err: unknown): unknown {
  if (typeof err !== "object" || err === null || !("cause" in err)) return undefined;
  try {
    return err.cause;
  } catch {
    return undefined;
  }
}

function includesAny(haystack: string, needles: readonly string[]): boolean {
  return needles.some((needle) => haystack.includes(needle));
}

// WebUSB surfaces failures as DOMException names; the Node.js `usb` package rethrows libusb error
// names in the message text. Match both.
function kindFromNameAndMessage(name: string | undefined, message: string): TransportErrorKind | null {
  switch (name) {
    case "NotFoundError":
      return "notFound";
    case "NetworkError":
      return "disconnected";
    case "TimeoutError":
      return "timeout";
    case "SecurityError":
    case "NotAllowedError":
      return "accessDenied";
    case "NotSupportedError":
      return "unsupported";
    default:
      break;
  }

  const lower = message.toLowerCase();
  if (includesAny(lower, ["libusb_error_pipe", "stall"])) return "stall";
  if (includesAny(lower, ["libusb_error_timeout", "libusb_transfer_timed_out", "timed out", "timeout"])) return "timeout";
  if (includesAny(lower, ["libusb_error_no_device", "libusb_transfer_no_device", "disconnected"])) return "disconnected";
  if (includesAny(lower, ["libusb_error_access", "access denied", "permission"])) return "accessDenied";
  if (includesAny(lower, ["libusb_error_not_supported", "not supported"])) return "unsupported";
  if (includesAny(lower, ["libusb_error_not_found", "not found"])) return "notFound";
  return null;
}

/**
 * Maps a thrown transfer error onto the transport taxonomy, walking `Error.cause` chains.
 */
export function classifyTransportError(err: unknown): TransportError {
  const message = formatOneLineError(err, MAX_TRANSPORT_ERROR_BYTES);
  const seen = new Set<unknown>();
  let cur: unknown = err;
  for (let depth = 0; depth < 5 && cur !== undefined && !seen.has(cur); depth += 1) {
    seen.add(cur);
    const kind = kindFromNameAndMessage(errorName(cur), formatOneLineError(cur, MAX_TRANSPORT_ERROR_BYTES, ""));
    if (kind) return { kind, message };
    cur = errorCause(cur);
  }
  return { kind: "other", message };
}

export interface TransportErrorExplanation {
  title: string;
  hints: string[];
}

export function describeTransportError(error: TransportError): TransportErrorExplanation {
  switch (error.kind) {
    case "notFound":
      return { title: "Descriptor not available", hints: [] };
    case "stall":
      return {
        title: "Device returned STALL",
        hints: [
          "The device likely does not support this request, or the vendor code is incorrect.",
          "For WebUSB URLs, a STALL may mean no landing page is configured.",
        ],
      };
    case "timeout":
      return { title: "Request timed out", hints: ["The device may be unresponsive; unplug/replug it and retry."] };
    case "disconnected":
      return { title: "Device was disconnected during the request", hints: ["Reconnect the device and retry."] };
    case "accessDenied":
      return {
        title: "Access denied",
        hints: [
          "On Linux, add a udev rule granting access to the device (or run with elevated privileges).",
          "On Windows, the device needs a WinUSB-compatible driver bound to it.",
        ],
      };
    case "unsupported":
      return {
        title: "Control transfer not supported",
        hints: ["The device or host controller rejected the request type."],
      };
    case "other":
      return { title: "USB request failed", hints: ["Check the device documentation for supported vendor requests."] };
  }
}
