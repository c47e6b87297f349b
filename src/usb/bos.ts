import { ByteCursor } from "./byteCursor.js";
import { type AnalysisResult, type DiagnosticsBuilder, runParse } from "./diagnostics.js";
import { hex8 } from "./hex.js";
import {
  PLATFORM_CAPABILITY_HEADER_BYTES,
  type MsOs20CapabilityData,
  type PlatformCapability,
  type WebUsbCapabilityData,
  decodePlatformCapability,
} from "./platformCapability.js";

export const USB_DT_BOS = 0x0f;
export const USB_DT_DEVICE_CAPABILITY = 0x10;
export const USB_DEV_CAP_PLATFORM = 0x05;

export const BOS_HEADER_BYTES = 5;
/** bLength + bDescriptorType + bDevCapabilityType. */
export const DEVICE_CAPABILITY_HEADER_BYTES = 3;

interface DeviceCapabilityHeader {
  offset: number;
  bLength: number;
  bDescriptorType: number;
  bDevCapabilityType: number;
}

export type DeviceCapability =
  | (DeviceCapabilityHeader & { kind: "platform"; platform: PlatformCapability })
  | (DeviceCapabilityHeader & { kind: "other" });

export interface BosDescriptor {
  bLength: number;
  bDescriptorType: number;
  wTotalLength: number;
  bNumDeviceCaps: number;
  capabilities: DeviceCapability[];
}

/**
 * Decodes a BOS descriptor and walks its Device Capability array.
 *
 * Never throws: truncated or inconsistent input is reported through the result's diagnostics.
 */
export function parseBosDescriptor(bytes: Uint8Array): AnalysisResult<BosDescriptor> {
  return runParse((diagnostics) => {
    const cursor = new ByteCursor(bytes);
    const length = cursor.length;

    if (length < BOS_HEADER_BYTES) {
      diagnostics.fatal(
        "bos-too-short",
        `BOS descriptor too short (${length} bytes, minimum ${BOS_HEADER_BYTES})`,
        0,
      );
      return null;
    }

    const bos: BosDescriptor = {
      bLength: cursor.readU8(0),
      bDescriptorType: cursor.readU8(1),
      wTotalLength: cursor.readU16LE(2),
      bNumDeviceCaps: cursor.readU8(4),
      capabilities: [],
    };

    if (bos.bDescriptorType !== USB_DT_BOS) {
      diagnostics.error(
        "bos-invalid-type",
        `Invalid BOS descriptor type ${hex8(bos.bDescriptorType)} (expected ${hex8(USB_DT_BOS)})`,
        1,
      );
    }
    if (bos.wTotalLength !== length) {
      diagnostics.warning(
        "bos-length-mismatch",
        `BOS total length mismatch (reported=${bos.wTotalLength}, actual=${length})`,
        2,
      );
    }

    let offset = bos.bLength;
    while (offset < length && bos.capabilities.length < bos.bNumDeviceCaps) {
      if (!cursor.fits(offset, DEVICE_CAPABILITY_HEADER_BYTES)) {
        diagnostics.fatal("capability-truncated", `Truncated device capability at offset ${offset}`, offset);
        break;
      }

      const header: DeviceCapabilityHeader = {
        offset,
        bLength: cursor.readU8(offset),
        bDescriptorType: cursor.readU8(offset + 1),
        bDevCapabilityType: cursor.readU8(offset + 2),
      };

      if (header.bLength < DEVICE_CAPABILITY_HEADER_BYTES) {
        diagnostics.fatal(
          "capability-invalid-length",
          `Invalid device capability length ${header.bLength} at offset ${offset} (minimum ${DEVICE_CAPABILITY_HEADER_BYTES})`,
          offset,
        );
        break;
      }
      if (!cursor.fits(offset, header.bLength)) {
        diagnostics.fatal(
          "capability-overflow",
          `Device capability extends beyond buffer (offset=${offset}, len=${header.bLength}, buffer=${length})`,
          offset,
        );
        break;
      }
      bos.capabilities.push(decodeCapability(cursor, header, diagnostics));
      offset += header.bLength;
    }

    return bos;
  });
}

function decodeCapability(
  cursor: ByteCursor,
  header: DeviceCapabilityHeader,
  diagnostics: DiagnosticsBuilder,
): DeviceCapability {
  // The platform header is decoded whenever the buffer holds it, even past a short bLength.
  if (
    header.bDevCapabilityType !== USB_DEV_CAP_PLATFORM ||
    !cursor.fits(header.offset, PLATFORM_CAPABILITY_HEADER_BYTES)
  ) {
    return { ...header, kind: "other" };
  }
  const platform = decodePlatformCapability(cursor, header.offset, header.bLength, diagnostics);
  return { ...header, kind: "platform", platform };
}

export type DecodedWebUsbCapability = { capability: DeviceCapability; data: WebUsbCapabilityData };
export type DecodedMsOs20Capability = { capability: DeviceCapability; data: MsOs20CapabilityData };

/** First WebUSB platform capability with a decoded payload, if any. */
export function findWebUsbCapability(bos: BosDescriptor): DecodedWebUsbCapability | null {
  for (const capability of bos.capabilities) {
    if (capability.kind !== "platform") continue;
    const kind = capability.platform.kind;
    if (kind.type === "webusb" && kind.data) return { capability, data: kind.data };
  }
  return null;
}

/** First MS OS 2.0 platform capability with a decoded payload, if any. */
export function findMsOs20Capability(bos: BosDescriptor): DecodedMsOs20Capability | null {
  for (const capability of bos.capabilities) {
    if (capability.kind !== "platform") continue;
    const kind = capability.platform.kind;
    if (kind.type === "msos20" && kind.data) return { capability, data: kind.data };
  }
  return null;
}
