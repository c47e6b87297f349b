import type { ByteCursor } from "./byteCursor.js";
import type { DiagnosticsBuilder } from "./diagnostics.js";
import { hex32 } from "./hex.js";
import { PLATFORM_UUID_BYTES, classifyPlatformUuidString, formatPlatformUuid } from "./uuid.js";

/** bLength + bDescriptorType + bDevCapabilityType + bReserved + 16-byte UUID. */
export const PLATFORM_CAPABILITY_HEADER_BYTES = 20;
export const WEBUSB_CAPABILITY_DATA_BYTES = 4;
export const MS_OS_20_CAPABILITY_DATA_BYTES = 8;

/** Windows 8.1, the minimum version that understands MS OS 2.0 descriptors. */
export const MS_OS_20_WINDOWS_VERSION = 0x06030000;

export interface WebUsbCapabilityData {
  bcdVersion: number;
  bVendorCode: number;
  iLandingPage: number;
}

export interface MsOs20CapabilityData {
  dwWindowsVersion: number;
  wDescriptorSetTotalLength: number;
  bMsVendorCode: number;
  bAltEnumCode: number;
}

/**
 * `data` is `null` when the capability matched a known UUID but its declared length is too short to
 * hold the payload. That case is not reported as a diagnostic.
 */
export type PlatformCapabilityKind =
  | { type: "webusb"; data: WebUsbCapabilityData | null }
  | { type: "msos20"; data: MsOs20CapabilityData | null }
  | { type: "unknown" };

export interface PlatformCapability {
  bReserved: number;
  uuid: string;
  uuidBytes: Uint8Array;
  kind: PlatformCapabilityKind;
}

/**
 * Decodes a Platform Device Capability whose 20-byte header starts at `offset`.
 *
 * `capLength` is the capability's declared bLength; payloads are only decoded when both the declared
 * length and the buffer cover them.
 */
export function decodePlatformCapability(
  cursor: ByteCursor,
  offset: number,
  capLength: number,
  diagnostics: DiagnosticsBuilder,
): PlatformCapability {
  const bReserved = cursor.readU8(offset + 3);
  const uuidBytes = cursor.readBytes(offset + 4, PLATFORM_UUID_BYTES);
  const uuid = formatPlatformUuid(uuidBytes);
  const dataOffset = offset + PLATFORM_CAPABILITY_HEADER_BYTES;

  const payloadFits = (width: number): boolean =>
    capLength >= PLATFORM_CAPABILITY_HEADER_BYTES + width && cursor.fits(dataOffset, width);

  let kind: PlatformCapabilityKind;
  switch (classifyPlatformUuidString(uuid)) {
    case "webusb": {
      if (!payloadFits(WEBUSB_CAPABILITY_DATA_BYTES)) {
        kind = { type: "webusb", data: null };
        break;
      }
      const data: WebUsbCapabilityData = {
        bcdVersion: cursor.readU16LE(dataOffset),
        bVendorCode: cursor.readU8(dataOffset + 2),
        iLandingPage: cursor.readU8(dataOffset + 3),
      };
      if (data.bVendorCode === 0) {
        diagnostics.warning("webusb-vendor-code-zero", "WebUSB vendor code is 0 (invalid)", dataOffset + 2);
      }
      kind = { type: "webusb", data };
      break;
    }
    case "msos20": {
      if (!payloadFits(MS_OS_20_CAPABILITY_DATA_BYTES)) {
        kind = { type: "msos20", data: null };
        break;
      }
      const data: MsOs20CapabilityData = {
        dwWindowsVersion: cursor.readU32LE(dataOffset),
        wDescriptorSetTotalLength: cursor.readU16LE(dataOffset + 4),
        bMsVendorCode: cursor.readU8(dataOffset + 6),
        bAltEnumCode: cursor.readU8(dataOffset + 7),
      };
      if (data.dwWindowsVersion !== MS_OS_20_WINDOWS_VERSION) {
        diagnostics.warning(
          "msos20-unusual-windows-version",
          `Unusual Windows version ${hex32(data.dwWindowsVersion)} (expected ${hex32(MS_OS_20_WINDOWS_VERSION)})`,
          dataOffset,
        );
      }
      kind = { type: "msos20", data };
      break;
    }
    default:
      kind = { type: "unknown" };
      break;
  }

  return { bReserved, uuid, uuidBytes, kind };
}
