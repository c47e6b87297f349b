import { ByteCursor } from "./byteCursor.js";
import { type AnalysisResult, type DiagnosticsBuilder, runParse } from "./diagnostics.js";
import { hex16, hex32 } from "./hex.js";
import { MS_OS_20_WINDOWS_VERSION } from "./platformCapability.js";
import {
  MS_OS_20_REGISTRY_PROPERTY_MIN_BYTES,
  type RegistryPropertyFields,
  decodeRegistryProperty,
} from "./registryProperty.js";

export const MS_OS_20_SET_HEADER_DESCRIPTOR = 0x00;
export const MS_OS_20_SUBSET_HEADER_CONFIGURATION = 0x01;
export const MS_OS_20_SUBSET_HEADER_FUNCTION = 0x02;
export const MS_OS_20_FEATURE_COMPATIBLE_ID = 0x03;
export const MS_OS_20_FEATURE_REG_PROPERTY = 0x04;

/** wIndex of the vendor request that returns the descriptor set. */
export const MS_OS_20_DESCRIPTOR_INDEX = 0x07;

/** wLength + wDescriptorType. */
export const MS_OS_20_HEADER_BYTES = 4;

const COMPATIBLE_ID_BYTES = 8;
const WINUSB = [0x57, 0x49, 0x4e, 0x55, 0x53, 0x42] as const; // "WINUSB"

interface MsOs20DescriptorHeader {
  offset: number;
  wLength: number;
  wDescriptorType: number;
}

export type MsOs20Descriptor =
  | (MsOs20DescriptorHeader & { type: "setHeader"; dwWindowsVersion: number; wTotalLength: number })
  | (MsOs20DescriptorHeader & {
      type: "configurationSubsetHeader";
      bConfigurationValue: number;
      bReserved: number;
      wTotalLength: number;
    })
  | (MsOs20DescriptorHeader & {
      type: "functionSubsetHeader";
      bFirstInterface: number;
      bReserved: number;
      wSubsetLength: number;
    })
  | (MsOs20DescriptorHeader & {
      type: "compatibleId";
      compatibleId: Uint8Array;
      subCompatibleId: Uint8Array;
      compatibleIdText: string;
      subCompatibleIdText: string;
    })
  | (MsOs20DescriptorHeader & { type: "registryProperty" } & RegistryPropertyFields)
  // A known type declaring less than its minimum length. Its declared length is still consumed.
  | (MsOs20DescriptorHeader & { type: "undersized" });

export interface MsOs20DescriptorSet {
  descriptors: MsOs20Descriptor[];
  /** Offset at which the walk stopped: the sum of every consumed `wLength`. */
  consumedLength: number;
}

type KnownType = Exclude<MsOs20Descriptor["type"], "undersized">;

const KNOWN_TYPES: Record<number, { type: KnownType; label: string; minLength: number }> = {
  [MS_OS_20_SET_HEADER_DESCRIPTOR]: { type: "setHeader", label: "Set Header", minLength: 10 },
  [MS_OS_20_SUBSET_HEADER_CONFIGURATION]: {
    type: "configurationSubsetHeader",
    label: "Configuration Subset Header",
    minLength: 8,
  },
  [MS_OS_20_SUBSET_HEADER_FUNCTION]: { type: "functionSubsetHeader", label: "Function Subset Header", minLength: 8 },
  [MS_OS_20_FEATURE_COMPATIBLE_ID]: { type: "compatibleId", label: "Compatible ID Feature", minLength: 20 },
  [MS_OS_20_FEATURE_REG_PROPERTY]: {
    type: "registryProperty",
    label: "Registry Property Feature",
    minLength: MS_OS_20_REGISTRY_PROPERTY_MIN_BYTES,
  },
};

export function msOs20DescriptorLabel(wDescriptorType: number): string {
  return KNOWN_TYPES[wDescriptorType]?.label ?? "Unknown Descriptor";
}

/** Display form of an 8-byte ID: text up to the first NUL, non-printable bytes as `?`. */
function compatibleIdText(bytes: Uint8Array): string {
  let out = "";
  for (const b of bytes) {
    if (b === 0) break;
    out += b >= 32 && b <= 126 ? String.fromCharCode(b) : "?";
  }
  return out;
}

/**
 * Walks an MS OS 2.0 descriptor set as a flat stream of `{wLength, wDescriptorType}` records.
 *
 * Zero/undersized/overflowing record lengths and unknown descriptor types halt the walk; everything
 * else is reported and the walk continues at `offset + wLength`.
 */
export function parseMsOs20DescriptorSet(bytes: Uint8Array): AnalysisResult<MsOs20DescriptorSet> {
  return runParse((diagnostics) => {
    const cursor = new ByteCursor(bytes);
    const length = cursor.length;
    const set: MsOs20DescriptorSet = { descriptors: [], consumedLength: 0 };

    let offset = 0;
    while (offset < length) {
      if (!cursor.fits(offset, MS_OS_20_HEADER_BYTES)) {
        diagnostics.fatal(
          "msos20-truncated-header",
          `Truncated descriptor at offset ${offset} (need ${MS_OS_20_HEADER_BYTES} bytes, have ${cursor.remaining(offset)})`,
          offset,
        );
        break;
      }

      const header: MsOs20DescriptorHeader = {
        offset,
        wLength: cursor.readU16LE(offset),
        wDescriptorType: cursor.readU16LE(offset + 2),
      };
      const wLength = header.wLength;

      if (wLength === 0) {
        diagnostics.fatal("msos20-zero-length", `Zero length descriptor at offset ${offset}`, offset);
        break;
      }
      if (wLength < MS_OS_20_HEADER_BYTES) {
        diagnostics.fatal(
          "msos20-invalid-length",
          `Invalid descriptor length ${wLength} at offset ${offset} (minimum is ${MS_OS_20_HEADER_BYTES})`,
          offset,
        );
        break;
      }
      if (!cursor.fits(offset, wLength)) {
        diagnostics.fatal(
          "msos20-overflow",
          `Descriptor extends beyond buffer (offset=${offset}, len=${wLength}, buffer=${length})`,
          offset,
        );
        break;
      }

      const known = KNOWN_TYPES[header.wDescriptorType];
      if (!known) {
        diagnostics.fatal(
          "msos20-unknown-type",
          `Unknown descriptor type ${hex16(header.wDescriptorType)} (len=${wLength})`,
          offset,
        );
        break;
      }

      if (wLength < known.minLength) {
        diagnostics.error(
          "msos20-descriptor-too-short",
          `${known.label} too short (len=${wLength}, expected=${known.minLength})`,
          offset,
        );
        set.descriptors.push({ ...header, type: "undersized" });
      } else {
        set.descriptors.push(decodeKnown(cursor, header, known.type, diagnostics));
      }

      offset += wLength;
    }

    set.consumedLength = offset;
    return set;
  });
}

function decodeKnown(
  cursor: ByteCursor,
  header: MsOs20DescriptorHeader,
  type: KnownType,
  diagnostics: DiagnosticsBuilder,
): MsOs20Descriptor {
  const { offset, wLength } = header;
  const length = cursor.length;

  switch (type) {
    case "setHeader": {
      const dwWindowsVersion = cursor.readU32LE(offset + 4);
      const wTotalLength = cursor.readU16LE(offset + 8);
      if (wTotalLength !== length) {
        diagnostics.warning(
          "set-header-length-mismatch",
          `Total length mismatch (reported=${wTotalLength}, actual=${length})`,
          offset + 8,
        );
      }
      if (offset !== 0) {
        diagnostics.warning("set-header-not-first", `Set Header not at beginning (offset=${offset})`, offset);
      }
      if (dwWindowsVersion !== MS_OS_20_WINDOWS_VERSION) {
        diagnostics.warning(
          "set-header-unusual-windows-version",
          `Unusual Windows version ${hex32(dwWindowsVersion)} (expected ${hex32(MS_OS_20_WINDOWS_VERSION)} for Windows 8.1)`,
          offset + 4,
        );
      }
      return { ...header, type, dwWindowsVersion, wTotalLength };
    }

    case "configurationSubsetHeader": {
      const bConfigurationValue = cursor.readU8(offset + 4);
      const bReserved = cursor.readU8(offset + 5);
      const wTotalLength = cursor.readU16LE(offset + 6);
      if (bReserved !== 0) {
        diagnostics.warning("subset-reserved-nonzero", `Reserved field not zero (value=${bReserved})`, offset + 5);
      }
      if (offset + wTotalLength > length) {
        diagnostics.error(
          "configuration-subset-overflow",
          `Configuration subset extends beyond buffer (offset=${offset}, total=${wTotalLength}, buffer=${length})`,
          offset + 6,
        );
      }
      return { ...header, type, bConfigurationValue, bReserved, wTotalLength };
    }

    case "functionSubsetHeader": {
      const bFirstInterface = cursor.readU8(offset + 4);
      const bReserved = cursor.readU8(offset + 5);
      const wSubsetLength = cursor.readU16LE(offset + 6);
      if (bReserved !== 0) {
        diagnostics.warning("subset-reserved-nonzero", `Reserved field not zero (value=${bReserved})`, offset + 5);
      }
      if (offset + wSubsetLength > length) {
        diagnostics.error(
          "function-subset-overflow",
          `Function subset extends beyond buffer (offset=${offset}, subset=${wSubsetLength}, buffer=${length})`,
          offset + 6,
        );
      }
      if (wSubsetLength < wLength) {
        diagnostics.error(
          "function-subset-too-small",
          `Function subset length ${wSubsetLength} smaller than header length ${wLength}`,
          offset + 6,
        );
      }
      return { ...header, type, bFirstInterface, bReserved, wSubsetLength };
    }

    case "compatibleId": {
      const compatibleId = cursor.readBytes(offset + 4, COMPATIBLE_ID_BYTES);
      const subCompatibleId = cursor.readBytes(offset + 12, COMPATIBLE_ID_BYTES);
      if (!WINUSB.every((b, i) => compatibleId[i] === b)) {
        diagnostics.warning("compatible-id-not-winusb", "Compatible ID is not 'WINUSB'", offset + 4);
      }
      if (compatibleId[6] !== 0 || compatibleId[7] !== 0) {
        diagnostics.warning("compatible-id-not-terminated", "Compatible ID not properly null-terminated", offset + 10);
      }
      return {
        ...header,
        type,
        compatibleId,
        subCompatibleId,
        compatibleIdText: compatibleIdText(compatibleId),
        subCompatibleIdText: compatibleIdText(subCompatibleId),
      };
    }

    case "registryProperty":
      return { ...header, type, ...decodeRegistryProperty(cursor, offset, wLength, diagnostics) };
  }
}
