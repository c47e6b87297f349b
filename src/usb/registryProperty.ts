import type { ByteCursor } from "./byteCursor.js";
import type { DiagnosticsBuilder } from "./diagnostics.js";

export const MS_OS_20_REGISTRY_PROPERTY_MIN_BYTES = 8;

export const REG_SZ = 1;
export const REG_EXPAND_SZ = 2;
export const REG_BINARY = 3;
export const REG_DWORD_LITTLE_ENDIAN = 4;
export const REG_DWORD_BIG_ENDIAN = 5;
export const REG_LINK = 6;
export const REG_MULTI_SZ = 7;

const REGISTRY_DATA_TYPE_NAMES: Record<number, string> = {
  [REG_SZ]: "REG_SZ",
  [REG_EXPAND_SZ]: "REG_EXPAND_SZ",
  [REG_BINARY]: "REG_BINARY",
  [REG_DWORD_LITTLE_ENDIAN]: "REG_DWORD_LITTLE_ENDIAN",
  [REG_DWORD_BIG_ENDIAN]: "REG_DWORD_BIG_ENDIAN",
  [REG_LINK]: "REG_LINK",
  [REG_MULTI_SZ]: "REG_MULTI_SZ",
};

export function registryDataTypeName(type: number): string {
  return REGISTRY_DATA_TYPE_NAMES[type] ?? "UNKNOWN";
}

export interface RegistryPropertyFields {
  wPropertyDataType: number;
  wPropertyNameLength: number;
  /** `null` when the name length is invalid or runs past the buffer. */
  propertyName: string | null;
  wPropertyDataLength: number | null;
  propertyData: Uint8Array | null;
  /** Display form of the data (same low-byte rendering as the name); `null` when there is none. */
  propertyDataText: string | null;
  /** Full UTF-16LE decode of the data, split at NUL, empty entries dropped. */
  values: string[] | null;
}

const utf16le = new TextDecoder("utf-16le");

/**
 * Renders a UTF-16LE string for display using only the low byte of each code unit.
 *
 * Iterates `byteLength - 2` bytes: the final code unit is assumed to be the NUL terminator and is
 * never shown, whether or not it is actually zero.
 */
export function decodeLowByteUtf16(
  cursor: ByteCursor,
  start: number,
  byteLength: number,
): { text: string; printable: number } {
  let text = "";
  let printable = 0;
  for (let i = 0; i < byteLength - 2; i += 2) {
    if (!cursor.fits(start + i, 1)) continue;
    const c = cursor.readU8(start + i);
    if (c >= 32 && c <= 126) {
      text += String.fromCharCode(c);
      printable += 1;
    } else if (c === 0) {
      break;
    } else {
      text += "?";
    }
  }
  return { text, printable };
}

function decodeUtf16Values(bytes: Uint8Array): string[] {
  const even = bytes.subarray(0, bytes.byteLength - (bytes.byteLength % 2));
  return utf16le
    .decode(even)
    .split("\u0000")
    .filter((value) => value.length > 0);
}

/**
 * Decodes an MS OS 2.0 Registry Property feature descriptor at `offset`.
 *
 * The caller has already checked `wLength >= 8` and that `[offset, offset + wLength)` is in bounds.
 * Name and data are bounded by the buffer, not by `wLength`; a disagreement between the two is
 * reported as a length mismatch.
 */
export function decodeRegistryProperty(
  cursor: ByteCursor,
  offset: number,
  wLength: number,
  diagnostics: DiagnosticsBuilder,
): RegistryPropertyFields {
  const length = cursor.length;
  const fields: RegistryPropertyFields = {
    wPropertyDataType: cursor.readU16LE(offset + 4),
    wPropertyNameLength: cursor.readU16LE(offset + 6),
    propertyName: null,
    wPropertyDataLength: null,
    propertyData: null,
    propertyDataText: null,
    values: null,
  };

  if (fields.wPropertyDataType !== REG_SZ && fields.wPropertyDataType !== REG_MULTI_SZ) {
    diagnostics.warning(
      "registry-unusual-data-type",
      `Unusual property data type ${fields.wPropertyDataType} (1=REG_SZ, 7=REG_MULTI_SZ)`,
      offset + 4,
    );
  }

  const nameLength = fields.wPropertyNameLength;
  const nameOffset = offset + MS_OS_20_REGISTRY_PROPERTY_MIN_BYTES;
  if (nameLength === 0 || nameLength % 2 !== 0) {
    diagnostics.error(
      "registry-invalid-name-length",
      `Invalid property name length ${nameLength} (must be even and >0)`,
      offset + 6,
    );
    return fields;
  }
  if (!cursor.fits(nameOffset, nameLength)) {
    diagnostics.error("registry-name-overflow", "Property name extends beyond descriptor", nameOffset);
    return fields;
  }

  const name = decodeLowByteUtf16(cursor, nameOffset, nameLength);
  fields.propertyName = name.text;
  if (name.printable === 0) {
    diagnostics.warning("registry-empty-name", "Empty property name", nameOffset);
  }

  const dataLengthOffset = nameOffset + nameLength;
  if (!cursor.fits(dataLengthOffset, 2)) {
    diagnostics.error("registry-data-length-overflow", "Property data length field beyond descriptor", dataLengthOffset);
    return fields;
  }
  const dataLength = cursor.readU16LE(dataLengthOffset);
  fields.wPropertyDataLength = dataLength;

  const expectedTotal = MS_OS_20_REGISTRY_PROPERTY_MIN_BYTES + nameLength + 2 + dataLength;
  if (expectedTotal !== wLength) {
    diagnostics.error(
      "registry-length-mismatch",
      `Length mismatch (calculated=${expectedTotal}, reported=${wLength})`,
      offset,
    );
  }

  const dataOffset = dataLengthOffset + 2;
  if (dataOffset + dataLength > length) {
    diagnostics.error("registry-data-overflow", "Property data extends beyond descriptor", dataOffset);
    return fields;
  }

  fields.propertyData = cursor.readBytes(dataOffset, dataLength);
  fields.values = decodeUtf16Values(fields.propertyData);
  if (dataLength > 0) {
    fields.propertyDataText = decodeLowByteUtf16(cursor, dataOffset, dataLength).text;
  }
  return fields;
}
