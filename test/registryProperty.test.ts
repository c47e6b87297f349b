import { describe, expect, it } from "vitest";

import { ByteCursor } from "../src/usb/byteCursor.js";
import { type MsOs20Descriptor, parseMsOs20DescriptorSet } from "../src/usb/msOs20.js";
import { decodeLowByteUtf16, registryDataTypeName } from "../src/usb/registryProperty.js";
import { type RegistryPropertyOptions, msOs20Set, registryPropertyFeature, utf16le } from "./descriptorBuilders.js";

function parseProperty(options: RegistryPropertyOptions, trailing: number[] = []) {
  const result = parseMsOs20DescriptorSet(msOs20Set([[...registryPropertyFeature(options), ...trailing]]));
  const property: MsOs20Descriptor | undefined = result.parsed?.descriptors[1];
  if (property?.type !== "registryProperty") throw new Error("expected a registry property");
  return { result, property };
}

describe("usb/registry property feature", () => {
  it("decodes name, data and values", () => {
    const { result, property } = parseProperty({ dataType: 1, name: "Label", data: utf16le("Widget") });
    expect(result.diagnostics).toEqual([]);
    expect(property.propertyName).toBe("Label");
    expect(property.wPropertyDataLength).toBe(14);
    expect(property.propertyDataText).toBe("Widget");
    expect(property.values).toEqual(["Widget"]);
  });

  it("splits REG_MULTI_SZ values", () => {
    const { property } = parseProperty({ dataType: 7, name: "Names", data: utf16le("a\u0000b", 2) });
    expect(property.values).toEqual(["a", "b"]);
    // Display text stops at the first NUL.
    expect(property.propertyDataText).toBe("a");
  });

  it("rejects an odd property name length without decoding the name", () => {
    const { result, property } = parseProperty({ name: "DeviceInterfaceGUIDs", data: utf16le("x"), nameLength: 41 });
    expect(result.diagnostics).toEqual([
      {
        severity: "error",
        code: "registry-invalid-name-length",
        message: "Invalid property name length 41 (must be even and >0)",
        offset: 16,
        fatal: false,
      },
    ]);
    expect(property.propertyName).toBeNull();
    expect(property.wPropertyDataLength).toBeNull();
  });

  it("rejects a zero property name length", () => {
    const { result } = parseProperty({ name: "A", data: [], nameLength: 0 });
    expect(result.diagnostics.map((d) => d.message)).toEqual(["Invalid property name length 0 (must be even and >0)"]);
  });

  it("warns about unusual data types", () => {
    const { result } = parseProperty({ dataType: 4, name: "Value", data: [1, 0, 0, 0] });
    expect(result.diagnostics.map((d) => [d.code, d.message, d.offset])).toEqual([
      ["registry-unusual-data-type", "Unusual property data type 4 (1=REG_SZ, 7=REG_MULTI_SZ)", 14],
    ]);
    expect(registryDataTypeName(4)).toBe("REG_DWORD_LITTLE_ENDIAN");
    expect(registryDataTypeName(99)).toBe("UNKNOWN");
  });

  it("warns about an empty property name", () => {
    const { result, property } = parseProperty({ dataType: 1, name: "", data: utf16le("v") });
    expect(result.diagnostics.map((d) => [d.code, d.message])).toEqual([["registry-empty-name", "Empty property name"]]);
    expect(property.propertyName).toBe("");
  });

  it("reports a name running past the buffer", () => {
    const { result } = parseProperty({ dataType: 1, name: "Ab", data: [], nameLength: 200 });
    expect(result.diagnostics.map((d) => [d.code, d.message, d.offset])).toEqual([
      ["registry-name-overflow", "Property name extends beyond descriptor", 18],
    ]);
  });

  it("reports a length mismatch and still decodes the data", () => {
    const { result, property } = parseProperty({ dataType: 1, name: "Ab", data: utf16le("c"), wLength: 22 }, [0, 0]);
    expect(result.diagnostics.map((d) => [d.code, d.message])).toEqual([
      ["registry-length-mismatch", "Length mismatch (calculated=20, reported=22)"],
    ]);
    expect(property.values).toEqual(["c"]);
  });

  it("reports data running past the buffer", () => {
    // wLength is cut down to the bytes that exist; the data length still claims 40 bytes.
    const full = registryPropertyFeature({ dataType: 1, name: "Ab", data: Array<number>(40).fill(0x41) });
    const truncated = full.slice(0, 20);
    truncated[0] = 20;
    const result = parseMsOs20DescriptorSet(msOs20Set([truncated]));
    expect(result.diagnostics.map((d) => [d.code, d.message])).toEqual([
      ["registry-length-mismatch", "Length mismatch (calculated=56, reported=20)"],
      ["registry-data-overflow", "Property data extends beyond descriptor"],
    ]);
  });

  it("reports a missing data length field", () => {
    const truncated = registryPropertyFeature({ dataType: 1, name: "Ab", data: [] }).slice(0, 14);
    truncated[0] = 14;
    const result = parseMsOs20DescriptorSet(msOs20Set([truncated]));
    expect(result.diagnostics.map((d) => [d.code, d.message, d.offset])).toEqual([
      ["registry-data-length-overflow", "Property data length field beyond descriptor", 24],
    ]);
  });
});

describe("usb/decodeLowByteUtf16", () => {
  it("never shows the final code unit", () => {
    const bytes = Uint8Array.from([0x41, 0x00, 0x42, 0x00]);
    expect(decodeLowByteUtf16(new ByteCursor(bytes), 0, 4)).toEqual({ text: "A", printable: 1 });
  });

  it("replaces non-printable low bytes with '?'", () => {
    const bytes = Uint8Array.from([...utf16le("hé\u0001i")]);
    expect(decodeLowByteUtf16(new ByteCursor(bytes), 0, bytes.byteLength)).toEqual({ text: "h??i", printable: 2 });
  });
});
