import fc from "fast-check";
import { describe, expect, it } from "vitest";

import { parseBosDescriptor } from "../../src/usb/bos.js";
import type { AnalysisResult } from "../../src/usb/diagnostics.js";
import { parseMsOs20DescriptorSet } from "../../src/usb/msOs20.js";
import {
  MS_OS_20_PLATFORM_UUID,
  WEBUSB_PLATFORM_UUID,
  classifyPlatformUuidString,
  encodePlatformUuid,
  formatPlatformUuid,
} from "../../src/usb/uuid.js";
import { parseWebUsbUrlDescriptor } from "../../src/usb/webUsbUrl.js";
import { bos, platformCapability, u16, winUsbDescriptorSet } from "../descriptorBuilders.js";

const FC_NUM_RUNS = process.env.FC_NUM_RUNS ? Number(process.env.FC_NUM_RUNS) : process.env.CI ? 200 : 500;

const bytesArb = (maxLength: number) => fc.uint8Array({ minLength: 0, maxLength });

function expectConsistent(result: AnalysisResult<unknown>): void {
  const errors = result.diagnostics.filter((d) => d.severity === "error").length;
  expect(result.errorCount).toBe(errors);
  expect(result.warningCount).toBe(result.diagnostics.length - errors);
  expect(result.verdict).toBe(errors > 0 ? "invalid" : result.warningCount > 0 ? "valid-with-warnings" : "well-formed");

  const fatal = result.diagnostics.filter((d) => d.fatal);
  expect(fatal.length).toBeLessThanOrEqual(1);
  if (fatal.length === 1) expect(result.diagnostics[result.diagnostics.length - 1]?.fatal).toBe(true);
}

describe("descriptor parsers (property)", () => {
  it("never throw and keep counts, verdict and fatal placement consistent", () => {
    fc.assert(
      fc.property(bytesArb(96), (bytes) => {
        for (const parse of [parseBosDescriptor, parseWebUsbUrlDescriptor, parseMsOs20DescriptorSet]) {
          const result: AnalysisResult<unknown> = parse(bytes);
          expectConsistent(result);
          expect(parse(bytes)).toEqual(result);
        }
      }),
      { numRuns: FC_NUM_RUNS },
    );
  });

  it("BOS buffers under 5 bytes yield exactly one fatal error", () => {
    fc.assert(
      fc.property(fc.uint8Array({ minLength: 0, maxLength: 4 }), (bytes) => {
        const result = parseBosDescriptor(bytes);
        expect(result.parsed).toBeNull();
        expect(result.diagnostics.map((d) => [d.code, d.fatal])).toEqual([["bos-too-short", true]]);
      }),
      { numRuns: FC_NUM_RUNS },
    );
  });

  it("BOS header checks fire exactly when the fields disagree", () => {
    fc.assert(
      fc.property(fc.integer({ min: 0, max: 255 }), fc.integer({ min: 0, max: 0xffff }), (type, totalLength) => {
        const bytes = Uint8Array.from([5, type, ...u16(totalLength), 0]);
        const codes = parseBosDescriptor(bytes).diagnostics.map((d) => d.code);
        expect(codes.includes("bos-invalid-type")).toBe(type !== 0x0f);
        expect(codes.includes("bos-length-mismatch")).toBe(totalLength !== 5);
      }),
      { numRuns: FC_NUM_RUNS },
    );
  });

  it("classifies a platform capability as WebUSB exactly when its UUID matches", () => {
    const uuidArb = fc.oneof(fc.uuid(), fc.constant(WEBUSB_PLATFORM_UUID), fc.constant(MS_OS_20_PLATFORM_UUID));
    fc.assert(
      fc.property(uuidArb, (uuid) => {
        const capability = parseBosDescriptor(bos([platformCapability(uuid, [0x00, 0x01, 0x01, 0x01])])).parsed
          ?.capabilities[0];
        if (capability?.kind !== "platform") throw new Error("expected a platform capability");
        expect(capability.platform.kind.type === "webusb").toBe(uuid === WEBUSB_PLATFORM_UUID);
      }),
      { numRuns: FC_NUM_RUNS },
    );
  });

  it("consumes exactly the declared lengths of the descriptors it returns", () => {
    fc.assert(
      fc.property(bytesArb(128), (bytes) => {
        const result = parseMsOs20DescriptorSet(bytes);
        const set = result.parsed;
        if (!set) throw new Error("MS OS 2.0 parsing always yields a set");
        const sum = set.descriptors.reduce((acc, d) => acc + d.wLength, 0);
        expect(set.consumedLength).toBe(sum);
        if (!result.diagnostics.some((d) => d.fatal)) expect(set.consumedLength).toBe(bytes.byteLength);
      }),
      { numRuns: FC_NUM_RUNS },
    );
  });

  it("never calls a truncated WinUSB set well-formed", () => {
    const full = winUsbDescriptorSet();
    fc.assert(
      fc.property(fc.integer({ min: 1, max: full.byteLength - 1 }), (length) => {
        expect(parseMsOs20DescriptorSet(full.subarray(0, length)).verdict).not.toBe("well-formed");
      }),
      { numRuns: FC_NUM_RUNS },
    );
  });
});

describe("platform UUIDs (property)", () => {
  it("encode and format are inverse", () => {
    fc.assert(
      fc.property(fc.uuid(), (uuid) => {
        expect(formatPlatformUuid(encodePlatformUuid(uuid))).toBe(uuid.toLowerCase());
      }),
      { numRuns: FC_NUM_RUNS },
    );
  });

  it("classification ignores case", () => {
    const mixedCase = fc
      .array(fc.boolean(), { minLength: WEBUSB_PLATFORM_UUID.length, maxLength: WEBUSB_PLATFORM_UUID.length })
      .map((upper) => Array.from(WEBUSB_PLATFORM_UUID, (ch, i) => (upper[i] ? ch.toUpperCase() : ch)).join(""));
    fc.assert(
      fc.property(mixedCase, (uuid) => {
        expect(classifyPlatformUuidString(uuid)).toBe("webusb");
      }),
      { numRuns: FC_NUM_RUNS },
    );
  });
});
