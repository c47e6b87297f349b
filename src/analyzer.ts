import { DEFAULT_MSOS20_FALLBACK_VENDOR_CODE } from "./config.js";
import type { Logger } from "./logger.js";
import type { DescriptorTransport } from "./transport/descriptorTransport.js";
import type { TransportError, TransportResult } from "./transport/transportError.js";
import {
  type BosDescriptor,
  findMsOs20Capability,
  findWebUsbCapability,
  parseBosDescriptor,
} from "./usb/bos.js";
import type { AnalysisResult } from "./usb/diagnostics.js";
import { type MsOs20DescriptorSet, parseMsOs20DescriptorSet } from "./usb/msOs20.js";
import type { WebUsbCapabilityData } from "./usb/platformCapability.js";
import { type WebUsbUrlDescriptor, parseWebUsbUrlDescriptor } from "./usb/webUsbUrl.js";

/** Smallest well-formed MS OS 2.0 set: a lone Set Header. */
export const MS_OS_20_MIN_SET_BYTES = 10;

export type StageOutcome<T> =
  | { status: "parsed"; raw: Uint8Array; result: AnalysisResult<T> }
  | { status: "empty" }
  | { status: "transportError"; error: TransportError }
  | { status: "skipped"; reason: string };

export type VendorCodeSource = "bos" | "fallback";

export interface DeviceReport {
  bos: StageOutcome<BosDescriptor>;
  webUsb: WebUsbCapabilityData | null;
  webUsbUrl: StageOutcome<WebUsbUrlDescriptor>;
  msOs20: StageOutcome<MsOs20DescriptorSet>;
  msOs20VendorCode: number;
  msOs20VendorCodeSource: VendorCodeSource;
  /** Informational remarks that are not parser diagnostics (e.g. a suspiciously short response). */
  notes: string[];
}

export type AnalyzeOptions = {
  fallbackMsOs20VendorCode?: number;
  logger?: Logger;
};

function toStage<T>(
  fetched: TransportResult,
  parse: (bytes: Uint8Array) => AnalysisResult<T>,
): StageOutcome<T> {
  if (!fetched.ok) return { status: "transportError", error: fetched.error };
  if (fetched.data.byteLength === 0) return { status: "empty" };
  return { status: "parsed", raw: fetched.data, result: parse(fetched.data) };
}

function logStage(logger: Logger | undefined, stage: string, outcome: StageOutcome<unknown>): void {
  if (!logger) return;
  switch (outcome.status) {
    case "parsed":
      logger.info(
        {
          stage,
          bytes: outcome.raw.byteLength,
          verdict: outcome.result.verdict,
          errors: outcome.result.errorCount,
          warnings: outcome.result.warningCount,
        },
        "descriptor analyzed",
      );
      break;
    case "transportError":
      logger.warn({ stage, kind: outcome.error.kind, err: outcome.error.message }, "descriptor fetch failed");
      break;
    case "empty":
      logger.warn({ stage }, "descriptor response was empty");
      break;
    case "skipped":
      logger.debug({ stage, reason: outcome.reason }, "descriptor fetch skipped");
      break;
  }
}

/**
 * Fetches and validates BOS, WebUSB URL and MS OS 2.0 descriptors from one device, sequentially.
 *
 * Transport failures are captured per stage; a failed stage never prevents later stages from running.
 */
export async function analyzeDevice(
  transport: DescriptorTransport,
  options: AnalyzeOptions = {},
): Promise<DeviceReport> {
  const { logger } = options;
  const notes: string[] = [];

  const bos = toStage(await transport.fetchBos(), parseBosDescriptor);
  logStage(logger, "bos", bos);
  const bosParsed = bos.status === "parsed" ? bos.result.parsed : null;

  const webUsb = bosParsed ? findWebUsbCapability(bosParsed)?.data ?? null : null;
  let webUsbUrl: StageOutcome<WebUsbUrlDescriptor>;
  if (!bosParsed) {
    webUsbUrl = { status: "skipped", reason: "BOS descriptor unavailable" };
  } else if (!webUsb) {
    webUsbUrl = { status: "skipped", reason: "No WebUSB platform capability in BOS descriptor" };
  } else if (webUsb.bVendorCode === 0) {
    webUsbUrl = { status: "skipped", reason: "WebUSB vendor code is 0" };
  } else if (webUsb.iLandingPage === 0) {
    webUsbUrl = { status: "skipped", reason: "WebUSB capability declares no landing page" };
  } else {
    webUsbUrl = toStage(
      await transport.fetchWebUsbUrl(webUsb.bVendorCode, webUsb.iLandingPage),
      parseWebUsbUrlDescriptor,
    );
  }
  logStage(logger, "webUsbUrl", webUsbUrl);

  const msOs20Capability = bosParsed ? findMsOs20Capability(bosParsed) : null;
  const msOs20VendorCodeSource: VendorCodeSource = msOs20Capability ? "bos" : "fallback";
  const msOs20VendorCode =
    msOs20Capability?.data.bMsVendorCode ?? options.fallbackMsOs20VendorCode ?? DEFAULT_MSOS20_FALLBACK_VENDOR_CODE;
  logger?.debug({ vendorCode: msOs20VendorCode, source: msOs20VendorCodeSource }, "requesting MS OS 2.0 descriptor set");

  const msOs20 = toStage(await transport.fetchMsOs20(msOs20VendorCode), parseMsOs20DescriptorSet);
  logStage(logger, "msOs20", msOs20);
  if (msOs20.status === "parsed" && msOs20.raw.byteLength < MS_OS_20_MIN_SET_BYTES) {
    notes.push(
      `MS OS 2.0 response is only ${msOs20.raw.byteLength} bytes (a Set Header alone is ${MS_OS_20_MIN_SET_BYTES})`,
    );
  }

  return { bos, webUsb, webUsbUrl, msOs20, msOs20VendorCode, msOs20VendorCodeSource, notes };
}

function stages(report: DeviceReport): StageOutcome<unknown>[] {
  return [report.bos, report.webUsbUrl, report.msOs20];
}

/** `1` when any stage is invalid or nothing could be fetched at all, otherwise `0`. */
export function reportExitCode(report: DeviceReport): 0 | 1 {
  const all = stages(report);
  if (all.some((stage) => stage.status === "parsed" && stage.result.verdict === "invalid")) return 1;
  if (!all.some((stage) => stage.status === "parsed")) return 1;
  return 0;
}
