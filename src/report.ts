import type { DeviceReport, StageOutcome } from "./analyzer.js";
import { describeTransportError } from "./transport/transportError.js";
import { type BosDescriptor, USB_DEV_CAP_PLATFORM, USB_DT_BOS, USB_DT_DEVICE_CAPABILITY } from "./usb/bos.js";
import type { AnalysisResult, Diagnostic } from "./usb/diagnostics.js";
import { formatHexBytes, hex16, hex32, hex8 } from "./usb/hex.js";
import { type MsOs20Descriptor, type MsOs20DescriptorSet, msOs20DescriptorLabel } from "./usb/msOs20.js";
import type { PlatformCapability } from "./usb/platformCapability.js";
import { registryDataTypeName } from "./usb/registryProperty.js";
import { WEBUSB_URL_DESCRIPTOR_TYPE, type WebUsbUrlDescriptor } from "./usb/webUsbUrl.js";

const ANSI_RED = "\x1b[31m";
const ANSI_YELLOW = "\x1b[33m";
const ANSI_RESET = "\x1b[0m";

export type ReportFormatOptions = {
  color?: boolean;
  /** Hex dumps are cut off after this many bytes. */
  maxHexBytes?: number;
};

function paint(text: string, ansi: string, color: boolean): string {
  return color ? `${ansi}${text}${ANSI_RESET}` : text;
}

export function formatDiagnostic(diagnostic: Diagnostic, color = false): string {
  const at = diagnostic.offset === undefined ? "" : ` @${diagnostic.offset}`;
  if (diagnostic.severity === "error") {
    return paint(`ERROR${at}: ${diagnostic.message}`, ANSI_RED, color);
  }
  return paint(`WARNING${at}: ${diagnostic.message}`, ANSI_YELLOW, color);
}

export function formatVerdict(name: string, result: AnalysisResult<unknown>): string {
  switch (result.verdict) {
    case "well-formed":
      return `✓ ${name} appears to be well-formed`;
    case "valid-with-warnings":
      return `⚠ ${name} is valid but has ${result.warningCount} warning(s)`;
    case "invalid":
      return `✗ ${name} has ${result.errorCount} error(s) and ${result.warningCount} warning(s)`;
  }
}

function formatPlatform(platform: PlatformCapability): string[] {
  const lines = [`  bReserved: ${platform.bReserved}`, `  UUID: ${platform.uuid}`];
  const kind = platform.kind;
  switch (kind.type) {
    case "webusb":
      lines.push("  Type: WebUSB Platform Capability");
      if (!kind.data) {
        lines.push("  (payload truncated)");
        break;
      }
      lines.push(
        `  bcdVersion: ${hex16(kind.data.bcdVersion)}`,
        `  bVendorCode: ${hex8(kind.data.bVendorCode)}`,
        `  iLandingPage: ${kind.data.iLandingPage}`,
      );
      break;
    case "msos20":
      lines.push("  Type: Microsoft OS 2.0 Platform Capability");
      if (!kind.data) {
        lines.push("  (payload truncated)");
        break;
      }
      lines.push(
        `  dwWindowsVersion: ${hex32(kind.data.dwWindowsVersion)}`,
        `  wMSOSDescriptorSetTotalLength: ${kind.data.wDescriptorSetTotalLength}`,
        `  bMS_VendorCode: ${hex8(kind.data.bMsVendorCode)}`,
        `  bAltEnumCode: ${hex8(kind.data.bAltEnumCode)}`,
      );
      break;
    case "unknown":
      lines.push("  Type: Unknown Platform Capability");
      break;
  }
  return lines;
}

function typeLabel(value: number, expected: number, name: string): string {
  return `${hex8(value)} (${value === expected ? name : "UNKNOWN"})`;
}

export function formatBosFields(bos: BosDescriptor): string[] {
  const lines = [
    "BOS Header:",
    `  bLength: ${bos.bLength}`,
    `  bDescriptorType: ${typeLabel(bos.bDescriptorType, USB_DT_BOS, "BOS")}`,
    `  wTotalLength: ${bos.wTotalLength}`,
    `  bNumDeviceCaps: ${bos.bNumDeviceCaps}`,
  ];
  bos.capabilities.forEach((cap, i) => {
    const platformTag = cap.bDevCapabilityType === USB_DEV_CAP_PLATFORM ? " (Platform)" : "";
    lines.push(
      `Device Capability ${i} (offset ${cap.offset}):`,
      `  bLength: ${cap.bLength}`,
      `  bDescriptorType: ${typeLabel(cap.bDescriptorType, USB_DT_DEVICE_CAPABILITY, "DEVICE_CAPABILITY")}`,
      `  bDevCapabilityType: ${hex8(cap.bDevCapabilityType)}${platformTag}`,
    );
    if (cap.kind === "platform") lines.push(...formatPlatform(cap.platform));
  });
  lines.push(`Parsed ${bos.capabilities.length} of ${bos.bNumDeviceCaps} device capabilities`);
  return lines;
}

export function formatWebUsbUrlFields(url: WebUsbUrlDescriptor): string[] {
  return [
    "WebUSB URL:",
    `  bLength: ${url.bLength}`,
    `  bDescriptorType: ${typeLabel(url.bDescriptorType, WEBUSB_URL_DESCRIPTOR_TYPE, "WEBUSB_URL")}`,
    `  bScheme: ${url.bScheme} (${url.scheme})`,
    `  URL: ${url.url ?? "(none)"}`,
  ];
}

function formatMsOs20Descriptor(descriptor: MsOs20Descriptor): string[] {
  const label = msOs20DescriptorLabel(descriptor.wDescriptorType);
  const heading = `${label} (offset ${descriptor.offset}, len ${descriptor.wLength})`;
  switch (descriptor.type) {
    case "undersized":
      return [`${heading}: too short to decode`];
    case "setHeader":
      return [
        `${heading}:`,
        `  dwWindowsVersion: ${hex32(descriptor.dwWindowsVersion)}`,
        `  wTotalLength: ${descriptor.wTotalLength}`,
      ];
    case "configurationSubsetHeader":
      return [
        `${heading}:`,
        `  bConfigurationValue: ${descriptor.bConfigurationValue}`,
        `  wTotalLength: ${descriptor.wTotalLength}`,
      ];
    case "functionSubsetHeader":
      return [
        `${heading}:`,
        `  bFirstInterface: ${descriptor.bFirstInterface}`,
        `  wSubsetLength: ${descriptor.wSubsetLength}`,
      ];
    case "compatibleId":
      return [
        `${heading}:`,
        `  CompatibleID: "${descriptor.compatibleIdText}"`,
        `  SubCompatibleID: "${descriptor.subCompatibleIdText}"`,
      ];
    case "registryProperty": {
      const lines = [
        `${heading}:`,
        `  wPropertyDataType: ${descriptor.wPropertyDataType} (${registryDataTypeName(descriptor.wPropertyDataType)})`,
        `  PropertyName: ${descriptor.propertyName ?? "(undecodable)"}`,
      ];
      if (descriptor.wPropertyDataLength !== null) {
        lines.push(`  wPropertyDataLength: ${descriptor.wPropertyDataLength}`);
      }
      if (descriptor.propertyDataText !== null) {
        lines.push(`  PropertyData: ${descriptor.propertyDataText}`);
      }
      // The display above stops at the first NUL; later REG_MULTI_SZ strings only show here.
      if (descriptor.values && descriptor.values.length > 1) {
        lines.push(`  Values: ${descriptor.values.join(", ")}`);
      }
      return lines;
    }
  }
}

export function formatMsOs20Fields(set: MsOs20DescriptorSet): string[] {
  return set.descriptors.flatMap(formatMsOs20Descriptor);
}

/**
 * Renders one parsed descriptor: title, hex dump, decoded fields, diagnostics and the verdict line.
 */
export function formatAnalysisSection<T>(
  title: string,
  raw: Uint8Array,
  result: AnalysisResult<T>,
  formatFields: (parsed: T) => string[],
  options: ReportFormatOptions = {},
  preamble: readonly string[] = [],
): string {
  const color = options.color ?? false;
  const lines = [`=== ${title} ===`, ...preamble, `Raw data (${raw.byteLength} bytes):`];
  lines.push(...formatHexBytes(raw, options.maxHexBytes).split("\n"));
  if (result.parsed !== null) {
    lines.push("", ...formatFields(result.parsed));
  }
  if (result.diagnostics.length > 0) {
    lines.push("", "Diagnostics:");
    for (const diagnostic of result.diagnostics) {
      lines.push(`  ${formatDiagnostic(diagnostic, color)}`);
    }
  }
  lines.push("", formatVerdict(title, result));
  return lines.join("\n");
}

function formatStage<T>(
  title: string,
  outcome: StageOutcome<T>,
  formatFields: (parsed: T) => string[],
  options: ReportFormatOptions,
  preamble: readonly string[] = [],
): string {
  const heading = [`=== ${title} ===`, ...preamble];
  switch (outcome.status) {
    case "parsed":
      return formatAnalysisSection(title, outcome.raw, outcome.result, formatFields, options, preamble);
    case "empty":
      return [...heading, "No data returned (0 bytes)"].join("\n");
    case "skipped":
      return [...heading, `Skipped: ${outcome.reason}`].join("\n");
    case "transportError": {
      const explanation = describeTransportError(outcome.error);
      const detail = outcome.error.message === explanation.title ? "" : ` (${outcome.error.message})`;
      const lines = [...heading, `Failed to fetch: ${explanation.title}${detail}`];
      for (const hint of explanation.hints) lines.push(`  hint: ${hint}`);
      return lines.join("\n");
    }
  }
}

export function formatDeviceReport(report: DeviceReport, options: ReportFormatOptions = {}): string {
  const source = report.msOs20VendorCodeSource === "bos" ? "from BOS" : "fallback";
  const sections = [
    formatStage("BOS descriptor", report.bos, formatBosFields, options),
    formatStage("WebUSB URL descriptor", report.webUsbUrl, formatWebUsbUrlFields, options),
    formatStage("MS OS 2.0 descriptor set", report.msOs20, formatMsOs20Fields, options, [
      `Vendor code: ${hex8(report.msOs20VendorCode)} (${source})`,
    ]),
  ];
  if (report.notes.length > 0) {
    sections.push(report.notes.map((note) => `Note: ${note}`).join("\n"));
  }
  return sections.join("\n\n");
}
