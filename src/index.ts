export { ByteCursor, ByteCursorOutOfBoundsError } from "./usb/byteCursor.js";
export {
  type AnalysisResult,
  type Diagnostic,
  type DiagnosticCode,
  DiagnosticsBuilder,
  type Severity,
  type Verdict,
  computeVerdict,
} from "./usb/diagnostics.js";
export { formatHexBytes, hex16, hex32, hex8 } from "./usb/hex.js";
export {
  MS_OS_20_PLATFORM_UUID,
  type PlatformUuidKind,
  WEBUSB_PLATFORM_UUID,
  classifyPlatformUuid,
  classifyPlatformUuidString,
  encodePlatformUuid,
  formatPlatformUuid,
} from "./usb/uuid.js";
export {
  type MsOs20CapabilityData,
  type PlatformCapability,
  type PlatformCapabilityKind,
  type WebUsbCapabilityData,
  decodePlatformCapability,
} from "./usb/platformCapability.js";
export {
  type BosDescriptor,
  type DeviceCapability,
  findMsOs20Capability,
  findWebUsbCapability,
  parseBosDescriptor,
} from "./usb/bos.js";
export { type WebUsbUrlDescriptor, type WebUsbUrlScheme, parseWebUsbUrlDescriptor, webUsbUrlScheme } from "./usb/webUsbUrl.js";
export {
  type MsOs20Descriptor,
  type MsOs20DescriptorSet,
  msOs20DescriptorLabel,
  parseMsOs20DescriptorSet,
} from "./usb/msOs20.js";
export { type RegistryPropertyFields, decodeLowByteUtf16, registryDataTypeName } from "./usb/registryProperty.js";

export type { DescriptorTransport } from "./transport/descriptorTransport.js";
export {
  type TransportError,
  type TransportErrorKind,
  type TransportResult,
  classifyTransportError,
  describeTransportError,
} from "./transport/transportError.js";
export { WebUsbDescriptorTransport, type WebUsbTransportOptions } from "./transport/webUsbTransport.js";
export { type DescriptorFiles, FileDescriptorTransport } from "./transport/fileTransport.js";
export { decodeDescriptorFile, parseHexDump } from "./transport/hexInput.js";
export {
  DeviceNotFoundError,
  type UsbDeviceHandle,
  type UsbDeviceProvider,
  createNodeWebUsb,
  openUsbDevice,
} from "./transport/usbDevice.js";

export { type AnalyzeOptions, type DeviceReport, type StageOutcome, analyzeDevice, reportExitCode } from "./analyzer.js";
export { type ReportFormatOptions, formatAnalysisSection, formatDeviceReport } from "./report.js";
export { type Config, loadConfig } from "./config.js";
export { createLogger } from "./logger.js";
