import type { DestinationStream } from "pino";

import { analyzeDevice, reportExitCode } from "./analyzer.js";
import { type Config, loadConfig, parseIntegerLiteral } from "./config.js";
import { type Logger, createLogger } from "./logger.js";
import { formatDeviceReport } from "./report.js";
import { type DescriptorFiles, FileDescriptorTransport } from "./transport/fileTransport.js";
import {
  type UsbDeviceHandle,
  type UsbDeviceProvider,
  createNodeWebUsb,
  openUsbDevice,
} from "./transport/usbDevice.js";
import { WebUsbDescriptorTransport } from "./transport/webUsbTransport.js";
import { formatOneLineError } from "./util/text.js";

export const USAGE = `Usage:
  bos-inspect <vid> <pid>
  bos-inspect --bos <file> [--msos20 <file>] [--webusb-url <file>]

Reads and validates the BOS, WebUSB URL and MS OS 2.0 descriptors of a USB device,
either live (VID/PID as decimal or 0x hex) or from captured files (raw bytes or hex dumps).

Options:
  --bos <file>          Captured BOS descriptor
  --msos20 <file>       Captured MS OS 2.0 descriptor set
  --webusb-url <file>   Captured WebUSB URL descriptor
  --color, --no-color   Force ANSI colors on/off (default: COLOR env, then TTY detection)
  --help, -h            Show this help

Environment:
  LOG_LEVEL=warn                     pino log level (logs go to stderr)
  TRANSFER_LENGTH=512                Bytes requested per control transfer
  MSOS20_FALLBACK_VENDOR_CODE=0x02   MS OS 2.0 vendor request when the BOS does not name one
  COLOR=auto                         auto | always | never

Exit status: 0 when every fetched descriptor is valid, 1 when one is invalid or none could be
fetched, 2 on usage, configuration or device errors.`;

const MAX_ERROR_BYTES = 512;

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

export type CliCommand =
  | { kind: "help" }
  | { kind: "device"; vendorId: number; productId: number; color?: boolean }
  | { kind: "files"; files: DescriptorFiles; color?: boolean };

export function parseUsbId(raw: string, label: string): number {
  const value = parseIntegerLiteral(raw);
  if (value === null) {
    throw new UsageError(`Invalid ${label}: ${raw} (use decimal or 0x hex)`);
  }
  if (value < 1 || value > 0xffff) {
    throw new UsageError(`${label} out of range: ${raw} (must be 1-0xffff)`);
  }
  return value;
}

const FILE_FLAGS = {
  "--bos": "bos",
  "--msos20": "msOs20",
  "--webusb-url": "webUsbUrl",
} as const satisfies Record<string, keyof DescriptorFiles>;

function isFileFlag(arg: string): arg is keyof typeof FILE_FLAGS {
  return Object.hasOwn(FILE_FLAGS, arg);
}

export function parseCliArgs(argv: readonly string[]): CliCommand {
  const files: DescriptorFiles = {};
  const positionals: string[] = [];
  let color: boolean | undefined;

  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i] ?? "";
    if (arg === "--help" || arg === "-h") return { kind: "help" };
    if (arg === "--color") {
      color = true;
    } else if (arg === "--no-color") {
      color = false;
    } else if (isFileFlag(arg)) {
      const value = argv[i + 1];
      if (value === undefined || value.startsWith("--")) throw new UsageError(`Missing value for ${arg}`);
      files[FILE_FLAGS[arg]] = value;
      i += 1;
    } else if (arg.startsWith("-") && !/^-?\d/.test(arg)) {
      throw new UsageError(`Unknown option: ${arg}`);
    } else {
      positionals.push(arg);
    }
  }

  const colorOption = color === undefined ? {} : { color };
  if (Object.keys(files).length > 0) {
    if (positionals.length > 0) throw new UsageError("Device IDs cannot be combined with descriptor files");
    return { kind: "files", files, ...colorOption };
  }
  const [vid, pid, ...extra] = positionals;
  if (vid === undefined || pid === undefined || extra.length > 0) {
    throw new UsageError("Expected <vid> <pid> or --bos <file>");
  }
  return {
    kind: "device",
    vendorId: parseUsbId(vid, "vendor ID"),
    productId: parseUsbId(pid, "product ID"),
    ...colorOption,
  };
}

export type CliIo = {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  isTty: boolean;
};

export type CliDeps = {
  createUsb?: () => Promise<UsbDeviceProvider>;
  logDestination?: DestinationStream;
};

function resolveColor(command: { color?: boolean }, config: Config, io: CliIo): boolean {
  if (command.color !== undefined) return command.color;
  if (config.COLOR === "always") return true;
  if (config.COLOR === "never") return false;
  return io.isTty;
}

function describeError(err: unknown): string {
  const message = formatOneLineError(err, MAX_ERROR_BYTES);
  if (err instanceof Error && err.cause !== undefined) {
    return `${message}: ${formatOneLineError(err.cause, MAX_ERROR_BYTES)}`;
  }
  return message;
}

async function runDevice(
  command: Extract<CliCommand, { kind: "device" }>,
  config: Config,
  logger: Logger,
  io: CliIo,
  deps: CliDeps,
): Promise<number> {
  const { vendorId, productId } = command;
  let device: UsbDeviceHandle;
  try {
    const usb = await (deps.createUsb ?? createNodeWebUsb)();
    device = await openUsbDevice(usb, vendorId, productId);
  } catch (err) {
    logger.error({ vendorId, productId, err }, "failed to open device");
    io.stderr(`Error: ${describeError(err)}\n`);
    return 2;
  }
  logger.info({ vendorId, productId, product: device.productName }, "device opened");

  try {
    const transport = new WebUsbDescriptorTransport(device, { transferLength: config.TRANSFER_LENGTH });
    const report = await analyzeDevice(transport, {
      fallbackMsOs20VendorCode: config.MSOS20_FALLBACK_VENDOR_CODE,
      logger,
    });
    io.stdout(`${formatDeviceReport(report, { color: resolveColor(command, config, io) })}\n`);
    return reportExitCode(report);
  } finally {
    try {
      await device.close();
    } catch (err) {
      logger.warn({ err }, "failed to close device");
    }
  }
}

async function runFiles(
  command: Extract<CliCommand, { kind: "files" }>,
  config: Config,
  logger: Logger,
  io: CliIo,
): Promise<number> {
  const report = await analyzeDevice(new FileDescriptorTransport(command.files), {
    fallbackMsOs20VendorCode: config.MSOS20_FALLBACK_VENDOR_CODE,
    logger,
  });
  io.stdout(`${formatDeviceReport(report, { color: resolveColor(command, config, io) })}\n`);
  return reportExitCode(report);
}

/** Runs the CLI and returns the process exit status. */
export async function runCli(
  argv: readonly string[],
  env: Record<string, string | undefined>,
  io: CliIo,
  deps: CliDeps = {},
): Promise<number> {
  let command: CliCommand;
  try {
    command = parseCliArgs(argv);
  } catch (err) {
    if (!(err instanceof UsageError)) throw err;
    io.stderr(`${err.message}\n\n${USAGE}\n`);
    return 2;
  }
  if (command.kind === "help") {
    io.stdout(`${USAGE}\n`);
    return 0;
  }

  let config: Config;
  try {
    config = loadConfig(env);
  } catch (err) {
    io.stderr(`${err instanceof Error ? err.message : String(err)}\n`);
    return 2;
  }
  const logger = createLogger(config.LOG_LEVEL, deps.logDestination);

  if (command.kind === "files") return runFiles(command, config, logger, io);
  return runDevice(command, config, logger, io, deps);
}
